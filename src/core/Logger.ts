import type OssError from "../struct/OssError";
import { existsSync, writeFileSync, appendFileSync } from "fs";
import type { ScanSummary } from "./SongsScanner";

// A utility class for logging errors and scan warnings
export default class Logger {
  static errorLogPath = "./oss-error.log";
  static scanLogPath = "./oss-scan.log";

  // Generates an error log file with the given error
  static generateErrorLog(error: OssError): boolean {
    try {
      // Check if the error log file exists
      if (!Logger._checkIfErrorLogFileExists()) {
        // If it does not, create the file and write the error stack trace to it
        writeFileSync(
          Logger.errorLogPath,
          `=== Error Log ===\n${
            error.stack ?? "Unknown error stack"
          }\n=========\n`
        );
      } else {
        // If the file does exist, append the error stack trace to it
        appendFileSync(
          Logger.errorLogPath,
          `${error.stack ?? "Unknown error stack"}\n=================\n`
        );
      }
      return true;
    } catch (error) {
      console.error(error);
      return false;
    }
  }

  // Generates a log file listing the files and folders the last scan skipped
  // Note: overrides the previous scan log
  static generateScanLog(summary: ScanSummary): boolean {
    try {
      const lines = summary.warnings
        .map((warning) => `[${warning.type}] ${warning.path}\n  ${warning.message}`)
        .join("\n");

      writeFileSync(
        Logger.scanLogPath,
        `=== Scan Warnings (${summary.warnings.length}) ===\n${lines}\n`
      );

      return true;
    } catch (error) {
      console.error(error);
      return false;
    }
  }

  private static _checkIfErrorLogFileExists(): boolean {
    return existsSync(Logger.errorLogPath);
  }
}
