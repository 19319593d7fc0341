import _path from "path";
import { config } from "../state";
import { Msg } from "../struct/Message";
import OssError from "../struct/OssError";
import { isDirectory } from "../util";
import { JsonCacheStore } from "./CacheStore";
import { type CommandResult, execute, parseCommand } from "./Commands";
import Library from "./Library";
import Logger from "./Logger";
import Monitor, { DisplayTextColor } from "./Monitor";
import SongsScanner from "./SongsScanner";

export default class Worker {
  monitor: Monitor;

  constructor() {
    this.monitor = new Monitor();
  }

  async run(): Promise<void> {
    // Run setup wizard on first run, or when the saved folder is gone
    if (config.isFirstRun || !config.isSongsPathValid()) {
      this.monitor.displayMessage(Msg.SETUP_WELCOME, {}, DisplayTextColor.PRIMARY);
      this.promptSongsPath(Msg.SETUP_SONGS_PATH);
    }

    let library = await this.openLibrary();

    for (;;) {
      this.monitor.update(library.index);

      let line: string;
      try {
        line = this.monitor.awaitInput(Msg.INPUT_COMMAND);
      } catch (e) {
        throw new OssError("GET_USER_INPUT_FAILED", e);
      }
      if (!line || !line.trim()) continue;

      // `find` without a keyword asks for one
      const { name, args } = parseCommand(line);
      if (name === "find" && !args) {
        this.monitor.displayMessage(Msg.QUERY_FIELDS_HINT, {}, DisplayTextColor.SECONDARY);
        line = `find ${this.monitor.awaitInput(Msg.INPUT_KEYWORD)}`;
      }

      const result = await execute(library, line);
      if (result.kind === "exit") return;

      if (result.kind === "path") {
        if (this.promptSongsPath(Msg.PATH_INPUT)) {
          library = await this.openLibrary();
        }
        continue;
      }

      this.display(result);
      this.monitor.awaitInput(Msg.FREEZE);
    }
  }

  private display(result: CommandResult): void {
    switch (result.kind) {
      case "matches":
        this.monitor.displayMatches(result.matches);
        break;
      case "duplicates":
        this.monitor.displayScanSummary(result.summary);
        this.monitor.displayDuplicates(result.groups);
        break;
      case "scanned":
        this.monitor.displayScanSummary(result.summary);
        break;
      case "error":
        this.monitor.displayMessage(
          Msg.COMMAND_ERROR,
          { type: result.type, message: result.message },
          DisplayTextColor.DANGER
        );
        break;
      case "path":
      case "exit":
        break;
    }
  }

  // Builds the library for the configured folder and brings it up to date
  private async openLibrary(): Promise<Library> {
    const scanner = new SongsScanner(config.songsPath, {
      concurrency: config.scanConcurrency,
    });
    scanner.setProgressCallback((progress) => this.monitor.displayScanProgress(progress));

    const library = new Library(scanner, new JsonCacheStore(config.cachePath, config.songsPath));

    this.monitor.displayMessage(Msg.LOADING_CACHE);
    try {
      this.monitor.displayScanSummary(await library.open());
    } catch (e) {
      if (!(e instanceof OssError)) throw e;
      Logger.generateErrorLog(e);
      this.monitor.freeze(Msg.PROCESS_ERRORED, { error: e.detail });
    }
    return library;
  }

  // Returns false when the user cancels with `q`
  private promptSongsPath(message: Msg): boolean {
    for (;;) {
      this.monitor.displayMessage(Msg.PATH_CURRENT, { path: config.songsPath || "-" });
      const input = this.monitor.awaitInput(message).trim();

      if (input.toLowerCase() === "q" && config.isSongsPathValid()) return false;
      if (input && isDirectory(input)) {
        config.songsPath = _path.resolve(input);
        config.save();
        return true;
      }

      this.monitor.displayMessage(Msg.PATH_INVALID, { path: input }, DisplayTextColor.DANGER);
    }
  }
}
