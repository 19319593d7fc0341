import chalk from "chalk";
import { clear, log } from "console";
import promptSync from "prompt-sync";
import { formatMessage, Msg } from "../struct/Message";
import OssError from "../struct/OssError";
import { Constant } from "../struct/Constant";
import { setTerminalTitle } from "../util";
import { config } from "../state";
import type { BeatmapIndex } from "../struct/BeatmapIndex";
import type { DuplicateGroup } from "./DuplicateDetector";
import type { QueryMatch } from "./QueryEngine";
import type { ScanProgress, ScanSummary } from "./SongsScanner";
import Logger from "./Logger";

export enum DisplayTextColor {
  PRIMARY = "yellowBright",
  SECONDARY = "grey",
  DANGER = "red",
  SUCCESS = "green",
  WHITE = "white",
}

const painters: Record<DisplayTextColor, (text: string) => string> = {
  [DisplayTextColor.PRIMARY]: chalk.yellowBright,
  [DisplayTextColor.SECONDARY]: chalk.grey,
  [DisplayTextColor.DANGER]: chalk.red,
  [DisplayTextColor.SUCCESS]: chalk.green,
  [DisplayTextColor.WHITE]: chalk.white,
};

// Fixed-width cell, truncated with an ellipsis
export function cell(text: string, width: number): string {
  if (text.length > width) return text.slice(0, width - 1) + "…";
  return text.padEnd(width);
}

export default class Monitor {
  private prompt = promptSync({ sigint: true });

  constructor() {
    setTerminalTitle(Constant.AppName);
  }

  update(index: BeatmapIndex): void {
    clear();

    try {
      this.displayMessage(
        Msg.HEADER,
        {
          path: config.songsPath || "-",
          sets: index.size.toString(),
          charts: index.chartCount.toString(),
        },
        DisplayTextColor.PRIMARY
      );
      this.displayMessage(Msg.COMMANDS, {}, DisplayTextColor.SECONDARY);
    } catch (e) {
      throw new OssError("MESSAGE_GENERATION_FAILED", e);
    }
  }

  // Shows a warning and waits for the user before the screen is redrawn
  freeze(message: Msg, variable: Record<string, string> = {}): void {
    this.displayMessage(message, variable, DisplayTextColor.PRIMARY);
    this.awaitInput(Msg.FREEZE);
  }

  displayMessage(
    message: Msg,
    variable: Record<string, string> = {},
    color: DisplayTextColor = DisplayTextColor.WHITE
  ): void {
    log(painters[color](formatMessage(message, variable)));
  }

  awaitInput(
    message: Msg,
    variable: Record<string, string> = {},
    defaultValue = ""
  ): string {
    return this.prompt(formatMessage(message, variable) + " ", defaultValue);
  }

  // Rewrites a single line while the scan runs
  displayScanProgress(progress: ScanProgress): void {
    process.stdout.write(
      "\r\x1b[K" +
        formatMessage(Msg.SCANNING, {
          current: progress.current.toString(),
          total: progress.total.toString(),
          folder: cell(progress.currentFolder, 50).trimEnd(),
        })
    );
    if (progress.current === progress.total) process.stdout.write("\n");
  }

  displayScanSummary(summary: ScanSummary): void {
    this.displayMessage(
      Msg.SCAN_SUMMARY,
      {
        total: summary.total.toString(),
        parsed: summary.parsed.toString(),
        reused: summary.reused.toString(),
        omitted: summary.omitted.toString(),
        skipped: summary.skipped.toString(),
      },
      DisplayTextColor.SUCCESS
    );

    if (summary.warnings.length) {
      this.displayMessage(
        Msg.SCAN_WARNINGS,
        { count: summary.warnings.length.toString(), path: Logger.scanLogPath },
        DisplayTextColor.PRIMARY
      );
    }
  }

  displayMatches(matches: QueryMatch[]): void {
    this.displayMessage(Msg.TABLE_HEADER, {}, DisplayTextColor.PRIMARY);
    log(chalk.grey("-".repeat(80)));

    for (const { set, charts } of matches) {
      const first = set.charts[0];
      this.displayMessage(Msg.TABLE_ROW, {
        sid: cell(set.id ? set.id.toString() : "-", 8),
        artist: cell(first?.artist ?? "", 30),
        title: first?.title ?? "",
      });
      this.displayMessage(
        Msg.TABLE_CHARTS,
        { charts: charts.map((chart) => chart.difficultyName || chart.fileName).join(", ") },
        DisplayTextColor.SECONDARY
      );
    }

    this.displayMessage(Msg.TOTAL, { total: matches.length.toString() }, DisplayTextColor.SUCCESS);
  }

  displayDuplicates(groups: DuplicateGroup[]): void {
    if (!groups.length) {
      this.displayMessage(Msg.NO_DUPLICATES, {}, DisplayTextColor.SUCCESS);
      return;
    }

    groups.forEach((group, i) => {
      this.displayMessage(
        Msg.DUPLICATE_GROUP,
        {
          index: (i + 1).toString(),
          reason: group.reason === "beatmapSetId" ? "sid" : "unsubmitted",
          key: group.reason === "beatmapSetId" ? group.key : group.sets[0].charts[0].title,
          count: group.sets.length.toString(),
        },
        DisplayTextColor.PRIMARY
      );
      for (const set of group.sets) {
        this.displayMessage(Msg.DUPLICATE_ENTRY, {
          path: set.folderPath,
          charts: set.charts.length.toString(),
        });
      }
    });

    this.displayMessage(Msg.TOTAL, { total: groups.length.toString() }, DisplayTextColor.SUCCESS);
  }
}
