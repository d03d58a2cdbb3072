import { resolve } from "node:path";

import chalk from "chalk";
import ora from "ora";

import { readDataset, writeDataset } from "../../codec/index.js";
import { errorMessage } from "../../errors.js";
import { mergeDatasets } from "../../services/merge/index.js";
import {
  commandContext,
  loadFlights,
  parseDateOption,
  windowFromOptions,
} from "../utils/options.js";

import type { CalendarDate } from "../../types/index.js";
import type { Command } from "commander";

// ============================================================================
// Merge Command
// ============================================================================

interface MergeOptions {
  data?: string;
  after?: CalendarDate;
  before?: CalendarDate;
  skipInvalid?: boolean;
  out?: string;
}

export function registerMergeCommand(program: Command): void {
  program
    .command("merge <incoming>")
    .alias("upcsv")
    .description("Merge newly scraped flights (CSV) into the flight log")
    .option("-d, --data <path>", "Flight log CSV (default from config)")
    .option(
      "--after <date>",
      "Replace existing flights on or after this date (YYYY-MM-DD)",
      parseDateOption
    )
    .option(
      "--before <date>",
      "Replace existing flights on or before this date (YYYY-MM-DD)",
      parseDateOption
    )
    .option("--skip-invalid", "Skip incoming rows that fail to decode")
    .option("-o, --out <path>", "Write the result here instead of --data")
    .addHelpText(
      "after",
      `
With --after and/or --before, every existing flight in that date range is
removed before the incoming flights are added, even if no incoming flight
replaces it. Outside the range, incoming flights replace existing flights
with the same key and are otherwise appended.`
    )
    .action((incoming: string, options: MergeOptions) => {
      const spinner = ora("Reading flights...").start();

      try {
        const context = commandContext();
        const dataPath = resolve(options.data ?? context.config.dataPath);
        const outPath = resolve(options.out ?? dataPath);
        const schema = context.schemaFor("flights");

        const existing = loadFlights(context, dataPath);
        const batch = readDataset(resolve(incoming), schema, {
          onDecodeError: options.skipInvalid === true ? "skip" : "abort",
        });

        spinner.text = `Merging ${String(batch.dataset.size)} flights into ${String(existing.size)}...`;

        const result = mergeDatasets(existing, batch.dataset, windowFromOptions(options));

        writeDataset(outPath, result.dataset);

        spinner.succeed(
          `Merged: ${String(result.inserted)} added, ${String(result.replaced)} replaced, ${String(result.removed)} removed → ${String(result.dataset.size)} flights`
        );
        if (batch.skipped.length > 0) {
          console.log(chalk.yellow(`\n${String(batch.skipped.length)} incoming rows skipped:`));
          for (const error of batch.skipped) {
            console.log(`  ${chalk.gray("•")} ${error.message}`);
          }
        }
        console.log(chalk.gray(`Written to ${outPath}`));
      } catch (error) {
        spinner.fail(`Merge failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      }
    });
}
