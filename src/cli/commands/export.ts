import { dirname, join, resolve } from "node:path";

import chalk from "chalk";
import { InvalidArgumentError } from "commander";
import ora from "ora";

import { writeRecords } from "../../codec/index.js";
import { errorMessage } from "../../errors.js";
import { exportDataset } from "../../services/export/index.js";
import { filterByWindow } from "../../services/merge/index.js";
import {
  EXPORT_DIALECTS,
  type CalendarDate,
  type ExportDialect,
} from "../../types/index.js";
import { displayExcluded } from "../utils/display.js";
import {
  commandContext,
  loadFlights,
  parseDateOption,
  windowFromOptions,
} from "../utils/options.js";

import type { Command } from "commander";

interface ExportOptions {
  data?: string;
  out?: string;
  after?: CalendarDate;
  before?: CalendarDate;
}

function parseFormat(value: string): ExportDialect {
  const format = EXPORT_DIALECTS.find((d) => d === value.toLowerCase());
  if (format === undefined) {
    throw new InvalidArgumentError(
      `Expected one of: ${EXPORT_DIALECTS.join(", ")}.`
    );
  }
  return format;
}

export function registerExportCommand(program: Command): void {
  program
    .command("export <format>")
    .description(`Export the flight log for import elsewhere (${EXPORT_DIALECTS.join(", ")})`)
    .option("-d, --data <path>", "Flight log CSV (default from config)")
    .option("-o, --out <path>", "Output file (default: <format>.csv beside the flight log)")
    .option("--after <date>", "Only flights on or after this date (YYYY-MM-DD)", parseDateOption)
    .option("--before <date>", "Only flights on or before this date (YYYY-MM-DD)", parseDateOption)
    .action((formatArg: string, options: ExportOptions) => {
      const spinner = ora("Exporting flights...").start();

      try {
        const format = parseFormat(formatArg);
        const context = commandContext();
        const dataPath = resolve(options.data ?? context.config.dataPath);
        const outPath = resolve(options.out ?? join(dirname(dataPath), `${format}.csv`));

        const flights = loadFlights(context, dataPath);
        const window = windowFromOptions(options);
        const dataset = window !== undefined ? filterByWindow(flights, window) : flights;
        const target = context.schemaFor(format);
        const result = exportDataset(dataset, target);

        writeRecords(outPath, result.header, result.records, target);

        spinner.succeed(
          `Exported ${String(result.records.length)} of ${String(dataset.size)} flights to ${format}`
        );
        displayExcluded(result.excluded);
        console.log(chalk.gray(`Written to ${outPath}`));
      } catch (error) {
        spinner.fail(`Export failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      }
    });
}
