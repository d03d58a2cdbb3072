import { existsSync } from "node:fs";
import { resolve } from "node:path";

import chalk from "chalk";

import { formatDate, isCalendarDate } from "../../codec/index.js";
import { errorMessage } from "../../errors.js";
import { findSideColumn } from "../../schema/columns.js";
import { displayKeyValues } from "../utils/display.js";
import { commandContext, loadFlights } from "../utils/options.js";

import type { Dataset } from "../../dataset/dataset.js";
import type { CalendarDate, ColumnDefinition, Side } from "../../types/index.js";
import type { Command } from "commander";

const SIDES: readonly Side[] = ["departure", "arrival"];

function dateRange(dataset: Dataset): string {
  const column = dataset.schema.windowColumn;
  if (column === null) return "-";

  const dates = dataset.rows
    .map((row) => row[column] ?? null)
    .filter((value): value is CalendarDate => isCalendarDate(value))
    .map(formatDate)
    .sort();
  const first = dates[0];
  const last = dates[dates.length - 1];
  return first !== undefined && last !== undefined ? `${first} … ${last}` : "-";
}

/** Rows where some side lacks the value tagged `provenance` */
function countMissing(dataset: Dataset, provenance: string): number {
  const columns = SIDES.map((side) =>
    findSideColumn(dataset.schema, side, provenance)
  ).filter((c): c is ColumnDefinition => c !== undefined);

  return dataset.rows.filter((row) =>
    columns.some((column) => (row[column.name] ?? null) === null)
  ).length;
}

export function registerStatusCommand(program: Command): void {
  program
    .command("status")
    .description("Summarize the flight log")
    .option("-d, --data <path>", "Flight log CSV (default from config)")
    .action((options: { data?: string }) => {
      try {
        const context = commandContext();
        const dataPath = resolve(options.data ?? context.config.dataPath);

        if (!existsSync(dataPath)) {
          console.log(chalk.yellow(`No flight log at ${dataPath}`));
          return;
        }

        const dataset = loadFlights(context, dataPath);
        displayKeyValues("Flight log", [
          ["File", dataPath],
          ["Flights", String(dataset.size)],
          ["Dates", dateRange(dataset)],
          ["Without coordinates", String(countMissing(dataset, "lat"))],
          ["Without timezone", String(countMissing(dataset, "tzid"))],
          ["Config", context.config.source ?? "(defaults)"],
        ]);
      } catch (error) {
        console.error(chalk.red(`Error: ${errorMessage(error)}`));
        process.exitCode = 1;
      }
    });
}
