/**
 * Display utilities for CLI output formatting
 */

import chalk from "chalk";
import CliTable3 from "cli-table3";

import { encodeValue } from "../../codec/index.js";
import { findSideColumn } from "../../schema/columns.js";

import type { Dataset } from "../../dataset/dataset.js";
import type { ExportError } from "../../errors.js";
import type { ColumnDefinition } from "../../types/index.js";
import type {
  Check,
  CheckSummary,
  Finding,
  Severity,
} from "../../services/validation/validator.js";

const SEVERITY_COLORS: Record<Severity, (text: string) => string> = {
  error: chalk.red,
  warning: chalk.yellow,
  unvalidated: chalk.gray,
};

/**
 * Short description of a flight row for tables: date and route
 */
export function describeRow(dataset: Dataset, rowIndex: number): string {
  const row = dataset.rows[rowIndex];
  if (row === undefined) return `#${String(rowIndex)}`;

  const text = (column: ColumnDefinition | undefined): string =>
    column !== undefined ? encodeValue(row[column.name] ?? null, column) : "";

  const { schema } = dataset;
  const date = text(
    schema.columns.find((c) => c.name === schema.windowColumn)
  );
  const from = text(findSideColumn(schema, "departure", "iata")) || "?";
  const to = text(findSideColumn(schema, "arrival", "iata")) || "?";
  const route = `${from}→${to}`;
  return `${date} ${route}`.trim();
}

/**
 * Display validation findings in a formatted table
 */
export function displayFindingsTable(dataset: Dataset, findings: Finding[]): void {
  const table = new CliTable3({
    head: [
      chalk.cyan("Row"),
      chalk.cyan("Flight"),
      chalk.cyan("Check"),
      chalk.cyan("Severity"),
      chalk.cyan("Message"),
    ],
    colWidths: [6, 24, 10, 13, 60],
    wordWrap: true,
  });

  for (const finding of findings) {
    table.push([
      String(finding.rowIndex + 1),
      describeRow(dataset, finding.rowIndex),
      finding.check,
      SEVERITY_COLORS[finding.severity](finding.severity),
      finding.message,
    ]);
  }

  console.log(table.toString());
}

export function displayValidationSummary(
  summary: Record<Check, CheckSummary>
): void {
  const table = new CliTable3({
    head: [
      chalk.cyan("Check"),
      chalk.cyan("Consistent"),
      chalk.cyan("Inconsistent"),
      chalk.cyan("Unvalidated"),
    ],
  });

  for (const [check, counts] of Object.entries(summary)) {
    table.push([
      check,
      chalk.green(String(counts.consistent)),
      counts.inconsistent > 0 ? chalk.red(String(counts.inconsistent)) : "0",
      chalk.gray(String(counts.unvalidated)),
    ]);
  }

  console.log(table.toString());
}

export function displayExcluded(excluded: ExportError[]): void {
  if (excluded.length === 0) return;

  console.log(chalk.yellow(`\n${String(excluded.length)} rows excluded:`));
  for (const error of excluded) {
    console.log(`  ${chalk.gray("•")} ${error.message}`);
  }
}

/**
 * Display key/value pairs, e.g. dataset status
 */
export function displayKeyValues(title: string, entries: [string, string][]): void {
  console.log(chalk.bold(`\n${title}\n`));
  const width = Math.max(...entries.map(([key]) => key.length));
  for (const [key, value] of entries) {
    console.log(`  ${chalk.cyan(key.padEnd(width))}  ${value}`);
  }
  console.log();
}
