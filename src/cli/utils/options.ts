/**
 * Option parsing and dataset loading shared by the CLI commands
 */

import { existsSync } from "node:fs";

import { InvalidArgumentError } from "commander";

import {
  isValidCalendarDate,
  makeDate,
  readDataset,
  type DecodePolicy,
} from "../../codec/index.js";
import { getConfig, type Config } from "../../config.js";
import { Dataset } from "../../dataset/dataset.js";
import { loadSchema } from "../../schema/registry.js";

import type { CalendarDate, DateWindow, Dialect, Schema } from "../../types/index.js";

export function parseDateOption(value: string): CalendarDate {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  const year = Number(match?.[1]);
  const month = Number(match?.[2]);
  const day = Number(match?.[3]);
  if (match === null || !isValidCalendarDate(year, month, day)) {
    throw new InvalidArgumentError("Expected a date as YYYY-MM-DD.");
  }
  return makeDate(year, month, day);
}

/** `--after`/`--before` as a window, or undefined when neither is given */
export function windowFromOptions(options: {
  after?: CalendarDate;
  before?: CalendarDate;
}): DateWindow | undefined {
  return options.after !== undefined || options.before !== undefined
    ? { after: options.after, before: options.before }
    : undefined;
}

export function parseIntegerOption(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return parsed;
}

export function parseNumberOption(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Expected a non-negative number.");
  }
  return parsed;
}

export interface CommandContext {
  config: Config;
  schemaFor: (dialect: Dialect) => Schema;
}

export function commandContext(): CommandContext {
  const config = getConfig();
  const schemaDir = config.schemaDir ?? undefined;
  return {
    config,
    schemaFor: (dialect) => loadSchema(dialect, { schemaDir }),
  };
}

/**
 * Read the canonical dataset; a path that does not exist yet yields an
 * empty dataset.
 */
export function loadFlights(
  context: CommandContext,
  path: string,
  onDecodeError: DecodePolicy = "abort"
): Dataset {
  const schema = context.schemaFor("flights");
  if (!existsSync(path)) {
    return Dataset.empty(schema);
  }
  return readDataset(path, schema, { onDecodeError }).dataset;
}
