import { resolve } from "node:path";

import chalk from "chalk";
import ora from "ora";

import { writeDataset } from "../../codec/index.js";
import { errorMessage } from "../../errors.js";
import { GeoNamesClient } from "../../scraper/geonames.js";
import { TimezoneResolver } from "../../services/timezones/index.js";
import {
  commandContext,
  loadFlights,
  parseIntegerOption,
} from "../utils/options.js";

import type { Command } from "commander";

// ============================================================================
// Timezones Command
// ============================================================================

interface TimezonesOptions {
  data?: string;
  username?: string;
  maxRows?: number;
  overwrite?: boolean;
}

async function promptUsername(): Promise<string> {
  const { input } = await import("@inquirer/prompts");
  return input({
    message: "GeoNames username:",
    validate: (value) => value.trim() !== "" || "A username is required",
  });
}

export function registerTimezonesCommand(program: Command): void {
  program
    .command("timezones")
    .alias("uptz")
    .description("Resolve missing timezones from airport coordinates (GeoNames)")
    .option("-d, --data <path>", "Flight log CSV (default from config)")
    .option("-u, --username <name>", "GeoNames username")
    .option(
      "-n, --max-rows <count>",
      "Update at most this many flights",
      parseIntegerOption
    )
    .option("--overwrite", "Re-resolve flights that already have timezones")
    .action(async (options: TimezonesOptions) => {
      try {
        const context = commandContext();
        const dataPath = resolve(options.data ?? context.config.dataPath);
        const username =
          options.username ?? context.config.geonames.username ?? (await promptUsername());

        const spinner = ora("Reading flights...").start();
        try {
          const dataset = loadFlights(context, dataPath);
          const { geonames } = context.config;
          const client = new GeoNamesClient({
            username,
            url: geonames.url,
            timeoutMs: geonames.timeoutMs,
            maxRetries: geonames.maxRetries,
            rateLimitMs: geonames.rateLimitMs,
          });
          const resolver = new TimezoneResolver(client, {
            maxRows: options.maxRows,
            overwrite: options.overwrite === true,
          });

          spinner.text = `Resolving timezones for ${String(dataset.size)} flights...`;
          const result = await resolver.resolve(dataset);

          if (result.resolvedRows > 0) {
            writeDataset(dataPath, result.dataset);
          }

          const summary = `${String(result.resolvedRows)} flights updated (${String(result.lookups)} lookups, ${String(result.cacheHits)} cached)`;
          if (result.stopped !== null) {
            spinner.warn(
              `${summary}; lookups stopped (${result.stopped}). ${String(result.unresolvedRows)} flights unresolved, rerun later`
            );
          } else {
            spinner.succeed(summary);
          }

          for (const failure of result.failures) {
            console.log(
              `  ${chalk.yellow("•")} (${String(failure.lat)}, ${String(failure.lon)}): ${failure.error}`
            );
          }
          if (result.stopped === null && result.unresolvedRows > 0) {
            console.log(chalk.gray(`${String(result.unresolvedRows)} flights remain without a timezone`));
          }
        } catch (error) {
          spinner.fail(`Timezone resolution failed: ${errorMessage(error)}`);
          process.exitCode = 1;
        }
      } catch (error) {
        console.error(chalk.red(`Error: ${errorMessage(error)}`));
        process.exitCode = 1;
      }
    });
}
