import { resolve } from "node:path";

import chalk from "chalk";
import ora from "ora";

import { readDataset, writeDataset } from "../../codec/index.js";
import { errorMessage } from "../../errors.js";
import {
  AirportIndex,
  OURAIRPORTS_URL,
  downloadAirports,
  enrichAirports,
} from "../../services/reference/index.js";
import {
  commandContext,
  loadFlights,
  parseDateOption,
  windowFromOptions,
} from "../utils/options.js";

import type { CalendarDate } from "../../types/index.js";
import type { Command } from "commander";

interface EnrichOptions {
  data?: string;
  airports?: string;
  after?: CalendarDate;
  before?: CalendarDate;
}

// ============================================================================
// Airport Reference Commands
// ============================================================================

export function registerAirportsCommand(program: Command): void {
  const airports = program
    .command("airports")
    .description("Airport reference data (OurAirports)");

  // airports enrich
  airports
    .command("enrich")
    .description("Fill missing airport names, codes and coordinates")
    .option("-d, --data <path>", "Flight log CSV (default from config)")
    .option("--airports <path>", "OurAirports CSV (default from config)")
    .option("--after <date>", "Only flights on or after this date (YYYY-MM-DD)", parseDateOption)
    .option("--before <date>", "Only flights on or before this date (YYYY-MM-DD)", parseDateOption)
    .action((options: EnrichOptions) => {
      const spinner = ora("Loading airport reference data...").start();

      try {
        const context = commandContext();
        const dataPath = resolve(options.data ?? context.config.dataPath);
        const airportsPath = resolve(options.airports ?? context.config.airportsPath);

        const reference = readDataset(airportsPath, context.schemaFor("airports"), {
          onDecodeError: "skip",
        });
        const index = AirportIndex.fromDataset(reference.dataset);

        spinner.text = `Matching against ${String(index.size)} airports...`;
        const dataset = loadFlights(context, dataPath);
        const result = enrichAirports(dataset, index, windowFromOptions(options));

        if (result.enriched > 0) {
          writeDataset(dataPath, result.dataset);
        }

        spinner.succeed(`${String(result.enriched)} flights enriched`);
        if (result.unmatched.length > 0) {
          console.log(
            chalk.yellow(`No reference entry for: ${result.unmatched.join(", ")}`)
          );
        }
      } catch (error) {
        spinner.fail(`Enrichment failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      }
    });

  // airports update
  airports
    .command("update")
    .description("Download the latest OurAirports table")
    .option("--airports <path>", "Destination CSV (default from config)")
    .option("--url <url>", "Source URL", OURAIRPORTS_URL)
    .action(async (options: { airports?: string; url: string }) => {
      const spinner = ora(`Downloading ${options.url}...`).start();

      try {
        const context = commandContext();
        const dest = resolve(options.airports ?? context.config.airportsPath);
        const result = await downloadAirports(context.schemaFor("airports"), dest, {
          url: options.url,
        });

        spinner.succeed(
          `Saved ${String(result.airports)} airports (${String(Math.round(result.bytes / 1024))} KiB) to ${dest}`
        );
      } catch (error) {
        spinner.fail(`Download failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      }
    });
}
