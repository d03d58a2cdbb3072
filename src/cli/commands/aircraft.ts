import { resolve } from "node:path";

import chalk from "chalk";
import ora from "ora";

import { readDataset, writeDataset } from "../../codec/index.js";
import { errorMessage } from "../../errors.js";
import { AircraftIndex, enrichAircraft } from "../../services/reference/index.js";
import {
  commandContext,
  loadFlights,
  parseDateOption,
  windowFromOptions,
} from "../utils/options.js";

import type { CalendarDate } from "../../types/index.js";
import type { Command } from "commander";

// ============================================================================
// Aircraft Reference Commands
// ============================================================================

interface EnrichOptions {
  data?: string;
  aircraft?: string;
  after?: CalendarDate;
  before?: CalendarDate;
}

export function registerAircraftCommand(program: Command): void {
  const aircraft = program
    .command("aircraft")
    .description("Aircraft type designators");

  // aircraft enrich
  aircraft
    .command("enrich")
    .description("Fill missing ICAO and IATA type codes from the aircraft model")
    .option("-d, --data <path>", "Flight log CSV (default from config)")
    .option("--aircraft <path>", "Type designator CSV (default from config)")
    .option("--after <date>", "Only flights on or after this date (YYYY-MM-DD)", parseDateOption)
    .option("--before <date>", "Only flights on or before this date (YYYY-MM-DD)", parseDateOption)
    .action((options: EnrichOptions) => {
      const spinner = ora("Loading aircraft reference data...").start();

      try {
        const context = commandContext();
        const dataPath = resolve(options.data ?? context.config.dataPath);
        const aircraftPath = resolve(options.aircraft ?? context.config.aircraftPath);

        const reference = readDataset(aircraftPath, context.schemaFor("aircraft"), {
          onDecodeError: "skip",
        });
        const index = AircraftIndex.fromDataset(reference.dataset);

        spinner.text = `Matching against ${String(index.size)} aircraft models...`;
        const dataset = loadFlights(context, dataPath);
        const result = enrichAircraft(dataset, index, windowFromOptions(options));

        if (result.enriched > 0) {
          writeDataset(dataPath, result.dataset);
        }

        spinner.succeed(`${String(result.enriched)} flights enriched`);
        if (result.unmatched.length > 0) {
          console.log(
            chalk.yellow(`No exact match for: ${result.unmatched.join(", ")}`)
          );
        }
      } catch (error) {
        spinner.fail(`Enrichment failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      }
    });
}
