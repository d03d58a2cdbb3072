#!/usr/bin/env node

/**
 * flightlog CLI
 *
 * Maintains a personal flight log: merges scraped flights, fills airport
 * and timezone data, validates distances and durations, and exports to
 * OpenFlights and MyFlightPath.
 */

import { Command } from "commander";

import { registerAircraftCommand } from "./commands/aircraft.js";
import { registerAirportsCommand } from "./commands/airports.js";
import { registerExportCommand } from "./commands/export.js";
import { registerMergeCommand } from "./commands/merge.js";
import { registerStatusCommand } from "./commands/status.js";
import { registerTimezonesCommand } from "./commands/timezones.js";
import { registerValidateCommand } from "./commands/validate.js";

const program = new Command();

program
  .name("flightlog")
  .description("Flight log merge, enrichment, validation and export")
  .version("0.4.0");

// Register all commands
registerMergeCommand(program);
registerAirportsCommand(program);
registerAircraftCommand(program);
registerTimezonesCommand(program);
registerValidateCommand(program);
registerExportCommand(program);
registerStatusCommand(program);

program.action(() => {
  // Show help by default
  program.outputHelp();
});

await program.parseAsync();
