import { resolve } from "node:path";

import chalk from "chalk";
import ora from "ora";

import { errorMessage } from "../../errors.js";
import {
  summarizeFindings,
  validateDataset,
} from "../../services/validation/index.js";
import {
  displayFindingsTable,
  displayValidationSummary,
} from "../utils/display.js";
import {
  commandContext,
  loadFlights,
  parseIntegerOption,
  parseNumberOption,
} from "../utils/options.js";

import type { Command } from "commander";

interface ValidateOptions {
  data?: string;
  distanceTolerance?: number;
  durationTolerance?: number;
  all?: boolean;
}

export function registerValidateCommand(program: Command): void {
  program
    .command("validate")
    .description("Check stored distances and durations against coordinates and timezones")
    .option("-d, --data <path>", "Flight log CSV (default from config)")
    .option(
      "--distance-tolerance <fraction>",
      "Allowed relative distance deviation, e.g. 0.1",
      parseNumberOption
    )
    .option(
      "--duration-tolerance <minutes>",
      "Allowed duration deviation in minutes",
      parseIntegerOption
    )
    .option("-a, --all", "Also list flights that could not be checked")
    .action((options: ValidateOptions) => {
      const spinner = ora("Validating flights...").start();

      try {
        const context = commandContext();
        const dataset = loadFlights(
          context,
          resolve(options.data ?? context.config.dataPath)
        );
        const findings = validateDataset(dataset, {
          distanceTolerance:
            options.distanceTolerance ?? context.config.validation.distanceTolerance,
          durationToleranceMinutes:
            options.durationTolerance ??
            context.config.validation.durationToleranceMinutes,
        });

        const shown =
          options.all === true
            ? findings
            : findings.filter((f) => f.severity !== "unvalidated");
        const errors = findings.filter((f) => f.severity === "error").length;

        if (errors > 0) {
          spinner.warn(`${String(errors)} inconsistencies in ${String(dataset.size)} flights`);
          process.exitCode = 1;
        } else {
          spinner.succeed(`Validated ${String(dataset.size)} flights`);
        }

        if (shown.length > 0) {
          displayFindingsTable(dataset, shown);
        }
        displayValidationSummary(summarizeFindings(findings, dataset.size));

        if (options.all !== true && shown.length < findings.length) {
          console.log(
            chalk.gray(
              `${String(findings.length - shown.length)} unvalidated findings hidden; use --all to list them`
            )
          );
        }
      } catch (error) {
        spinner.fail(`Validation failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      }
    });
}
