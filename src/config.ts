/**
 * Configuration
 *
 * Priority (highest first):
 * 1. Environment variables (also read from .env)
 * 2. .flightlogrc JSON file, in the working directory, else the home directory
 * 3. Defaults
 */

import "dotenv/config";

import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join, resolve } from "node:path";

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { ConfigError, errorMessage } from "./errors.js";
import { logger } from "./logger.js";
import { GEONAMES_DEFAULTS } from "./scraper/geonames.js";
import { VALIDATION_DEFAULTS } from "./services/validation/validator.js";

export const CONFIG_FILENAME = ".flightlogrc";

// ============================================================================
// Schema
// ============================================================================

export const ConfigFileSchema = Type.Object(
  {
    geonames: Type.Optional(
      Type.Object(
        {
          username: Type.Optional(Type.String()),
          url: Type.Optional(Type.String()),
          timeoutMs: Type.Optional(Type.Integer({ minimum: 1 })),
          maxRetries: Type.Optional(Type.Integer({ minimum: 0 })),
          rateLimitMs: Type.Optional(Type.Integer({ minimum: 0 })),
        },
        { additionalProperties: false }
      )
    ),
    dataPath: Type.Optional(Type.String()),
    airportsPath: Type.Optional(Type.String()),
    aircraftPath: Type.Optional(Type.String()),
    schemaDir: Type.Optional(Type.String()),
    validation: Type.Optional(
      Type.Object(
        {
          distanceTolerance: Type.Optional(Type.Number({ minimum: 0 })),
          durationToleranceMinutes: Type.Optional(Type.Number({ minimum: 0 })),
        },
        { additionalProperties: false }
      )
    ),
  },
  { additionalProperties: false }
);

export type ConfigFile = Static<typeof ConfigFileSchema>;

export interface Config {
  geonames: {
    username: string | null;
    url: string;
    timeoutMs: number;
    maxRetries: number;
    rateLimitMs: number;
  };
  dataPath: string;
  airportsPath: string;
  aircraftPath: string;
  schemaDir: string | null;
  validation: {
    distanceTolerance: number;
    durationToleranceMinutes: number;
  };
  /** File the settings were read from, if any */
  source: string | null;
}

// ============================================================================
// Loading
// ============================================================================

export function findConfigFile(cwd = process.cwd()): string | null {
  const candidates = [join(cwd, CONFIG_FILENAME), join(homedir(), CONFIG_FILENAME)];
  return candidates.find((path) => existsSync(path)) ?? null;
}

export function parseConfigFile(content: string, path: string): ConfigFile {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`${path} is not valid JSON: ${errorMessage(error)}`);
  }

  if (!Value.Check(ConfigFileSchema, parsed)) {
    const errors = [...Value.Errors(ConfigFileSchema, parsed)].map((e) => ({
      path: e.path,
      message: e.message,
    }));
    throw new ConfigError(
      `Invalid configuration in ${path}: ${errors
        .map((e) => `${e.path} ${e.message}`)
        .join("; ")}`,
      { errors }
    );
  }
  return parsed;
}

function envValue(name: string): string | undefined {
  const value = process.env[name];
  return value === undefined || value === "" ? undefined : value;
}

function expandHome(path: string): string {
  return path.startsWith("~/") ? join(homedir(), path.slice(2)) : path;
}

/**
 * Resolve the effective configuration.
 */
export function getConfig(options: { cwd?: string; file?: string } = {}): Config {
  const cwd = options.cwd ?? process.cwd();
  const source = options.file ?? findConfigFile(cwd);
  const file: ConfigFile =
    source !== null ? parseConfigFile(readFileSync(source, "utf-8"), source) : {};

  const dataPath =
    envValue("FLIGHTLOG_DATA_PATH") ?? file.dataPath ?? "data/flights.csv";
  const airportsPath =
    envValue("FLIGHTLOG_AIRPORTS_PATH") ?? file.airportsPath ?? "data/airports.csv";
  const aircraftPath =
    envValue("FLIGHTLOG_AIRCRAFT_PATH") ?? file.aircraftPath ?? "data/aircraft.csv";
  const schemaDir = envValue("FLIGHTLOG_SCHEMA_DIR") ?? file.schemaDir;

  const config: Config = {
    geonames: {
      username: envValue("FLIGHTLOG_GN_USERNAME") ?? file.geonames?.username ?? null,
      url: envValue("GEONAMES_URL") ?? file.geonames?.url ?? GEONAMES_DEFAULTS.url,
      timeoutMs: file.geonames?.timeoutMs ?? GEONAMES_DEFAULTS.timeoutMs,
      maxRetries: file.geonames?.maxRetries ?? GEONAMES_DEFAULTS.maxRetries,
      rateLimitMs: file.geonames?.rateLimitMs ?? GEONAMES_DEFAULTS.rateLimitMs,
    },
    dataPath: resolve(cwd, expandHome(dataPath)),
    airportsPath: resolve(cwd, expandHome(airportsPath)),
    aircraftPath: resolve(cwd, expandHome(aircraftPath)),
    schemaDir: schemaDir !== undefined ? resolve(cwd, expandHome(schemaDir)) : null,
    validation: {
      distanceTolerance:
        file.validation?.distanceTolerance ?? VALIDATION_DEFAULTS.distanceTolerance,
      durationToleranceMinutes:
        file.validation?.durationToleranceMinutes ??
        VALIDATION_DEFAULTS.durationToleranceMinutes,
    },
    source,
  };

  logger.debug(
    { source, dataPath: config.dataPath, schemaDir: config.schemaDir },
    "Configuration loaded"
  );

  return config;
}
