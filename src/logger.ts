import "dotenv/config";

import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

import pino, { type DestinationStream, type LoggerOptions } from "pino";

const LOG_LEVEL = process.env.LOG_LEVEL ?? "info";
const LOG_FILE = process.env.LOG_FILE;

// Build the destination stream
function createDestination(): DestinationStream | undefined {
  if (LOG_FILE === undefined || LOG_FILE === "") {
    return undefined;
  }

  // Ensure log directory exists
  const logDir = dirname(LOG_FILE);
  if (logDir !== "." && !existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  // stderr keeps CLI output on stdout clean; the file gets everything
  const streams: pino.StreamEntry[] = [
    { level: LOG_LEVEL as pino.Level, stream: process.stderr },
    {
      level: LOG_LEVEL as pino.Level,
      stream: pino.destination({
        dest: LOG_FILE,
        sync: false,
      }),
    },
  ];

  return pino.multistream(streams) as DestinationStream;
}

const destination = createDestination();

// Base logger options
export const loggerOptions: LoggerOptions = {
  level: LOG_LEVEL,
};

// Create the main logger
export const logger =
  destination !== undefined
    ? pino(loggerOptions, destination)
    : pino(loggerOptions, pino.destination(2));

// Child loggers for different modules
export const schemaLogger = logger.child({ module: "schema" });
export const codecLogger = logger.child({ module: "codec" });
export const mergeLogger = logger.child({ module: "merge" });
export const tzLogger = logger.child({ module: "timezones" });
export const apiLogger = logger.child({ module: "geonames" });
export const validationLogger = logger.child({ module: "validation" });
export const exportLogger = logger.child({ module: "export" });
export const referenceLogger = logger.child({ module: "reference" });

// Log startup info
if (LOG_FILE !== undefined && LOG_FILE !== "") {
  logger.info(
    { logFile: LOG_FILE, logLevel: LOG_LEVEL },
    "Logging to file enabled"
  );
}
