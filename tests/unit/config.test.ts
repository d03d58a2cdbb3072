import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

import { CONFIG_FILENAME, getConfig } from "../../src/config.js";
import { ConfigError } from "../../src/errors.js";

describe("config", () => {
  let cwd: string;
  let home: string;

  beforeEach(() => {
    cwd = mkdtempSync(join(tmpdir(), "flightlog-cwd-"));
    home = mkdtempSync(join(tmpdir(), "flightlog-home-"));
    vi.stubEnv("HOME", home);
    for (const name of [
      "FLIGHTLOG_GN_USERNAME",
      "FLIGHTLOG_DATA_PATH",
      "FLIGHTLOG_SCHEMA_DIR",
      "FLIGHTLOG_AIRPORTS_PATH",
      "FLIGHTLOG_AIRCRAFT_PATH",
      "GEONAMES_URL",
    ]) {
      vi.stubEnv(name, "");
    }
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    rmSync(cwd, { recursive: true, force: true });
    rmSync(home, { recursive: true, force: true });
  });

  it("should fall back to defaults without a config file", () => {
    const config = getConfig({ cwd });

    expect(config.source).toBeNull();
    expect(config.dataPath).toBe(join(cwd, "data/flights.csv"));
    expect(config.airportsPath).toBe(join(cwd, "data/airports.csv"));
    expect(config.aircraftPath).toBe(join(cwd, "data/aircraft.csv"));
    expect(config.schemaDir).toBeNull();
    expect(config.geonames).toEqual({
      username: null,
      url: "https://secure.geonames.org/timezoneJSON",
      timeoutMs: 10_000,
      maxRetries: 5,
      rateLimitMs: 1_000,
    });
    expect(config.validation).toEqual({
      distanceTolerance: 0.1,
      durationToleranceMinutes: 15,
    });
  });

  it("should read the config file in the working directory", () => {
    const path = join(cwd, CONFIG_FILENAME);
    writeFileSync(
      path,
      JSON.stringify({
        dataPath: "~/log/flights.csv",
        schemaDir: "schemas",
        geonames: { username: "test-user", rateLimitMs: 0 },
        validation: { distanceTolerance: 0.2 },
      })
    );

    const config = getConfig({ cwd });

    expect(config.source).toBe(path);
    expect(config.dataPath).toBe(join(home, "log/flights.csv"));
    expect(config.schemaDir).toBe(join(cwd, "schemas"));
    expect(config.geonames).toMatchObject({ username: "test-user", rateLimitMs: 0 });
    expect(config.validation.distanceTolerance).toBe(0.2);
  });

  it("should read the config file in the home directory", () => {
    const path = join(home, CONFIG_FILENAME);
    writeFileSync(path, JSON.stringify({ airportsPath: "/srv/airports.csv" }));

    const config = getConfig({ cwd });

    expect(config.source).toBe(path);
    expect(config.airportsPath).toBe("/srv/airports.csv");
  });

  it("should let environment variables override the file", () => {
    writeFileSync(
      join(cwd, CONFIG_FILENAME),
      JSON.stringify({ geonames: { username: "file-user" }, dataPath: "a.csv" })
    );
    vi.stubEnv("FLIGHTLOG_GN_USERNAME", "env-user");
    vi.stubEnv("FLIGHTLOG_DATA_PATH", "/srv/flights.csv");

    const config = getConfig({ cwd });

    expect(config.geonames.username).toBe("env-user");
    expect(config.dataPath).toBe("/srv/flights.csv");
  });

  it("should reject unknown settings", () => {
    writeFileSync(join(cwd, CONFIG_FILENAME), JSON.stringify({ dataPth: "a.csv" }));

    expect(() => getConfig({ cwd })).toThrow(ConfigError);
  });

  it("should reject a file that is not JSON", () => {
    const path = join(cwd, CONFIG_FILENAME);
    writeFileSync(path, "dataPath = a.csv");

    expect(() => getConfig({ cwd })).toThrow(`${path} is not valid JSON`);
  });
});
