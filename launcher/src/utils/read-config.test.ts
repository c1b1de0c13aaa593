import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigError } from "../errors";
import {
  DEFAULTS,
  WORKER_CONFIG_ENV,
  loadConfig,
  parseCliArgs,
  readWorkerConfig,
  resolveConfig,
  serializeWorkerConfig,
} from "./read-config";

describe("parseCliArgs", () => {
  it("collects the application and raw flag values", () => {
    const parsed = parseCliArgs(["main:app", "--host", "0.0.0.0", "-p", "9000", "-w", "4", "--fail-fast"]);

    expect(parsed.positionals).toEqual(["main:app"]);
    expect(parsed.layer.values).toEqual({ host: "0.0.0.0", port: "9000", workers: "4", failFast: true });
  });

  it("leaves booleans unset unless given", () => {
    expect(parseCliArgs(["main:app"]).layer.values).toEqual({});
    expect(parseCliArgs(["--no-access-log"]).layer.values).toEqual({ accessLog: false });
  });

  it("reads the config file option", () => {
    expect(parseCliArgs(["-c", "prod.yaml"]).configFile).toBe("prod.yaml");
  });
});

describe("resolveConfig", () => {
  const resolveFrom = (values: Record<string, unknown>) =>
    resolveConfig([{ source: "test", values: { app: "main:app", ...values } }], "/srv");

  it("fills in defaults", () => {
    expect(resolveFrom({})).toEqual({ ...DEFAULTS, app: "main:app", appDir: "/srv" });
  });

  it("takes the first layer that sets a value", () => {
    const config = resolveConfig(
      [
        { source: "command line", values: { port: "9000" } },
        { source: "environment", values: { port: "7000", workers: "3" } },
        { source: "file", values: { app: "main:app", workers: 8, host: "0.0.0.0" } },
      ],
      "/srv"
    );

    expect(config).toMatchObject({ port: 9000, workers: 3, host: "0.0.0.0", app: "main:app" });
  });

  it("accepts the whole port range", () => {
    expect(resolveFrom({ port: "1" }).port).toBe(1);
    expect(resolveFrom({ port: 65535 }).port).toBe(65535);
  });

  it.each([["0"], ["65536"], ["80.5"], ["http"], [-1], [""]])("rejects port %j", (port) => {
    expect(() => resolveFrom({ port })).toThrow(ConfigError);
  });

  it.each([["0"], ["-2"], [1.5], ["many"]])("rejects workers %j", (workers) => {
    expect(() => resolveFrom({ workers })).toThrow(ConfigError);
  });

  it("names the offending value and its source", () => {
    expect(() => resolveFrom({ port: "99999" })).toThrow(
      'Invalid port "99999" (from test): expected an integer between 1 and 65535'
    );
  });

  it("parses boolean strings", () => {
    expect(resolveFrom({ failFast: "yes", accessLog: "0" })).toMatchObject({ failFast: true, accessLog: false });
    expect(() => resolveFrom({ factory: "maybe" })).toThrow("expected true or false");
  });

  it("requires a well-formed application import path", () => {
    expect(() => resolveConfig([], "/srv")).toThrow('Missing application import path, e.g. "main:app"');
    expect(() => resolveFrom({ app: "main" })).toThrow('must be in format "<module>:<attribute>"');
  });

  it("rejects unknown log levels and empty hosts", () => {
    expect(() => resolveFrom({ logLevel: "verbose" })).toThrow("one of debug, info, warn, error");
    expect(() => resolveFrom({ host: "  " })).toThrow("expected a non-empty string");
  });
});

describe("loadConfig", () => {
  let cwd: string;

  beforeEach(() => {
    cwd = mkdtempSync(join(tmpdir(), "launcher-config-"));
  });

  afterEach(() => {
    rmSync(cwd, { recursive: true, force: true });
  });

  it("prefers the command line over the environment", () => {
    const config = loadConfig({
      argv: ["main:app", "--port", "9000"],
      env: { LAUNCHER_PORT: "7000", LAUNCHER_WORKERS: "3", PORT: "6000" },
      cwd,
    });

    expect(config).toMatchObject({ app: "main:app", port: 9000, workers: 3, appDir: cwd });
  });

  it("falls back to PORT after the LAUNCHER_ variables", () => {
    expect(loadConfig({ argv: ["main:app"], env: { PORT: "6000" }, cwd }).port).toBe(6000);
  });

  it("reads launcher.yaml from the working directory", () => {
    mkdirSync(join(cwd, "src"));
    writeFileSync(join(cwd, "launcher.yaml"), "app: main:app\nappDir: src\nworkers: 4\nfailFast: true\n");

    expect(loadConfig({ argv: [], env: {}, cwd })).toMatchObject({
      app: "main:app",
      appDir: join(cwd, "src"),
      workers: 4,
      failFast: true,
    });
  });

  it("lets flags override the file", () => {
    writeFileSync(join(cwd, "custom.yaml"), "app: main:app\nworkers: 4\n");

    const config = loadConfig({ argv: ["-c", "custom.yaml", "-w", "2"], env: {}, cwd });

    expect(config.workers).toBe(2);
  });

  it("fails on a missing explicit config file", () => {
    expect(() => loadConfig({ argv: ["main:app", "-c", "nope.yaml"], env: {}, cwd })).toThrow(
      `Config file not found: ${join(cwd, "nope.yaml")}`
    );
  });

  it("rejects a config file that is not a mapping", () => {
    writeFileSync(join(cwd, "launcher.yaml"), "- main:app\n");

    expect(() => loadConfig({ argv: [], env: {}, cwd })).toThrow("must contain a mapping");
  });

  it("rejects extra positional arguments", () => {
    expect(() => loadConfig({ argv: ["main:app", "other:app"], env: {}, cwd })).toThrow(
      "Unexpected arguments: other:app"
    );
  });
});

describe("worker configuration", () => {
  it("survives the trip through the environment", () => {
    const config = resolveConfig([{ source: "test", values: { app: "main:app", workers: 4 } }], "/srv");

    expect(readWorkerConfig(serializeWorkerConfig(config), "/elsewhere")).toEqual(config);
  });

  it("requires the variable to be set", () => {
    expect(() => readWorkerConfig({})).toThrow(`${WORKER_CONFIG_ENV} is not set`);
  });

  it("re-validates what it receives", () => {
    expect(() => readWorkerConfig({ [WORKER_CONFIG_ENV]: JSON.stringify({ app: "main:app", port: 0 }) })).toThrow(
      ConfigError
    );
  });
});
