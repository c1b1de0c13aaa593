import { existsSync, readFileSync } from "fs";
import { dirname, isAbsolute, resolve } from "path";
import yaml from "yaml";
import yargs from "yargs-parser";
import { parseAppReference } from "../app-loader";
import { ConfigError } from "../errors";
import type { RuntimeConfig } from "../types";
import { isLogLevel } from "./logger";

export const DEFAULT_CONFIG_FILE = "launcher.yaml";
export const WORKER_CONFIG_ENV = "LAUNCHER_WORKER_CONFIG";

export const DEFAULTS = {
  host: "127.0.0.1",
  port: 8000,
  workers: 1,
  factory: false,
  failFast: false,
  accessLog: true,
  shutdownTimeout: 5000,
  logLevel: "info",
} satisfies Omit<RuntimeConfig, "app" | "appDir">;

type ConfigKey = keyof RuntimeConfig;

export type ConfigValues = Partial<Record<ConfigKey, unknown>>;

/** One source of configuration values, named for error messages. */
export type ConfigLayer = {
  source: string;
  values: ConfigValues;
};

const CONFIG_KEYS: readonly ConfigKey[] = [
  "app",
  "appDir",
  "host",
  "port",
  "workers",
  "factory",
  "failFast",
  "accessLog",
  "shutdownTimeout",
  "logLevel",
];

const CLI_FLAGS: Record<ConfigKey, string> = {
  app: "app",
  appDir: "app-dir",
  host: "host",
  port: "port",
  workers: "workers",
  factory: "factory",
  failFast: "fail-fast",
  accessLog: "access-log",
  shutdownTimeout: "shutdown-timeout",
  logLevel: "log-level",
};

const ENV_VARS: Record<ConfigKey, string> = {
  app: "LAUNCHER_APP",
  appDir: "LAUNCHER_APP_DIR",
  host: "LAUNCHER_HOST",
  port: "LAUNCHER_PORT",
  workers: "LAUNCHER_WORKERS",
  factory: "LAUNCHER_FACTORY",
  failFast: "LAUNCHER_FAIL_FAST",
  accessLog: "LAUNCHER_ACCESS_LOG",
  shutdownTimeout: "LAUNCHER_SHUTDOWN_TIMEOUT",
  logLevel: "LAUNCHER_LOG_LEVEL",
};

const BOOLEAN_KEYS: readonly ConfigKey[] = ["factory", "failFast", "accessLog"];

export type ParsedArgs = {
  positionals: string[];
  configFile?: string;
  layer: ConfigLayer;
};

function flagGiven(argv: string[], flag: string): boolean {
  return argv.some(
    (token) => token === `--${flag}` || token === `--no-${flag}` || token.startsWith(`--${flag}=`)
  );
}

/** Parses launcher arguments; values stay raw until {@link resolveConfig}. */
export function parseCliArgs(argv: string[]): ParsedArgs {
  const booleanFlags = BOOLEAN_KEYS.map((key) => CLI_FLAGS[key]);
  const args = yargs(argv, {
    alias: { p: "port", w: "workers", c: "config" },
    string: ["app", "app-dir", "host", "port", "workers", "shutdown-timeout", "log-level", "config"],
    boolean: booleanFlags,
    configuration: { "camel-case-expansion": false },
  });

  const positionals = args._.map(String);
  const values: ConfigValues = {};

  for (const key of CONFIG_KEYS) {
    const flag = CLI_FLAGS[key];
    // yargs-parser reports false for every declared boolean, given or not
    if (BOOLEAN_KEYS.includes(key) && !flagGiven(argv, flag)) continue;
    const value: unknown = args[flag];
    if (value !== undefined) values[key] = value;
  }

  const configFile: unknown = args.config;

  return {
    positionals,
    configFile: typeof configFile === "string" ? configFile : undefined,
    layer: { source: "command line", values },
  };
}

export function readEnv(env: NodeJS.ProcessEnv): ConfigLayer[] {
  const values: ConfigValues = {};
  for (const key of CONFIG_KEYS) {
    const value = env[ENV_VARS[key]];
    if (value !== undefined && value !== "") values[key] = value;
  }

  const layers: ConfigLayer[] = [{ source: "environment", values }];
  if (env.PORT) {
    layers.push({ source: "PORT", values: { port: env.PORT } });
  }
  return layers;
}

function pickKnown(record: object): ConfigValues {
  const values: ConfigValues = {};
  for (const key of CONFIG_KEYS) {
    const value: unknown = Reflect.get(record, key);
    if (value !== undefined && value !== null) values[key] = value;
  }
  return values;
}

export function readConfigFile(filePath: string): ConfigLayer {
  let parsed: unknown;
  try {
    parsed = yaml.parse(readFileSync(filePath, "utf8"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot read config file ${filePath}: ${reason}`);
  }

  if (parsed === null || parsed === undefined) {
    return { source: filePath, values: {} };
  }
  if (typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new ConfigError(`Config file ${filePath} must contain a mapping`);
  }

  const values = pickKnown(parsed);
  // app directories in a file are relative to the file
  if (typeof values.appDir === "string" && !isAbsolute(values.appDir)) {
    values.appDir = resolve(dirname(filePath), values.appDir);
  }
  return { source: filePath, values };
}

function pick(layers: ConfigLayer[], key: ConfigKey): { value: unknown; source: string } | undefined {
  for (const layer of layers) {
    const value = layer.values[key];
    if (value !== undefined) return { value, source: layer.source };
  }
  return undefined;
}

function display(value: unknown): string {
  return typeof value === "string" ? `"${value}"` : String(value);
}

function toInteger(value: unknown): number | undefined {
  if (typeof value === "number") return Number.isInteger(value) ? value : undefined;
  if (typeof value === "string" && /^\s*\d+\s*$/.test(value)) return Number(value);
  return undefined;
}

function toBoolean(value: unknown): boolean | undefined {
  if (typeof value === "boolean") return value;
  if (typeof value === "string") {
    const lowered = value.trim().toLowerCase();
    if (["1", "true", "yes", "on"].includes(lowered)) return true;
    if (["0", "false", "no", "off"].includes(lowered)) return false;
  }
  return undefined;
}

/**
 * Merges layers (highest precedence first) over the defaults and validates
 * every field. Throws {@link ConfigError} on the first invalid value.
 */
export function resolveConfig(layers: ConfigLayer[], cwd: string): RuntimeConfig {
  const invalid = (key: ConfigKey, found: { value: unknown; source: string }, expected: string) =>
    new ConfigError(`Invalid ${key} ${display(found.value)} (from ${found.source}): expected ${expected}`);

  const integer = (key: "port" | "workers" | "shutdownTimeout", min: number, max: number, fallback: number) => {
    const found = pick(layers, key);
    if (!found) return fallback;
    const value = toInteger(found.value);
    if (value === undefined || value < min || value > max) {
      throw invalid(key, found, max === Number.MAX_SAFE_INTEGER ? `an integer >= ${min}` : `an integer between ${min} and ${max}`);
    }
    return value;
  };

  const boolean = (key: "factory" | "failFast" | "accessLog", fallback: boolean) => {
    const found = pick(layers, key);
    if (!found) return fallback;
    const value = toBoolean(found.value);
    if (value === undefined) throw invalid(key, found, "true or false");
    return value;
  };

  const string = (key: "app" | "appDir" | "host") => {
    const found = pick(layers, key);
    if (!found) return undefined;
    if (typeof found.value !== "string" || found.value.trim() === "") {
      throw invalid(key, found, "a non-empty string");
    }
    return found.value.trim();
  };

  const app = string("app");
  if (app === undefined) {
    throw new ConfigError('Missing application import path, e.g. "main:app"');
  }
  parseAppReference(app);

  const logLevelFound = pick(layers, "logLevel");
  if (logLevelFound && !isLogLevel(logLevelFound.value)) {
    throw invalid("logLevel", logLevelFound, "one of debug, info, warn, error");
  }

  return {
    app,
    appDir: resolve(cwd, string("appDir") ?? "."),
    host: string("host") ?? DEFAULTS.host,
    port: integer("port", 1, 65535, DEFAULTS.port),
    workers: integer("workers", 1, Number.MAX_SAFE_INTEGER, DEFAULTS.workers),
    factory: boolean("factory", DEFAULTS.factory),
    failFast: boolean("failFast", DEFAULTS.failFast),
    accessLog: boolean("accessLog", DEFAULTS.accessLog),
    shutdownTimeout: integer("shutdownTimeout", 0, Number.MAX_SAFE_INTEGER, DEFAULTS.shutdownTimeout),
    logLevel: logLevelFound && isLogLevel(logLevelFound.value) ? logLevelFound.value : DEFAULTS.logLevel,
  };
}

export type LoadConfigOptions = {
  argv: string[];
  env?: NodeJS.ProcessEnv;
  cwd?: string;
};

/** Resolves the launcher configuration from arguments, environment and config file. */
export function loadConfig({ argv, env = process.env, cwd = process.cwd() }: LoadConfigOptions): RuntimeConfig {
  const parsed = parseCliArgs(argv);
  const layers: ConfigLayer[] = [parsed.layer];

  const [appArg, ...extra] = parsed.positionals;
  if (extra.length > 0) {
    throw new ConfigError(`Unexpected arguments: ${extra.join(" ")}`);
  }
  if (appArg !== undefined) {
    layers.unshift({ source: "command line", values: { app: appArg } });
  }

  layers.push(...readEnv(env));

  const explicitFile = parsed.configFile ?? env.LAUNCHER_CONFIG;
  if (explicitFile !== undefined && explicitFile !== "") {
    const filePath = resolve(cwd, explicitFile);
    if (!existsSync(filePath)) {
      throw new ConfigError(`Config file not found: ${filePath}`);
    }
    layers.push(readConfigFile(filePath));
  } else if (existsSync(resolve(cwd, DEFAULT_CONFIG_FILE))) {
    layers.push(readConfigFile(resolve(cwd, DEFAULT_CONFIG_FILE)));
  }

  return resolveConfig(layers, cwd);
}

export function serializeWorkerConfig(config: RuntimeConfig): Record<string, string> {
  return { [WORKER_CONFIG_ENV]: JSON.stringify(config) };
}

/** Reads the configuration a worker was forked with. */
export function readWorkerConfig(env: NodeJS.ProcessEnv, cwd: string = process.cwd()): RuntimeConfig {
  const raw = env[WORKER_CONFIG_ENV];
  if (raw === undefined) {
    throw new ConfigError(`${WORKER_CONFIG_ENV} is not set`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ConfigError(`${WORKER_CONFIG_ENV} is not valid JSON`);
  }
  if (typeof parsed !== "object" || parsed === null) {
    throw new ConfigError(`${WORKER_CONFIG_ENV} must be an object`);
  }

  return resolveConfig([{ source: "primary", values: pickKnown(parsed) }], cwd);
}
