#!/usr/bin/env -S node --import tsx
import cluster from "cluster";
import { readFileSync } from "fs";
import { resolve } from "path";
import { createClusterForker } from "./cluster-forker";
import { EXIT_CODES, LauncherError, describeError } from "./errors";
import { checkImageSpec, parseImageSpec, runtimeConfigOf } from "./image/image-spec";
import { Supervisor } from "./supervisor";
import { createLogger } from "./utils/logger";
import { loadConfig } from "./utils/read-config";
import { runWorker } from "./worker";

const rawArgs = process.argv.slice(2);

function checkImage(file: string): number {
  const logger = createLogger("check-image");
  const spec = parseImageSpec(readFileSync(resolve(file), "utf8"));
  const issues = checkImageSpec(spec);
  const config = issues.length === 0 ? runtimeConfigOf(spec) : undefined;

  if (config) {
    logger.info(`${file}: ${config.app} from ${config.appDir} on ${config.host}:${config.port}, ${config.workers} worker(s)`);
    return EXIT_CODES.ok;
  }

  for (const issue of issues) logger.warn(`${file}: ${issue.message}`);
  return EXIT_CODES.failure;
}

async function runPrimary(): Promise<number> {
  if (rawArgs[0] === "check-image") {
    return checkImage(rawArgs[1] ?? "Dockerfile");
  }

  const config = loadConfig({ argv: rawArgs });
  const logger = createLogger(`primary ${process.pid}`, { level: config.logLevel });
  const supervisor = new Supervisor(config, createClusterForker(), logger);

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}, shutting down`);
    supervisor.stop();
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  return supervisor.start();
}

if (cluster.isPrimary) {
  runPrimary().then(
    (code) => process.exit(code),
    (error: unknown) => {
      console.error(`[✗] ${describeError(error)}`);
      process.exit(error instanceof LauncherError ? error.exitCode : EXIT_CODES.failure);
    }
  );
} else {
  runWorker().catch((error: unknown) => {
    console.error(`[✗] worker ${process.pid}: ${describeError(error)}`);
    process.exit(error instanceof LauncherError ? error.exitCode : EXIT_CODES.bootError);
  });
}
