import { createServer, type RequestListener, type Server } from "http";
import { loadApp } from "./app-loader";
import { EXIT_CODES, LauncherError, describeError } from "./errors";
import type { RuntimeConfig, WorkerMessage } from "./types";
import { createLogger, type Logger } from "./utils/logger";
import { readWorkerConfig } from "./utils/read-config";

export type Notify = (message: WorkerMessage) => void;

/** Wraps a handler so each finished response gets one access log line. */
export function withAccessLog(listener: RequestListener, logger: Logger): RequestListener {
  return (req, res) => {
    res.on("finish", () => {
      const client = `${req.socket.remoteAddress ?? "-"}:${req.socket.remotePort ?? "-"}`;
      logger.info(`${client} - "${req.method} ${req.url} HTTP/${req.httpVersion}" ${res.statusCode}`);
    });
    listener(req, res);
  };
}

function listen(server: Server, port: number, host: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (error: Error) => reject(error);
    server.once("error", onError);
    server.listen(port, host, () => {
      server.off("error", onError);
      resolve();
    });
  });
}

export function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
    server.closeIdleConnections();
  });
}

/**
 * Loads the application once, then serves it on the configured address.
 * Inside a cluster worker the listening socket is owned by the primary and
 * shared by every worker.
 */
export async function startWorker(config: RuntimeConfig, notify: Notify, logger: Logger): Promise<Server> {
  const listener = await loadApp(config.app, { appDir: config.appDir, factory: config.factory });
  const server = createServer(config.accessLog ? withAccessLog(listener, logger) : listener);

  await listen(server, config.port, config.host);
  logger.debug(`Serving ${config.app} on ${config.host}:${config.port}`);
  notify({ type: "ready", pid: process.pid });
  return server;
}

function send(message: WorkerMessage): Promise<void> {
  return new Promise((resolve) => {
    if (!process.send) {
      resolve();
      return;
    }
    process.send(message, undefined, undefined, () => resolve());
  });
}

/** Entry point for a forked worker process. */
export async function runWorker(): Promise<void> {
  const config = readWorkerConfig(process.env);
  const logger = createLogger(`worker ${process.pid}`, { level: config.logLevel });

  let server: Server;
  try {
    server = await startWorker(config, (message) => void send(message), logger);
  } catch (error) {
    logger.error(`Failed to start: ${describeError(error)}`);
    await send({ type: "boot-error", pid: process.pid, message: describeError(error) });
    process.exit(error instanceof LauncherError ? error.exitCode : EXIT_CODES.bootError);
  }

  const shutdown = (signal: NodeJS.Signals) => {
    logger.debug(`Received ${signal}, closing server`);
    closeServer(server).then(
      () => process.exit(EXIT_CODES.ok),
      (error: unknown) => {
        logger.error(`Failed to close server: ${describeError(error)}`);
        process.exit(EXIT_CODES.failure);
      }
    );
  };

  process.once("SIGTERM", shutdown);
  process.once("SIGINT", shutdown);
}
