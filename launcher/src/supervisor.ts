import { EXIT_CODES, describeError, type ExitCode } from "./errors";
import { isWorkerMessage, type RuntimeConfig, type SupervisorState, type WorkerInstance } from "./types";
import type { Logger } from "./utils/logger";
import { serializeWorkerConfig } from "./utils/read-config";

export type WorkerEvents = {
  onOnline: () => void;
  onMessage: (message: unknown) => void;
  onExit: (code: number | null, signal: string | null) => void;
};

export interface WorkerHandle {
  readonly id: number;
  readonly pid?: number;
  kill(signal: NodeJS.Signals): void;
}

/** Starts worker processes; the cluster module in production, a fake in tests. */
export interface WorkerForker {
  fork(env: Record<string, string>, events: WorkerEvents): WorkerHandle;
}

type TrackedWorker = {
  handle: WorkerHandle;
  instance: WorkerInstance;
};

export type SupervisorStatus = {
  state: SupervisorState;
  workers: number;
  live: number;
  ready: number;
  instances: WorkerInstance[];
};

/**
 * Runs `config.workers` worker processes serving one application on one
 * shared address. Workers are never restarted: a worker that dies during
 * startup takes the whole group down, one that dies later only does so with
 * `failFast`.
 */
export class Supervisor {
  private state: SupervisorState = "not-started";
  private workers = new Map<number, TrackedWorker>();
  private stopping = false;
  private allReadyAnnounced = false;
  private exitCode: ExitCode = EXIT_CODES.ok;
  private killTimer?: NodeJS.Timeout;
  private resolveStopped?: (code: ExitCode) => void;

  constructor(
    private readonly config: RuntimeConfig,
    private readonly forker: WorkerForker,
    private readonly logger: Logger
  ) {}

  private get address(): string {
    return `http://${this.config.host}:${this.config.port}`;
  }

  /** Forks every worker; resolves with the process exit code once stopped. */
  start(): Promise<ExitCode> {
    if (this.state !== "not-started") {
      throw new Error(`Supervisor is already ${this.state}`);
    }

    this.state = "running";
    const stopped = new Promise<ExitCode>((resolve) => {
      this.resolveStopped = resolve;
    });

    this.logger.info(`Starting ${this.config.workers} worker(s) for ${this.config.app} on ${this.address}`);

    for (let i = 0; i < this.config.workers; i++) {
      try {
        this.spawnWorker();
      } catch (error) {
        this.logger.error(`Failed to fork worker: ${describeError(error)}`);
        this.exitCode = EXIT_CODES.failure;
        this.stop();
        break;
      }
    }

    return stopped;
  }

  private spawnWorker(): void {
    const instance: WorkerInstance = {
      id: 0,
      startedAt: Date.now(),
      isReady: false,
      status: "starting",
    };

    const handle = this.forker.fork(serializeWorkerConfig(this.config), {
      onOnline: () => this.logger.debug(`Worker ${instance.id} online (pid ${instance.pid ?? "?"})`),
      onMessage: (message) => this.handleMessage(instance, message),
      onExit: (code, signal) => this.handleExit(instance, code, signal),
    });

    instance.id = handle.id;
    instance.pid = handle.pid;
    this.workers.set(handle.id, { handle, instance });
    this.logger.debug(`Forked worker ${handle.id} (pid ${handle.pid ?? "?"})`);
  }

  private handleMessage(instance: WorkerInstance, message: unknown): void {
    if (!isWorkerMessage(message)) {
      this.logger.debug(`Ignoring unknown message from worker ${instance.id}`);
      return;
    }

    instance.pid = message.pid;

    if (message.type === "boot-error") {
      instance.bootError = message.message;
      this.logger.error(`Worker ${instance.id} (pid ${message.pid}) failed to boot: ${message.message}`);
      return;
    }

    instance.isReady = true;
    instance.status = "running";
    this.logger.info(`Worker ${instance.id} ready (pid ${message.pid})`);

    if (!this.allReadyAnnounced && this.readyCount() === this.config.workers) {
      this.allReadyAnnounced = true;
      this.logger.info(`All ${this.config.workers} worker(s) serving on ${this.address}`);
    }
  }

  private handleExit(instance: WorkerInstance, code: number | null, signal: string | null): void {
    this.workers.delete(instance.id);
    const how = signal ? `signal ${signal}` : `code ${code ?? "?"}`;

    if (this.stopping) {
      this.logger.debug(`Worker ${instance.id} stopped (${how})`);
      if (this.workers.size === 0) this.finish();
      return;
    }

    if (!instance.isReady) {
      this.logger.error(`Worker ${instance.id} exited during startup (${how}), shutting down`);
      this.exitCode = EXIT_CODES.bootError;
      this.stop();
      return;
    }

    this.logger.warn(`Worker ${instance.id} (pid ${instance.pid ?? "?"}) exited unexpectedly (${how})`);

    if (this.config.failFast) {
      this.exitCode = EXIT_CODES.failure;
      this.stop();
      return;
    }

    if (this.workers.size === 0) {
      this.logger.error("No workers left, shutting down");
      this.exitCode = EXIT_CODES.failure;
      this.stop();
      return;
    }

    this.logger.info(`${this.workers.size} of ${this.config.workers} worker(s) still serving`);
  }

  /** Sends SIGTERM to every worker, then SIGKILL to any left after the shutdown timeout. */
  stop(): void {
    if (this.state === "not-started") {
      this.state = "stopped";
      return;
    }
    if (this.state === "stopped" || this.stopping) return;

    this.stopping = true;
    this.logger.info(`Stopping ${this.workers.size} worker(s)`);

    for (const { handle, instance } of this.workers.values()) {
      instance.status = "stopping";
      this.signal(handle, "SIGTERM");
    }

    if (this.workers.size === 0) {
      this.finish();
      return;
    }

    this.killTimer = setTimeout(() => {
      for (const { handle } of this.workers.values()) {
        this.logger.warn(`Worker ${handle.id} did not stop within ${this.config.shutdownTimeout}ms, killing`);
        this.signal(handle, "SIGKILL");
      }
    }, this.config.shutdownTimeout);
  }

  private signal(handle: WorkerHandle, signal: NodeJS.Signals): void {
    try {
      handle.kill(signal);
    } catch (error) {
      this.logger.error(`Error sending ${signal} to worker ${handle.id}: ${describeError(error)}`);
    }
  }

  private finish(): void {
    if (this.killTimer) clearTimeout(this.killTimer);
    this.state = "stopped";
    this.logger.info(`Stopped (exit code ${this.exitCode})`);
    this.resolveStopped?.(this.exitCode);
  }

  private readyCount(): number {
    let ready = 0;
    for (const { instance } of this.workers.values()) {
      if (instance.isReady) ready++;
    }
    return ready;
  }

  getStatus(): SupervisorStatus {
    const instances = [...this.workers.values()].map(({ instance }) => ({ ...instance }));
    return {
      state: this.state,
      workers: this.config.workers,
      live: instances.length,
      ready: instances.filter((i) => i.isReady).length,
      instances,
    };
  }
}
