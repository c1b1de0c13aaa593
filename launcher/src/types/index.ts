export type LogLevel = "debug" | "info" | "warn" | "error";

export type RuntimeConfig = {
  app: string; // import path, "module:attribute"
  appDir: string;
  host: string;
  port: number;
  workers: number;
  factory: boolean;
  failFast: boolean;
  accessLog: boolean;
  shutdownTimeout: number; // ms before SIGKILL on stop
  logLevel: LogLevel;
};

export type SupervisorState = "not-started" | "running" | "stopped";

export type WorkerInstance = {
  id: number;
  pid?: number;
  startedAt: number;
  isReady: boolean;
  bootError?: string;
  status: "starting" | "running" | "stopping";
};

export type WorkerMessage =
  | { type: "ready"; pid: number }
  | { type: "boot-error"; pid: number; message: string };

export function isWorkerMessage(value: unknown): value is WorkerMessage {
  if (typeof value !== "object" || value === null) return false;
  const type: unknown = Reflect.get(value, "type");
  const pid: unknown = Reflect.get(value, "pid");
  if (typeof pid !== "number") return false;
  if (type === "ready") return true;
  return type === "boot-error" && typeof Reflect.get(value, "message") === "string";
}
