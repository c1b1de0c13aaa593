import cluster from "cluster";
import type { WorkerForker } from "./supervisor";

/**
 * Forks workers with the cluster module. The primary owns the listening
 * socket; workers calling `listen` on the same address share it. Each
 * worker re-runs the primary's entry script with the same node flags.
 */
export function createClusterForker(): WorkerForker {
  return {
    fork(env, events) {
      const worker = cluster.fork(env);
      worker.on("online", events.onOnline);
      worker.on("message", events.onMessage);
      worker.on("exit", events.onExit);

      return {
        id: worker.id,
        get pid() {
          return worker.process.pid;
        },
        kill: (signal) => {
          worker.process.kill(signal);
        },
      };
    },
  };
}
