import os from "os";
import yargs from "yargs-parser";
import { SERVICE_NAME, app, instanceId, startedAt } from "./index";

const rawArgs = process.argv.slice(2);
const args = yargs(rawArgs, {
  alias: { p: "port" },
  string: ["host"],
  configuration: { "camel-case-expansion": false },
});

const portRaw: unknown = args.port ?? args._[0] ?? 8000;
const port = typeof portRaw === "string" ? parseInt(portRaw, 10) : Number(portRaw);
const hostRaw: unknown = args.host;
const host = typeof hostRaw === "string" && hostRaw !== "" ? hostRaw : "0.0.0.0";

if (!Number.isInteger(port) || port < 1 || port > 65535) {
  console.error(`[!] Invalid port: ${String(portRaw)}`);
  process.exit(2);
}

// Fancy logging
const green = "\x1b[32m";
const reset = "\x1b[0m";
const cyan = "\x1b[36m";
const gray = "\x1b[90m";

app.listen(port, host, () => {
  console.log(
    `${green}[✅ Spawned]${reset} ${SERVICE_NAME} running on ${cyan}http://${host}:${port}${reset}`
  );
  console.log(`${gray}  ↪ Instance ID: ${instanceId}`);
  console.log(`  ↪ Started At : ${startedAt}`);
  console.log(`  ↪ Hostname   : ${os.hostname()}${reset}`);
});
