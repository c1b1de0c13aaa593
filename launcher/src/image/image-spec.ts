import { resolve } from "path";
import type { RuntimeConfig } from "../types";
import { parseCliArgs, resolveConfig } from "../utils/read-config";

export type ImageInstruction =
  | { kind: "FROM"; image: string }
  | { kind: "WORKDIR"; path: string }
  | { kind: "COPY"; sources: string[]; destination: string }
  | { kind: "RUN"; command: string }
  | { kind: "ENV"; name: string; value: string }
  | { kind: "EXPOSE"; ports: number[] }
  | { kind: "CMD"; argv: string[] }
  | { kind: "OTHER"; keyword: string; args: string };

/** Ordered build instructions of a container image. */
export type ImageSpec = {
  instructions: ImageInstruction[];
};

export const LAUNCHER_ENTRY = "launcher/src/bin.ts";

/** Joins backslash continuations and drops comments and blank lines. */
function logicalLines(text: string): string[] {
  const lines: string[] = [];
  let pending = "";

  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (line === "" || line.startsWith("#")) continue;

    if (line.endsWith("\\")) {
      pending += `${line.slice(0, -1).trim()} `;
      continue;
    }
    lines.push(`${pending}${line}`.trim());
    pending = "";
  }

  if (pending.trim() !== "") lines.push(pending.trim());
  return lines.filter((line) => line !== "");
}

function parseExecForm(args: string): string[] | undefined {
  if (!args.startsWith("[")) return undefined;
  try {
    const parsed: unknown = JSON.parse(args);
    if (Array.isArray(parsed) && parsed.every((item): item is string => typeof item === "string")) {
      return parsed;
    }
  } catch {
    return undefined;
  }
  return undefined;
}

function parseInstruction(line: string): ImageInstruction {
  const match = /^(\S+)\s*(.*)$/.exec(line);
  const keyword = (match?.[1] ?? line).toUpperCase();
  const args = match?.[2]?.trim() ?? "";
  const words = args.split(/\s+/).filter((word) => word !== "");

  switch (keyword) {
    case "FROM":
      return { kind: "FROM", image: words[0] ?? "" };
    case "WORKDIR":
      return { kind: "WORKDIR", path: args };
    case "COPY": {
      const paths = parseExecForm(args) ?? words.filter((word) => !word.startsWith("--"));
      return { kind: "COPY", sources: paths.slice(0, -1), destination: paths[paths.length - 1] ?? "" };
    }
    case "RUN":
      return { kind: "RUN", command: args };
    case "ENV": {
      const eq = args.indexOf("=");
      const space = args.search(/\s/);
      // "ENV KEY=value" or the legacy "ENV KEY value"
      const split = eq !== -1 && (space === -1 || eq < space) ? eq : space;
      if (split === -1) return { kind: "ENV", name: args, value: "" };
      return { kind: "ENV", name: args.slice(0, split), value: args.slice(split + 1).trim() };
    }
    case "EXPOSE":
      return {
        kind: "EXPOSE",
        ports: words.map((word) => Number.parseInt(word, 10)).filter((port) => Number.isInteger(port)),
      };
    case "CMD":
      return { kind: "CMD", argv: parseExecForm(args) ?? ["/bin/sh", "-c", args] };
    default:
      return { kind: "OTHER", keyword, args };
  }
}

export function parseImageSpec(text: string): ImageSpec {
  return { instructions: logicalLines(text).map(parseInstruction) };
}

export function renderImageSpec(spec: ImageSpec): string {
  const lines = spec.instructions.map((instruction) => {
    switch (instruction.kind) {
      case "FROM":
        return `FROM ${instruction.image}`;
      case "WORKDIR":
        return `WORKDIR ${instruction.path}`;
      case "COPY":
        return `COPY ${[...instruction.sources, instruction.destination].join(" ")}`;
      case "RUN":
        return `RUN ${instruction.command}`;
      case "ENV":
        return `ENV ${instruction.name}=${instruction.value}`;
      case "EXPOSE":
        return `EXPOSE ${instruction.ports.join(" ")}`;
      case "CMD":
        return `CMD ${JSON.stringify(instruction.argv)}`;
      case "OTHER":
        return `${instruction.keyword} ${instruction.args}`;
    }
  });
  return `${lines.join("\n")}\n`;
}

/** The launch command; the last CMD wins, as in a real build. */
export function launchCommandOf(spec: ImageSpec): string[] | undefined {
  let argv: string[] | undefined;
  for (const instruction of spec.instructions) {
    if (instruction.kind === "CMD") argv = instruction.argv;
  }
  return argv;
}

function workdirOf(spec: ImageSpec): string {
  let dir = "/";
  for (const instruction of spec.instructions) {
    if (instruction.kind === "WORKDIR") dir = resolve(dir, instruction.path);
  }
  return dir;
}

/**
 * Resolves the runtime configuration the image starts with, using the
 * launcher's own argument rules. Environment and config files are ignored.
 */
export function runtimeConfigOf(spec: ImageSpec): RuntimeConfig | undefined {
  const argv = launchCommandOf(spec);
  const entry = argv?.indexOf(LAUNCHER_ENTRY) ?? -1;
  if (!argv || entry === -1) return undefined;

  const parsed = parseCliArgs(argv.slice(entry + 1));
  const [app] = parsed.positionals;
  const layers = [parsed.layer];
  if (app !== undefined) layers.unshift({ source: "CMD", values: { app } });

  return resolveConfig(layers, workdirOf(spec));
}

export type ImageIssue = {
  message: string;
};

export function checkImageSpec(spec: ImageSpec): ImageIssue[] {
  const issues: ImageIssue[] = [];
  const [first] = spec.instructions;

  if (first?.kind !== "FROM") {
    issues.push({ message: "First instruction must be FROM" });
  }

  const argv = launchCommandOf(spec);
  if (!argv) {
    issues.push({ message: "No CMD instruction" });
    return issues;
  }

  let config: RuntimeConfig | undefined;
  try {
    config = runtimeConfigOf(spec);
  } catch (error) {
    issues.push({ message: `CMD arguments are invalid: ${error instanceof Error ? error.message : String(error)}` });
    return issues;
  }

  if (!config) {
    issues.push({ message: `CMD does not run ${LAUNCHER_ENTRY}` });
    return issues;
  }

  const exposed = spec.instructions.flatMap((instruction) => (instruction.kind === "EXPOSE" ? instruction.ports : []));
  if (!exposed.includes(config.port)) {
    issues.push({ message: `Launch port ${config.port} is not exposed` });
  }
  if (config.host !== "0.0.0.0") {
    issues.push({ message: `Launcher binds ${config.host}, unreachable from outside the container` });
  }

  return issues;
}
