import { existsSync, statSync } from "fs";
import type { RequestListener } from "http";
import { join, resolve } from "path";
import { pathToFileURL } from "url";
import { AppLoadError, ConfigError } from "./errors";

export type AppReference = {
  module: string;
  attribute: string[];
};

const MODULE_EXTENSIONS = [".ts", ".mts", ".js", ".mjs"];
const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

/** Splits `"module:attr.sub"` into a module path and an attribute path. */
export function parseAppReference(ref: string): AppReference {
  const separator = ref.lastIndexOf(":");
  const module = ref.slice(0, separator);
  const attribute = ref.slice(separator + 1).split(".");

  if (separator <= 0 || module.trim() === "" || !attribute.every((part) => IDENTIFIER.test(part))) {
    throw new ConfigError(`Import string "${ref}" must be in format "<module>:<attribute>".`);
  }

  return { module, attribute };
}

/** Finds the file behind a module path, trying the usual extensions and index files. */
export function resolveModuleFile(module: string, appDir: string): string | undefined {
  const base = resolve(appDir, module);
  const candidates = [
    base,
    ...MODULE_EXTENSIONS.map((ext) => `${base}${ext}`),
    ...MODULE_EXTENSIONS.map((ext) => join(base, `index${ext}`)),
  ];
  return candidates.find((candidate) => existsSync(candidate) && statSync(candidate).isFile());
}

function isRequestListener(value: unknown): value is RequestListener {
  return typeof value === "function";
}

export type LoadAppOptions = {
  appDir: string;
  factory?: boolean;
};

/**
 * Imports the application object named by `ref`. With `factory` the attribute
 * is called (and awaited) to build the application.
 */
export async function loadApp(ref: string, { appDir, factory = false }: LoadAppOptions): Promise<RequestListener> {
  const { module, attribute } = parseAppReference(ref);

  const file = resolveModuleFile(module, appDir);
  if (!file) {
    throw new AppLoadError(`Could not import module "${module}" from ${appDir}.`);
  }

  let namespace: unknown;
  try {
    namespace = await import(pathToFileURL(file).href);
  } catch (error) {
    throw new AppLoadError(`Error loading module "${module}".`, { cause: error });
  }

  let target: unknown = namespace;
  for (const key of attribute) {
    const found: unknown =
      (typeof target === "object" || typeof target === "function") && target !== null
        ? Reflect.get(target, key)
        : undefined;
    if (found === undefined) {
      throw new AppLoadError(`Attribute "${attribute.join(".")}" not found in module "${module}".`);
    }
    target = found;
  }

  if (factory) {
    if (typeof target !== "function") {
      throw new AppLoadError(`Factory "${attribute.join(".")}" in module "${module}" is not callable.`);
    }
    try {
      target = await Reflect.apply(target, undefined, []);
    } catch (error) {
      throw new AppLoadError(`Error calling factory "${attribute.join(".")}".`, { cause: error });
    }
  }

  if (!isRequestListener(target)) {
    throw new AppLoadError(`Attribute "${attribute.join(".")}" in module "${module}" is not a request handler.`);
  }
  return target;
}
