import { dirname, join } from "path";
import { fileURLToPath } from "url";
import { describe, expect, it } from "vitest";
import { loadApp, parseAppReference, resolveModuleFile } from "./app-loader";
import { AppLoadError, ConfigError } from "./errors";

const appDir = join(dirname(fileURLToPath(import.meta.url)), "__fixtures__", "apps");

describe("parseAppReference", () => {
  it("splits module and attribute path", () => {
    expect(parseAppReference("main:app")).toEqual({ module: "main", attribute: ["app"] });
    expect(parseAppReference("api/server:routes.app")).toEqual({
      module: "api/server",
      attribute: ["routes", "app"],
    });
  });

  it("rejects strings without a module or attribute", () => {
    for (const ref of ["main", ":app", "main:", "main:1app", "main:app..x"]) {
      expect(() => parseAppReference(ref)).toThrow(ConfigError);
    }
  });

  it("names the expected format", () => {
    expect(() => parseAppReference("main")).toThrow('Import string "main" must be in format "<module>:<attribute>".');
  });
});

describe("resolveModuleFile", () => {
  it("adds a file extension", () => {
    expect(resolveModuleFile("hello", appDir)).toBe(join(appDir, "hello.ts"));
  });

  it("falls back to a directory index", () => {
    expect(resolveModuleFile("pkg", appDir)).toBe(join(appDir, "pkg", "index.ts"));
  });

  it("returns undefined for missing modules", () => {
    expect(resolveModuleFile("missing", appDir)).toBeUndefined();
  });
});

describe("loadApp", () => {
  it("returns the named request handler", async () => {
    const app = await loadApp("hello:app", { appDir });
    expect(typeof app).toBe("function");
    expect(app.name).toBe("app");
  });

  it("follows dotted attribute paths", async () => {
    const app = await loadApp("hello:api.handler", { appDir });
    expect(app.name).toBe("app");
  });

  it("loads directory modules", async () => {
    const app = await loadApp("pkg:app", { appDir });
    expect(app.name).toBe("app");
  });

  it("calls factories when asked to", async () => {
    const app = await loadApp("factory:createApp", { appDir, factory: true });
    expect(typeof app).toBe("function");
    expect(app.name).not.toBe("createApp");
  });

  it("fails on a missing module", async () => {
    await expect(loadApp("missing:app", { appDir })).rejects.toThrow(
      `Could not import module "missing" from ${appDir}.`
    );
  });

  it("fails when the module throws on import", async () => {
    const error = await loadApp("broken:app", { appDir }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(AppLoadError);
    expect(error).toMatchObject({ message: 'Error loading module "broken".', exitCode: 3 });
  });

  it("fails on a missing attribute", async () => {
    await expect(loadApp("hello:nope", { appDir })).rejects.toThrow(
      'Attribute "nope" not found in module "hello".'
    );
  });

  it("fails when the attribute is not callable", async () => {
    await expect(loadApp("hello:settings", { appDir })).rejects.toThrow(
      'Attribute "settings" in module "hello" is not a request handler.'
    );
  });

  it("wraps errors thrown by factories", async () => {
    const error = await loadApp("factory:failingFactory", { appDir, factory: true }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(AppLoadError);
    expect(error).toMatchObject({ cause: expect.objectContaining({ message: "factory exploded" }) });
  });
});
