import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { getConfig, loadConfig, resetConfig, resolveOptions } from "./config";

describe("loadConfig", () => {
  it("uses defaults when nothing is set", () => {
    const config = loadConfig({});
    expect(config.RG_PURGE_WORKERS).toBe(5);
    expect(config.RG_PURGE_QUIET).toBe(false);
    expect(config.AZURE_CLI_PATH).toBeUndefined();
  });

  it("coerces worker count and quiet flag", () => {
    const config = loadConfig({
      RG_PURGE_WORKERS: "12",
      RG_PURGE_QUIET: "true",
      AZURE_CLI_PATH: "/opt/az/bin/az",
    });
    expect(config.RG_PURGE_WORKERS).toBe(12);
    expect(config.RG_PURGE_QUIET).toBe(true);
    expect(config.AZURE_CLI_PATH).toBe("/opt/az/bin/az");
  });

  it("throws on a non-positive worker count", () => {
    expect(() => loadConfig({ RG_PURGE_WORKERS: "0" })).toThrow();
  });

  it("throws on an unrecognised quiet value", () => {
    expect(() => loadConfig({ RG_PURGE_QUIET: "maybe" })).toThrow();
  });
});

describe("getConfig", () => {
  let originalEnv: NodeJS.ProcessEnv;

  beforeEach(() => {
    originalEnv = { ...process.env };
    resetConfig();
  });

  afterEach(() => {
    process.env = originalEnv;
    resetConfig();
  });

  it("caches config after first parse", () => {
    process.env.RG_PURGE_WORKERS = "3";
    const first = getConfig();
    const second = getConfig();
    expect(first).toBe(second);
    expect(first.RG_PURGE_WORKERS).toBe(3);
  });
});

describe("resolveOptions", () => {
  const config = loadConfig({ RG_PURGE_WORKERS: "8" });

  it("falls back to config when flags are absent", () => {
    const options = resolveOptions({}, config);
    expect(options).toEqual({ exclude: [], workers: 8, quiet: false, dryRun: false, azPath: undefined });
  });

  it("lets flags override config", () => {
    const options = resolveOptions(
      { exclude: ["rg-prod", "^keep-"], workers: "2", quiet: true, dryRun: true },
      config,
    );
    expect(options.exclude).toEqual(["rg-prod", "^keep-"]);
    expect(options.workers).toBe(2);
    expect(options.quiet).toBe(true);
    expect(options.dryRun).toBe(true);
  });

  it("rejects a non-numeric worker flag", () => {
    expect(() => resolveOptions({ workers: "many" }, config)).toThrow();
  });

  it("quiet from config applies without the flag", () => {
    const quietConfig = loadConfig({ RG_PURGE_QUIET: "true" });
    expect(resolveOptions({}, quietConfig).quiet).toBe(true);
  });
});
