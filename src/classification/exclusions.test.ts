import { describe, it, expect } from "vitest";
import type { Logger } from "../logger";
import { compilePatterns, matchExclusion } from "./exclusions";

function recordingLogger(): Logger & { warnings: string[] } {
  const warnings: string[] = [];
  const noop = () => {};
  return { warnings, info: noop, success: noop, error: noop, warn: (m) => warnings.push(m) };
}

describe("compilePatterns", () => {
  it("compiles valid patterns case-insensitively", () => {
    const [pattern] = compilePatterns(["^rg-prod$"], recordingLogger());
    expect(pattern.source).toBe("^rg-prod$");
    expect(pattern.regex?.flags).toBe("i");
  });

  it("warns once and keeps an invalid regex for exact matching", () => {
    const logger = recordingLogger();
    const compiled = compilePatterns(["rg-[prod", "rg-dev"], logger);
    expect(compiled).toEqual([
      { source: "rg-[prod", regex: null },
      { source: "rg-dev", regex: /rg-dev/i },
    ]);
    expect(logger.warnings).toEqual(["Invalid regex pattern: rg-[prod"]);
  });
});

describe("matchExclusion", () => {
  const patterns = compilePatterns(["RG-Prod", "^keep-", "-shared$", "rg-[prod"], recordingLogger());

  it("matches exact names case-insensitively", () => {
    expect(matchExclusion("rg-prod", patterns)?.source).toBe("RG-Prod");
  });

  it("matches regex anywhere in the name", () => {
    expect(matchExclusion("rg-prod-eu", patterns)?.source).toBe("RG-Prod");
    expect(matchExclusion("KEEP-network", patterns)?.source).toBe("^keep-");
    expect(matchExclusion("dns-shared", patterns)?.source).toBe("-shared$");
  });

  it("still exact-matches a pattern that is not a valid regex", () => {
    expect(matchExclusion("RG-[PROD", patterns)?.source).toBe("rg-[prod");
  });

  it("returns undefined for non-matching names", () => {
    expect(matchExclusion("rg-test", patterns)).toBeUndefined();
    expect(matchExclusion("shared-dns", patterns)).toBeUndefined();
  });

  it("returns the first matching pattern", () => {
    const ordered = compilePatterns(["rg-", "rg-prod"], recordingLogger());
    expect(matchExclusion("rg-prod", ordered)?.source).toBe("rg-");
  });

  it("never matches with no patterns", () => {
    expect(matchExclusion("anything", [])).toBeUndefined();
  });
});
