import { describe, it, expect } from "vitest";
import type { CliFlags } from "./config";
import { buildProgram } from "./cli";

function parse(...args: string[]): CliFlags {
  const program = buildProgram().exitOverride();
  program.parse(["node", "rg-purge", ...args]);
  return program.opts<CliFlags>();
}

describe("buildProgram", () => {
  it("parses every flag", () => {
    expect(parse("--exclude", "rg-prod", "^keep-", "-w", "3", "--dry-run", "-q")).toEqual({
      exclude: ["rg-prod", "^keep-"],
      workers: "3",
      dryRun: true,
      quiet: true,
    });
  });

  it("leaves unset flags undefined", () => {
    expect(parse()).toEqual({});
  });

  it("accepts the long worker flag", () => {
    expect(parse("--workers", "10").workers).toBe("10");
  });
});
