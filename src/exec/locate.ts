import { existsSync } from "node:fs";
import * as path from "node:path";

export interface LocateOptions {
  platform?: NodeJS.Platform;
  env?: Record<string, string | undefined>;
  exists?: (file: string) => boolean;
}

const WINDOWS_INSTALL_DIRS = ["ProgramFiles", "ProgramFiles(x86)"];
const WINDOWS_WBIN = ["Microsoft SDKs", "Azure", "CLI2", "wbin", "az.cmd"];

/**
 * Search PATH for an executable, honouring PATHEXT on Windows.
 */
export function which(name: string, options: LocateOptions = {}): string | null {
  const platform = options.platform ?? process.platform;
  const env = options.env ?? process.env;
  const exists = options.exists ?? existsSync;
  const p = platform === "win32" ? path.win32 : path.posix;

  const dirs = (env.PATH ?? env.Path ?? "").split(p.delimiter).filter(Boolean);
  const extensions =
    platform === "win32" && !p.extname(name)
      ? (env.PATHEXT ?? ".COM;.EXE;.BAT;.CMD").split(";").filter(Boolean)
      : [""];

  for (const dir of dirs) {
    for (const ext of extensions) {
      const candidate = p.join(dir, name + ext);
      if (exists(candidate)) return candidate;
    }
  }
  return null;
}

/**
 * Locate the Azure CLI. Falls back to the bare `az` name so the spawn
 * error surfaces as "not installed" during preflight.
 */
export function findAzCommand(options: LocateOptions = {}): string {
  const platform = options.platform ?? process.platform;
  const env = options.env ?? process.env;
  const exists = options.exists ?? existsSync;

  const onPath = which("az", options);
  if (onPath) return onPath;

  if (platform === "win32") {
    const cmd = which("az.cmd", options);
    if (cmd) return cmd;

    for (const key of WINDOWS_INSTALL_DIRS) {
      const root = env[key];
      if (!root) continue;
      const candidate = path.win32.join(root, ...WINDOWS_WBIN);
      if (exists(candidate)) return candidate;
    }
  }

  return "az";
}
