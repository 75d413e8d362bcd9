import { accessSync, constants, statSync } from "node:fs";
import { delimiter, extname, isAbsolute, join } from "node:path";

export interface ResolveCommandOptions {
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
}

/**
 * Resolve a launch command the way a shell would: paths are checked
 * directly, bare names are searched on PATH. On Windows a file is runnable
 * by its PATHEXT extension, elsewhere by its execute bit.
 * Returns the resolved path, or null when the command is not installed.
 */
export function resolveCommand(
  command: string,
  options: ResolveCommandOptions = {}
): string | null {
  const { env = process.env, platform = process.platform } = options;
  if (command.trim() === "") return null;

  const windows = platform === "win32";
  const pathExt = (env.PATHEXT ?? ".EXE;.CMD;.BAT;.COM").split(";").filter(Boolean);
  const extensions = windows && !hasExtension(command, pathExt) ? pathExt : [""];

  if (isAbsolute(command) || command.includes("/") || command.includes("\\")) {
    return findExecutable(command, extensions, windows);
  }

  for (const dir of (env.PATH ?? "").split(delimiter)) {
    if (!dir) continue;
    const found = findExecutable(join(dir, command), extensions, windows);
    if (found) return found;
  }

  return null;
}

export function commandExists(command: string, options?: ResolveCommandOptions): boolean {
  return resolveCommand(command, options) !== null;
}

function hasExtension(command: string, pathExt: string[]): boolean {
  const ext = extname(command).toLowerCase();
  return ext !== "" && pathExt.some((e) => e.toLowerCase() === ext);
}

function findExecutable(base: string, extensions: string[], windows: boolean): string | null {
  for (const ext of extensions) {
    const candidate = base + ext;
    try {
      if (!statSync(candidate).isFile()) continue;
      if (!windows) accessSync(candidate, constants.X_OK);
      return candidate;
    } catch {
      // not present or not executable
    }
  }
  return null;
}
