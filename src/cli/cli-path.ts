import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { CLINotFoundError } from "../errors.js";
import { createSubsystemLogger } from "../logging/subsystem.js";

const log = createSubsystemLogger("cli/path");

function binaryNames(platform: NodeJS.Platform): string[] {
  return platform === "win32" ? ["claude.exe", "claude.cmd"] : ["claude"];
}

function commonInstallDirs(homeDir: string, platform: NodeJS.Platform): string[] {
  if (platform === "win32") {
    return [
      path.join(homeDir, "AppData", "Local", "Programs", "claude"),
      path.join(homeDir, "AppData", "Roaming", "npm"),
      path.join(homeDir, ".volta", "bin"),
    ];
  }
  return [
    path.join(homeDir, ".local", "bin"),
    "/usr/local/bin",
    path.join(homeDir, ".npm-global", "bin"),
    path.join(homeDir, ".volta", "bin"),
    "/opt/homebrew/bin",
    path.join(homeDir, ".bun", "bin"),
  ];
}

async function isFile(candidate: string): Promise<boolean> {
  try {
    const stats = await fs.stat(candidate);
    return stats.isFile();
  } catch {
    return false;
  }
}

/**
 * Resolve the CLI executable. An explicit `cliPath` containing a directory must
 * exist; a bare name is handed to spawn as is. Otherwise PATH is searched first,
 * then the usual install locations.
 */
export async function findClaudeCli(params: {
  cliPath?: string;
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
  platform?: NodeJS.Platform;
  /** Overrides the usual install locations searched after PATH. */
  installDirs?: string[];
} = {}): Promise<string> {
  const platform = params.platform ?? process.platform;
  const pathApi = platform === "win32" ? path.win32 : path.posix;

  if (params.cliPath) {
    if (!params.cliPath.includes(pathApi.sep) && !params.cliPath.includes("/")) {
      return params.cliPath;
    }
    if (await isFile(params.cliPath)) {
      return params.cliPath;
    }
    throw new CLINotFoundError({ cliPath: params.cliPath });
  }

  const env = params.env ?? process.env;
  const pathDirs = (env.PATH ?? env.Path ?? "")
    .split(pathApi.delimiter)
    .filter((dir) => dir.length > 0);
  const installDirs =
    params.installDirs ?? commonInstallDirs(params.homeDir ?? os.homedir(), platform);
  const dirs = [...pathDirs, ...installDirs];

  for (const dir of dirs) {
    for (const name of binaryNames(platform)) {
      const candidate = pathApi.join(dir, name);
      if (await isFile(candidate)) {
        log.debug(`cli found: path=${candidate}`);
        return candidate;
      }
    }
  }

  log.warn(`cli not found: searched=${dirs.length} dirs`);
  throw new CLINotFoundError();
}
