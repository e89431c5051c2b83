import { mkdirSync } from "node:fs";
import { join } from "node:path";

export type AppPaths = {
  stateDir: string;
  logPath: string;
};

export function getPaths(env: NodeJS.ProcessEnv = process.env): AppPaths {
  const home = env.HOME;
  if (!home) {
    throw new Error("$HOME is not set");
  }

  const stateDir = join(home, ".local", "state", "specdeck");
  const logPath = join(stateDir, "specdeck.log");

  return {
    stateDir,
    logPath,
  };
}

export function ensurePaths(paths = getPaths()): AppPaths {
  mkdirSync(paths.stateDir, { recursive: true });
  return paths;
}
