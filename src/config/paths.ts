import { homedir } from "node:os";
import { dirname, isAbsolute, join, resolve } from "node:path";

export const CONFIG_PATH_ENV = "GOPLAY_CONFIG";

export function getConfigPath(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): string {
  const envPath = env[CONFIG_PATH_ENV];
  if (envPath) {
    return resolve(cwd, expandHomePath(envPath));
  }

  return join(cwd, "config.json");
}

/** Resolve a config-relative path against the directory holding the config file. */
export function resolveConfigRelativePath(path: string, configPath: string): string {
  const expandedPath = expandHomePath(path);
  if (isAbsolute(expandedPath)) {
    return expandedPath;
  }

  return join(dirname(configPath), expandedPath);
}

function expandHomePath(path: string): string {
  if (path === "~") {
    return homedir();
  }

  if (path.startsWith("~/")) {
    return join(homedir(), path.slice(2));
  }

  return path;
}
