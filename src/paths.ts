import fs from "fs";
import os from "os";
import path from "path";

export const DEFAULT_TARGET_DIR = "/etc/nixos";
export const DEFAULT_MIRROR_DIR = "/var/lib/nixos-setup/mirror.git";
export const DEFAULT_HOSTNAME_FILE = "/etc/hostname";
export const LOCK_FILE = "rebuild.lock";

const FIND_UPWARDS_LIMIT = 8;

export function expandHome(inputPath: string, homeDir: string = os.homedir()): string {
  if (inputPath === "~") {
    return homeDir;
  }
  if (inputPath.startsWith("~/")) {
    return path.join(homeDir, inputPath.slice(2));
  }
  return inputPath;
}

export function expandEnv(inputPath: string, env: NodeJS.ProcessEnv): string {
  return inputPath.replace(
    /\$\{([A-Z0-9_]+)(:-([^}]*))?\}/gi,
    (
      _match: string,
      varName: string,
      _fallbackGroup: string | undefined,
      fallback: string | undefined
    ): string => {
      const value = env[varName];
      if (value && value.length > 0) {
        return value;
      }
      return fallback ?? "";
    }
  );
}

export function resolvePath(inputPath: string, env: NodeJS.ProcessEnv, cwd: string): string {
  const expanded = expandHome(expandEnv(inputPath, env), env.HOME || os.homedir());
  return path.resolve(cwd, expanded);
}

export function mirrorParentDir(mirrorDir: string): string {
  return path.dirname(path.resolve(mirrorDir));
}

export function lockPathFor(mirrorDir: string): string {
  return path.join(mirrorParentDir(mirrorDir), LOCK_FILE);
}

export function defaultSettingsPath(env: NodeJS.ProcessEnv, cwd: string): string {
  const explicit = env.REBUILD_CONFIG;
  if (explicit && explicit.length > 0) {
    return resolvePath(explicit, env, cwd);
  }
  const configHome = resolvePath("${XDG_CONFIG_HOME:-~/.config}", env, cwd);
  return path.join(configHome, "rebuild", "config.yml");
}

function isFlakeCheckout(dir: string): boolean {
  return fs.existsSync(path.join(dir, "flake.nix")) && fs.existsSync(path.join(dir, ".git"));
}

export function findFlakeCheckout(start: string): string | null {
  let current = path.resolve(start);
  for (let i = 0; i < FIND_UPWARDS_LIMIT; i += 1) {
    if (isFlakeCheckout(current)) {
      return current;
    }
    const parent = path.dirname(current);
    if (parent === current) {
      break;
    }
    current = parent;
  }
  return null;
}
