import os from "os";
import path from "path";
import { RebuildError, ExitCodes } from "./errors";
import type { HostFs } from "./filesystem";
import type { GitClient } from "./git";
import type { PrivilegeBoundary } from "./privilege";
import type { CommandResult } from "./process";
import type { RebuildAction } from "./types";

export interface RebuildRequest {
  flakeDir: string;
  hostname: string;
  action: RebuildAction;
  extraArgs: string[];
}

function requiredPaths(hostname: string, hostsDir: string | null): string[] {
  return hostsDir ? ["flake.nix", `${hostsDir.replace(/\/+$/, "")}/${hostname}`] : ["flake.nix"];
}

export async function checkFlakeAtCommit(
  git: GitClient,
  repo: string,
  commit: string,
  hostname: string,
  hostsDir: string | null
): Promise<void> {
  for (const entry of requiredPaths(hostname, hostsDir)) {
    if (!(await git.hasPath(repo, commit, entry))) {
      throw new RebuildError(
        `Could not find ${entry} at ${commit.slice(0, 12)} in ${repo}`,
        ExitCodes.Configuration
      );
    }
  }
}

export async function checkFlakeDir(
  fs: HostFs,
  flakeDir: string,
  hostname: string,
  hostsDir: string | null
): Promise<void> {
  for (const entry of requiredPaths(hostname, hostsDir)) {
    if (!(await fs.exists(path.join(flakeDir, entry)))) {
      throw new RebuildError(
        `Could not find ${entry} in ${flakeDir}`,
        ExitCodes.Configuration
      );
    }
  }
}

export function exitCodeOf(result: CommandResult): number {
  if (result.code !== null) {
    return result.code;
  }
  if (result.signal) {
    return 128 + (os.constants.signals[result.signal] ?? 0);
  }
  return ExitCodes.Failure;
}

export async function invokeRebuild(
  privilege: PrivilegeBoundary,
  request: RebuildRequest
): Promise<number> {
  const result = await privilege.execute({ kind: "rebuild", ...request }, "inherit");
  if (result.spawnError) {
    throw new RebuildError(`nixos-rebuild could not start: ${result.spawnError}`, ExitCodes.Failure);
  }
  return exitCodeOf(result);
}
