import path from "path";
import type { SyncFlags, TargetCloneState } from "./types";

export interface SyncEnvironment {
  devCheckoutAvailable: boolean;
  devPushFailed: boolean;
}

export type FetchFailureStep = "DEV_PUSH_TO_MIRROR" | "USE_STALE_MIRROR" | "ABORT";

export type TargetStep = "BOOTSTRAP_CLONE" | "FAST_FORWARD_SYNC";

export function shouldSync(flags: SyncFlags, flakeDir: string, targetDir: string): boolean {
  if (flags.noMirror) {
    return false;
  }
  if (flags.mirrorMode) {
    return true;
  }
  return path.resolve(flakeDir) === path.resolve(targetDir);
}

export function nextAfterFetchFailure(flags: SyncFlags, env: SyncEnvironment): FetchFailureStep {
  if (flags.devMode && env.devCheckoutAvailable && !env.devPushFailed) {
    return "DEV_PUSH_TO_MIRROR";
  }
  if (flags.offlineOk) {
    return "USE_STALE_MIRROR";
  }
  return "ABORT";
}

export function bootstrapOrSync(target: TargetCloneState): TargetStep {
  return target.exists && target.isValidClone ? "FAST_FORWARD_SYNC" : "BOOTSTRAP_CLONE";
}
