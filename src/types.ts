export type RebuildAction = "switch" | "boot" | "test" | "build" | "dry-build" | "dry-activate";

export const REBUILD_ACTIONS: readonly RebuildAction[] = [
  "switch",
  "boot",
  "test",
  "build",
  "dry-build",
  "dry-activate"
];

export interface PrivilegedBinaries {
  sudo: string;
  git: string;
  mkdir: string;
  chown: string;
  chmod: string;
  nixosRebuild: string;
}

export interface RebuildSettings {
  version: number;
  remote: string | null;
  branch: string;
  mirrorDir: string;
  targetDir: string;
  group: string;
  devCheckout: string | null;
  hostsDir: string | null;
  hostnameFile: string;
  binaries: PrivilegedBinaries;
}

export interface SyncFlags {
  mirrorMode: boolean;
  devMode: boolean;
  offlineOk: boolean;
  noMirror: boolean;
}

export interface RunConfig {
  hostname: string;
  flakeDir: string;
  targetDir: string;
  mirrorDir: string;
  remote: string | null;
  branch: string;
  group: string;
  devCheckout: string | null;
  hostsDir: string | null;
  flags: SyncFlags;
  action: RebuildAction;
  extraArgs: string[];
  isRoot: boolean;
}

export interface MirrorState {
  path: string;
  exists: boolean;
  head: string | null;
  lastFetchSucceeded: boolean | null;
  lastFetchTime: Date | null;
}

export interface TargetCloneState {
  path: string;
  exists: boolean;
  isValidClone: boolean;
  branch: string | null;
  head: string | null;
  origin: string | null;
  clean: boolean;
}

export type SyncStateName =
  | "START"
  | "FETCH_MIRROR"
  | "FETCH_OK"
  | "FETCH_FAILED"
  | "DEV_PUSH_TO_MIRROR"
  | "USE_STALE_MIRROR"
  | "ABORT"
  | "BOOTSTRAP_OR_SYNC"
  | "BOOTSTRAP_CLONE"
  | "FAST_FORWARD_SYNC"
  | "ABORT_DIVERGED"
  | "SYNC_SKIPPED"
  | "RUN_REBUILD";

export type SourceOutcome = "fetched" | "dev-push" | "stale-mirror" | "skipped";

export type SyncOutcome = "bootstrapped" | "up-to-date" | "fast-forwarded" | "skipped";

export interface PipelineResult {
  trail: SyncStateName[];
  source: SourceOutcome;
  sync: SyncOutcome;
  mirrorHead: string | null;
  exitCode: number;
}
