import { RebuildError, ExitCodes } from "./errors";
import { bootstrapOrSync, nextAfterFetchFailure, shouldSync } from "./decision";
import type { HostFs } from "./filesystem";
import type { GitClient } from "./git";
import type { AdvisoryLock } from "./lock";
import type { Logger } from "./logger";
import { MirrorStore } from "./mirror";
import type { PrivilegeBoundary } from "./privilege";
import { checkFlakeAtCommit, checkFlakeDir, invokeRebuild } from "./rebuild";
import { TargetCloneManager } from "./target";
import type {
  PipelineResult,
  RunConfig,
  SourceOutcome,
  SyncOutcome,
  SyncStateName
} from "./types";

export interface PipelineDeps {
  git: GitClient;
  fs: HostFs;
  privilege: PrivilegeBoundary;
  logger: Logger;
  lock: AdvisoryLock;
}

interface MirrorRefresh {
  source: SourceOutcome;
  mirrorHead: string;
}

export function createMirrorStore(
  config: Pick<RunConfig, "mirrorDir" | "remote" | "branch">,
  deps: PipelineDeps
): MirrorStore {
  return new MirrorStore({
    mirrorDir: config.mirrorDir,
    remote: config.remote,
    branch: config.branch,
    git: deps.git,
    fs: deps.fs,
    privilege: deps.privilege,
    logger: deps.logger
  });
}

export function createTargetManager(
  config: Pick<RunConfig, "targetDir" | "mirrorDir" | "branch">,
  deps: PipelineDeps
): TargetCloneManager {
  return new TargetCloneManager({
    targetDir: config.targetDir,
    mirrorDir: config.mirrorDir,
    branch: config.branch,
    git: deps.git,
    fs: deps.fs,
    privilege: deps.privilege,
    logger: deps.logger
  });
}

async function devCheckoutAvailable(config: RunConfig, deps: PipelineDeps): Promise<boolean> {
  if (!config.devCheckout || !(await deps.fs.exists(config.devCheckout))) {
    return false;
  }
  return (await deps.git.workTreeRoot(config.devCheckout)) !== null;
}

async function prepareMirrorParent(
  config: RunConfig,
  deps: PipelineDeps,
  mirror: MirrorStore
): Promise<boolean> {
  if (await mirror.parentExists()) {
    return true;
  }
  const hasSource =
    (await mirror.remoteReachable()) ||
    (config.flags.devMode && (await devCheckoutAvailable(config, deps)));
  if (!hasSource) {
    return false;
  }
  await mirror.ensureParent();
  return true;
}

async function refreshMirror(
  config: RunConfig,
  deps: PipelineDeps,
  mirror: MirrorStore,
  trail: SyncStateName[]
): Promise<MirrorRefresh> {
  const { logger } = deps;
  trail.push("FETCH_MIRROR");
  const fetched = await mirror.fetch();
  if (fetched.ok) {
    trail.push("FETCH_OK");
    const head = await mirror.head();
    if (!head) {
      throw new RebuildError(
        `Mirror ${mirror.mirrorDir} has no ${config.branch}`,
        ExitCodes.FetchFailed
      );
    }
    return { source: "fetched", mirrorHead: head };
  }

  trail.push("FETCH_FAILED");
  const fetchReason = fetched.reason ?? "unknown error";
  logger.warn(`Mirror fetch failed: ${fetchReason}`);
  const devAvailable = await devCheckoutAvailable(config, deps);
  let devPushFailed = false;

  for (;;) {
    const step = nextAfterFetchFailure(config.flags, {
      devCheckoutAvailable: devAvailable,
      devPushFailed
    });
    trail.push(step);

    if (step === "DEV_PUSH_TO_MIRROR" && config.devCheckout) {
      const pushed = await mirror.pushFromCheckout(config.devCheckout);
      const head = pushed.ok ? await mirror.head() : null;
      if (head) {
        return { source: "dev-push", mirrorHead: head };
      }
      logger.warn(`Dev push from ${config.devCheckout} failed: ${pushed.reason ?? "no branch"}`);
      devPushFailed = true;
      continue;
    }

    if (step === "USE_STALE_MIRROR") {
      const head = await mirror.head();
      if (!head) {
        throw new RebuildError(
          `Mirror fetch failed (${fetchReason}) and ${mirror.mirrorDir} holds no ${config.branch} to fall back on`,
          ExitCodes.FetchFailed
        );
      }
      logger.warn(`Continuing offline with the mirror at ${head}`);
      return { source: "stale-mirror", mirrorHead: head };
    }

    throw new RebuildError(
      `Mirror fetch failed (${fetchReason}); rerun with --offline-ok to use the existing mirror`,
      ExitCodes.FetchFailed
    );
  }
}

export async function runPipeline(
  config: RunConfig,
  deps: PipelineDeps,
  trail: SyncStateName[] = []
): Promise<PipelineResult> {
  trail.push("START");
  let source: SourceOutcome = "skipped";
  let sync: SyncOutcome = "skipped";
  let mirrorHead: string | null = null;

  if (!shouldSync(config.flags, config.flakeDir, config.targetDir)) {
    trail.push("SYNC_SKIPPED");
  } else {
    if (config.isRoot) {
      throw new RebuildError(
        "Run rebuild as your normal user so the mirror is fetched with your credentials, or pass --no-mirror",
        ExitCodes.Usage
      );
    }
    const mirror = createMirrorStore(config, deps);
    const target = createTargetManager(config, deps);

    const locked = await prepareMirrorParent(config, deps, mirror);
    if (locked) {
      await deps.lock.acquire();
    }
    try {
      const refreshed = await refreshMirror(config, deps, mirror, trail);
      source = refreshed.source;
      mirrorHead = refreshed.mirrorHead;
      trail.push("BOOTSTRAP_OR_SYNC");

      await checkFlakeAtCommit(
        deps.git,
        mirror.mirrorDir,
        mirrorHead,
        config.hostname,
        config.hostsDir
      );

      const state = await target.inspect();
      const step = bootstrapOrSync(state);
      trail.push(step);
      if (step === "BOOTSTRAP_CLONE") {
        await target.bootstrap(state, mirrorHead);
        sync = "bootstrapped";
      } else {
        try {
          sync = await target.fastForward(state, mirrorHead);
        } catch (error) {
          if (error instanceof RebuildError && error.code === ExitCodes.Diverged) {
            trail.push("ABORT_DIVERGED");
          }
          throw error;
        }
      }
    } finally {
      if (locked) {
        await deps.lock.release();
      }
    }
  }

  await checkFlakeDir(deps.fs, config.flakeDir, config.hostname, config.hostsDir);
  trail.push("RUN_REBUILD");
  const exitCode = await invokeRebuild(deps.privilege, {
    flakeDir: config.flakeDir,
    hostname: config.hostname,
    action: config.action,
    extraArgs: config.extraArgs
  });

  return { trail, source, sync, mirrorHead, exitCode };
}
