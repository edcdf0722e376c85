import path from "path";
import { RebuildError, ExitCodes } from "./errors";
import type { HostFs } from "./filesystem";
import type { GitClient } from "./git";
import type { Logger } from "./logger";
import type { PrivilegeBoundary } from "./privilege";
import { describeFailure } from "./process";
import type { TargetCloneState } from "./types";

export type FastForwardResult = "up-to-date" | "fast-forwarded";

export interface TargetCloneManagerOptions {
  targetDir: string;
  mirrorDir: string;
  branch: string;
  git: GitClient;
  fs: HostFs;
  privilege: PrivilegeBoundary;
  logger: Logger;
}

function normalizeRemote(url: string): string {
  const withoutScheme = url.startsWith("file://") ? url.slice("file://".length) : url;
  return path.resolve(withoutScheme.replace(/\/+$/, ""));
}

export class TargetCloneManager {
  readonly targetDir: string;
  private readonly mirrorDir: string;
  private readonly branch: string;
  private readonly git: GitClient;
  private readonly fs: HostFs;
  private readonly privilege: PrivilegeBoundary;
  private readonly logger: Logger;

  constructor(options: TargetCloneManagerOptions) {
    this.targetDir = path.resolve(options.targetDir);
    this.mirrorDir = path.resolve(options.mirrorDir);
    this.branch = options.branch;
    this.git = options.git;
    this.fs = options.fs;
    this.privilege = options.privilege;
    this.logger = options.logger;
  }

  async inspect(): Promise<TargetCloneState> {
    const state: TargetCloneState = {
      path: this.targetDir,
      exists: await this.fs.exists(this.targetDir),
      isValidClone: false,
      branch: null,
      head: null,
      origin: null,
      clean: false
    };
    if (!state.exists) {
      return state;
    }
    const root = await this.git.workTreeRoot(this.targetDir);
    if (!root || path.resolve(root) !== this.targetDir) {
      return state;
    }
    return {
      ...state,
      isValidClone: true,
      branch: await this.git.currentBranch(this.targetDir),
      head: await this.git.resolveCommit(this.targetDir, "HEAD"),
      origin: await this.git.remoteUrl(this.targetDir, "origin"),
      clean: await this.git.isClean(this.targetDir)
    };
  }

  async bootstrap(state: TargetCloneState, mirrorHead: string): Promise<void> {
    if (state.exists && !(await this.fs.isEmptyDirectory(this.targetDir))) {
      throw new RebuildError(
        `${this.targetDir} exists but is not a git clone; move it aside so it can be cloned from ${this.mirrorDir}`,
        ExitCodes.Configuration
      );
    }
    this.logger.info(`Bootstrapping ${this.targetDir} from ${this.mirrorDir}`);
    const result = await this.privilege.execute({
      kind: "git-clone",
      source: this.mirrorDir,
      target: this.targetDir,
      branch: this.branch
    });
    if (!result.ok) {
      throw new RebuildError(
        `Cloning ${this.mirrorDir} into ${this.targetDir} failed: ${describeFailure(result)}`,
        ExitCodes.SyncFailed
      );
    }
    await this.assertHead(mirrorHead);
  }

  async fastForward(state: TargetCloneState, mirrorHead: string): Promise<FastForwardResult> {
    this.assertTracksMirror(state);
    if (state.head === mirrorHead) {
      this.logger.info(`${this.targetDir} is already at ${mirrorHead}`);
      return "up-to-date";
    }
    if (!state.clean) {
      throw new RebuildError(
        `Refusing to sync ${this.targetDir}: working tree is dirty. Commit or discard the changes there, or rerun with --no-mirror.`,
        ExitCodes.DirtyTarget
      );
    }

    const fetched = await this.privilege.execute({ kind: "git-fetch", target: this.targetDir });
    if (!fetched.ok) {
      throw new RebuildError(
        `Fetching ${this.mirrorDir} into ${this.targetDir} failed: ${describeFailure(fetched)}`,
        ExitCodes.SyncFailed
      );
    }

    const head = state.head;
    if (!head || !(await this.git.isAncestor(this.targetDir, head, mirrorHead))) {
      throw new RebuildError(
        `${this.targetDir} has diverged from the mirror (target ${head ?? "unborn"}, mirror ${mirrorHead}); resolve it by hand, nothing was changed`,
        ExitCodes.Diverged
      );
    }

    const merged = await this.privilege.execute({
      kind: "git-merge-ff",
      target: this.targetDir,
      commit: mirrorHead
    });
    if (!merged.ok) {
      throw new RebuildError(
        `Fast-forward of ${this.targetDir} failed: ${describeFailure(merged)}`,
        ExitCodes.SyncFailed
      );
    }
    await this.assertHead(mirrorHead);
    return "fast-forwarded";
  }

  private assertTracksMirror(state: TargetCloneState): void {
    if (!state.origin || normalizeRemote(state.origin) !== this.mirrorDir) {
      throw new RebuildError(
        `${this.targetDir} does not track the mirror (origin is ${state.origin ?? "unset"}); run: sudo git -C ${this.targetDir} remote set-url origin ${this.mirrorDir}`,
        ExitCodes.Configuration
      );
    }
    if (state.branch !== this.branch) {
      throw new RebuildError(
        `${this.targetDir} is on ${state.branch ?? "a detached HEAD"}, expected branch ${this.branch}`,
        ExitCodes.Configuration
      );
    }
  }

  private async assertHead(expected: string): Promise<void> {
    const head = await this.git.resolveCommit(this.targetDir, "HEAD");
    if (head !== expected) {
      throw new RebuildError(
        `${this.targetDir} is at ${head ?? "nothing"} after sync, expected ${expected}`,
        ExitCodes.SyncFailed
      );
    }
  }
}
