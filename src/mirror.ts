import path from "path";
import { RebuildError, ExitCodes } from "./errors";
import type { HostFs } from "./filesystem";
import type { GitClient } from "./git";
import type { Logger } from "./logger";
import { mirrorParentDir } from "./paths";
import type { PrivilegeBoundary } from "./privilege";
import { describeFailure } from "./process";
import type { MirrorState } from "./types";

export interface FetchOutcome {
  ok: boolean;
  reason: string | null;
}

export interface MirrorStoreOptions {
  mirrorDir: string;
  remote: string | null;
  branch: string;
  git: GitClient;
  fs: HostFs;
  privilege: PrivilegeBoundary;
  logger: Logger;
}

export class MirrorStore {
  readonly mirrorDir: string;
  private readonly remote: string | null;
  private readonly branch: string;
  private readonly git: GitClient;
  private readonly fs: HostFs;
  private readonly privilege: PrivilegeBoundary;
  private readonly logger: Logger;
  private lastFetch: boolean | null = null;

  constructor(options: MirrorStoreOptions) {
    this.mirrorDir = path.resolve(options.mirrorDir);
    this.remote = options.remote;
    this.branch = options.branch;
    this.git = options.git;
    this.fs = options.fs;
    this.privilege = options.privilege;
    this.logger = options.logger;
  }

  get branchRef(): string {
    return `refs/heads/${this.branch}`;
  }

  async exists(): Promise<boolean> {
    if (!(await this.fs.exists(this.mirrorDir))) {
      return false;
    }
    return await this.git.isBareRepository(this.mirrorDir);
  }

  async head(): Promise<string | null> {
    if (!(await this.exists())) {
      return null;
    }
    return await this.git.resolveCommit(this.mirrorDir, this.branchRef);
  }

  async inspect(): Promise<MirrorState> {
    const exists = await this.exists();
    return {
      path: this.mirrorDir,
      exists,
      head: exists ? await this.git.resolveCommit(this.mirrorDir, this.branchRef) : null,
      lastFetchSucceeded: this.lastFetch,
      lastFetchTime: exists
        ? await this.fs.modifiedAt(path.join(this.mirrorDir, "FETCH_HEAD"))
        : null
    };
  }

  async parentExists(): Promise<boolean> {
    return await this.fs.exists(mirrorParentDir(this.mirrorDir));
  }

  async remoteReachable(): Promise<boolean> {
    return this.remote !== null && (await this.git.canReach(this.remote));
  }

  async ensureParent(): Promise<void> {
    const parent = mirrorParentDir(this.mirrorDir);
    if (await this.fs.exists(parent)) {
      return;
    }
    this.logger.info(`Creating mirror directory ${parent}`);
    for (const kind of ["mkdir", "chown", "chmod"] as const) {
      const result = await this.privilege.execute({ kind, path: parent });
      if (!result.ok) {
        throw new RebuildError(
          `Preparing ${parent} failed at ${kind}: ${describeFailure(result)}`,
          ExitCodes.Configuration
        );
      }
    }
  }

  async fetch(): Promise<FetchOutcome> {
    const outcome = await this.fetchOnce();
    this.lastFetch = outcome.ok;
    return outcome;
  }

  private async fetchOnce(): Promise<FetchOutcome> {
    if (await this.exists()) {
      this.logger.info(`Fetching into mirror ${this.mirrorDir}`);
      const result = await this.git.fetchMirror(this.mirrorDir);
      if (!result.ok) {
        return { ok: false, reason: `fetch failed: ${describeFailure(result)}` };
      }
    } else {
      if (!this.remote) {
        return { ok: false, reason: "mirror does not exist and no remote URL is configured" };
      }
      this.logger.info(`Creating mirror ${this.mirrorDir} from ${this.remote}`);
      const result = await this.git.cloneMirror(this.remote, this.mirrorDir);
      if (!result.ok) {
        return { ok: false, reason: `mirror clone failed: ${describeFailure(result)}` };
      }
    }
    if (!(await this.git.resolveCommit(this.mirrorDir, this.branchRef))) {
      return { ok: false, reason: `branch ${this.branch} is missing in the mirror` };
    }
    return { ok: true, reason: null };
  }

  async pushFromCheckout(checkout: string): Promise<FetchOutcome> {
    const localBranch = await this.git.currentBranch(checkout);
    if (!localBranch) {
      return { ok: false, reason: `${checkout} is not on a branch` };
    }
    if (!(await this.exists())) {
      this.logger.info(`Initialising empty mirror ${this.mirrorDir}`);
      const init = await this.git.initBareMirror(this.mirrorDir, this.remote);
      if (!init.ok) {
        return { ok: false, reason: `mirror init failed: ${describeFailure(init)}` };
      }
    }
    this.logger.info(`Pushing ${checkout} (${localBranch}) to mirror branch ${this.branch}`);
    const result = await this.git.pushBranch(checkout, this.mirrorDir, this.branch);
    if (!result.ok) {
      return { ok: false, reason: `push failed: ${describeFailure(result)}` };
    }
    return { ok: true, reason: null };
  }
}
