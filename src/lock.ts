import { randomBytes } from "crypto";
import fs from "fs/promises";
import os from "os";
import { RebuildError, ExitCodes } from "./errors";
import { isErrnoException } from "./filesystem";

const DEFAULT_STALE_MS = 30 * 60 * 1000;

export interface LockData {
  pid: number;
  user: string;
  acquiredAt: string;
}

export interface AdvisoryLock {
  acquire(): Promise<void>;
  release(): Promise<void>;
}

export interface SyncLockOptions {
  staleMs?: number;
  now?: () => number;
  isAlive?: (pid: number) => boolean;
}

function isLockData(value: unknown): value is LockData {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  return (
    "pid" in value &&
    typeof value.pid === "number" &&
    "user" in value &&
    typeof value.user === "string" &&
    "acquiredAt" in value &&
    typeof value.acquiredAt === "string"
  );
}

export function processIsAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: alive, but owned by someone else.
    return isErrnoException(error) && error.code === "EPERM";
  }
}

function currentUser(): string {
  try {
    return os.userInfo().username;
  } catch {
    return "unknown";
  }
}

export class SyncLock implements AdvisoryLock {
  private readonly lockPath: string;
  private readonly staleMs: number;
  private readonly now: () => number;
  private readonly isAlive: (pid: number) => boolean;
  private held = false;

  constructor(lockPath: string, options: SyncLockOptions = {}) {
    this.lockPath = lockPath;
    this.staleMs = options.staleMs ?? DEFAULT_STALE_MS;
    this.now = options.now ?? Date.now;
    this.isAlive = options.isAlive ?? processIsAlive;
  }

  async acquire(): Promise<void> {
    if (await this.tryCreate()) {
      return;
    }
    const existing = await this.readExisting(this.lockPath);
    if (!existing) {
      if (await this.tryCreate()) {
        return;
      }
      throw this.concurrent();
    }
    if (existing.data && !this.isStale(existing.data)) {
      throw new RebuildError(
        `Another rebuild (pid ${existing.data.pid}, user ${existing.data.user}) holds ${this.lockPath} since ${existing.data.acquiredAt}`,
        ExitCodes.Locked
      );
    }
    await this.takeOver(existing.raw);
  }

  async release(): Promise<void> {
    if (!this.held) {
      return;
    }
    this.held = false;
    await fs.rm(this.lockPath, { force: true });
  }

  private isStale(data: LockData): boolean {
    const acquired = Date.parse(data.acquiredAt);
    if (Number.isNaN(acquired) || this.now() - acquired > this.staleMs) {
      return true;
    }
    return !this.isAlive(data.pid);
  }

  private async takeOver(staleRaw: string): Promise<void> {
    const aside = this.uniquePath("stale");
    try {
      await fs.rename(this.lockPath, aside);
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        throw this.concurrent();
      }
      throw error;
    }
    try {
      const moved = await this.readExisting(aside);
      if (!moved) {
        throw this.concurrent();
      }
      if (moved.raw !== staleRaw) {
        await this.restore(aside);
        throw this.concurrent();
      }
    } finally {
      await fs.rm(aside, { force: true });
    }
    if (!(await this.tryCreate())) {
      throw this.concurrent();
    }
  }

  private async restore(aside: string): Promise<void> {
    try {
      await fs.link(aside, this.lockPath);
    } catch (error) {
      if (!(isErrnoException(error) && error.code === "EEXIST")) {
        throw error;
      }
    }
  }

  private async readExisting(file: string): Promise<{ raw: string; data: LockData | null } | null> {
    let raw: string;
    try {
      raw = await fs.readFile(file, "utf8");
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return null;
      }
      throw error;
    }
    try {
      const parsed: unknown = JSON.parse(raw);
      return { raw, data: isLockData(parsed) ? parsed : null };
    } catch (error) {
      if (error instanceof SyntaxError) {
        return { raw, data: null };
      }
      throw error;
    }
  }

  // Linked into place from a private file so readers never see a half-written lock.
  private async tryCreate(): Promise<boolean> {
    const data: LockData = {
      pid: process.pid,
      user: currentUser(),
      acquiredAt: new Date(this.now()).toISOString()
    };
    const temp = this.uniquePath("new");
    try {
      await fs.writeFile(temp, JSON.stringify(data, null, 2), {
        encoding: "utf8",
        flag: "wx",
        mode: 0o664
      });
      await fs.link(temp, this.lockPath);
    } catch (error) {
      if (isErrnoException(error) && error.code === "EEXIST") {
        return false;
      }
      throw new RebuildError(
        `Cannot create lock file ${this.lockPath}: ${error instanceof Error ? error.message : String(error)}`,
        ExitCodes.Configuration
      );
    } finally {
      await fs.rm(temp, { force: true });
    }
    this.held = true;
    return true;
  }

  private uniquePath(tag: string): string {
    return `${this.lockPath}.${tag}.${process.pid}.${randomBytes(4).toString("hex")}`;
  }

  private concurrent(): RebuildError {
    return new RebuildError(`Another rebuild acquired ${this.lockPath} concurrently`, ExitCodes.Locked);
  }
}
