import path from "path";
import { RebuildError, ExitCodes } from "./errors";
import { isValidHostname } from "./hostname";
import type { Logger } from "./logger";
import { mirrorParentDir } from "./paths";
import { describeFailure, formatCommand } from "./process";
import type { CommandResult, CommandRunner, StdioMode } from "./process";
import { REBUILD_ACTIONS } from "./types";
import type { PrivilegedBinaries, RebuildAction } from "./types";

export type PrivilegedOperation =
  | { kind: "git-clone"; source: string; target: string; branch: string }
  | { kind: "git-fetch"; target: string }
  | { kind: "git-merge-ff"; target: string; commit: string }
  | { kind: "mkdir"; path: string }
  | { kind: "chown"; path: string }
  | { kind: "chmod"; path: string }
  | {
      kind: "rebuild";
      flakeDir: string;
      hostname: string;
      action: RebuildAction;
      extraArgs: string[];
    };

export interface PrivilegeScope {
  mirrorDir: string;
  targetDir: string;
  group: string;
}

export interface Invocation {
  command: string;
  args: string[];
}

export interface PrivilegeBoundaryOptions {
  runner: CommandRunner;
  binaries: PrivilegedBinaries;
  scope: PrivilegeScope;
  escalate: boolean;
  logger: Logger;
}

export const ALLOWED_REBUILD_FLAGS: ReadonlySet<string> = new Set([
  "--show-trace",
  "--print-build-logs",
  "-L",
  "--verbose",
  "-v",
  "--keep-going",
  "-k",
  "--fast",
  "--no-build-nix",
  "--upgrade",
  "--refresh",
  "--rollback"
]);

const MIRROR_PARENT_MODE = "2775";
const OBJECT_ID_PATTERN = /^[0-9a-f]{40}([0-9a-f]{24})?$/;
const BRANCH_PATTERN = /^(?!-)(?!.*\.\.)(?!.*\/\/)[A-Za-z0-9._/-]+(?<![./])$/;
const GROUP_PATTERN = /^[a-z_][a-z0-9_-]*$/;

// sudo prints these before refusing; any other failure belongs to the command itself.
const SUDO_DENIAL_PATTERNS = [
  /^sudo: .*password is required/m,
  /^sudo: .*incorrect password attempt/m,
  /^sudo: .*no tty present/m,
  /is not allowed to execute/,
  /is not in the sudoers file/,
  /may not run sudo/
];

export function isSafeBranchName(value: string): boolean {
  return BRANCH_PATTERN.test(value) && !value.endsWith(".lock");
}

function reject(operation: PrivilegedOperation, reason: string): never {
  throw new RebuildError(
    `Refusing privileged ${operation.kind} operation: ${reason}`,
    ExitCodes.PrivilegeDenied
  );
}

function sameDir(left: string, right: string): boolean {
  return path.resolve(left) === path.resolve(right);
}

export class PrivilegeBoundary {
  private readonly runner: CommandRunner;
  private readonly binaries: PrivilegedBinaries;
  private readonly scope: PrivilegeScope;
  private readonly escalate: boolean;
  private readonly logger: Logger;

  constructor(options: PrivilegeBoundaryOptions) {
    this.runner = options.runner;
    this.binaries = options.binaries;
    this.scope = options.scope;
    this.escalate = options.escalate;
    this.logger = options.logger;
  }

  private validate(operation: PrivilegedOperation): void {
    const paths: string[] = [];
    switch (operation.kind) {
      case "git-clone":
        paths.push(operation.source, operation.target);
        if (!sameDir(operation.source, this.scope.mirrorDir)) {
          reject(operation, `source must be the mirror ${this.scope.mirrorDir}`);
        }
        if (!sameDir(operation.target, this.scope.targetDir)) {
          reject(operation, `target must be ${this.scope.targetDir}`);
        }
        if (!isSafeBranchName(operation.branch)) {
          reject(operation, `invalid branch name ${operation.branch}`);
        }
        break;
      case "git-fetch":
        paths.push(operation.target);
        if (!sameDir(operation.target, this.scope.targetDir)) {
          reject(operation, `target must be ${this.scope.targetDir}`);
        }
        break;
      case "git-merge-ff":
        paths.push(operation.target);
        if (!sameDir(operation.target, this.scope.targetDir)) {
          reject(operation, `target must be ${this.scope.targetDir}`);
        }
        if (!OBJECT_ID_PATTERN.test(operation.commit)) {
          reject(operation, `not a commit id: ${operation.commit}`);
        }
        break;
      case "mkdir":
      case "chown":
      case "chmod":
        paths.push(operation.path);
        if (!sameDir(operation.path, mirrorParentDir(this.scope.mirrorDir))) {
          reject(operation, `path must be the mirror parent ${mirrorParentDir(this.scope.mirrorDir)}`);
        }
        if (operation.kind === "chown" && !GROUP_PATTERN.test(this.scope.group)) {
          reject(operation, `invalid group name ${this.scope.group}`);
        }
        break;
      case "rebuild":
        paths.push(operation.flakeDir);
        if (!isValidHostname(operation.hostname)) {
          reject(operation, `invalid host name ${operation.hostname}`);
        }
        if (!REBUILD_ACTIONS.includes(operation.action)) {
          reject(operation, `unsupported action ${String(operation.action)}`);
        }
        for (const flag of operation.extraArgs) {
          if (!ALLOWED_REBUILD_FLAGS.has(flag)) {
            reject(operation, `flag not allowed: ${flag}`);
          }
        }
        break;
    }
    for (const entry of paths) {
      if (!path.isAbsolute(entry) || entry.includes("\0")) {
        reject(operation, `path must be absolute: ${entry}`);
      }
    }
  }

  private template(operation: PrivilegedOperation): Invocation {
    const { binaries, scope } = this;
    const trustMirror = ["-c", `safe.directory=${path.resolve(scope.mirrorDir)}`];
    switch (operation.kind) {
      case "git-clone":
        // --no-local: a local clone hardlinks the user-owned mirror objects into root's clone.
        return {
          command: binaries.git,
          args: [
            ...trustMirror,
            "clone",
            "--no-local",
            "--branch",
            operation.branch,
            "--",
            path.resolve(operation.source),
            path.resolve(operation.target)
          ]
        };
      case "git-fetch":
        return {
          command: binaries.git,
          args: ["-C", path.resolve(operation.target), ...trustMirror, "fetch", "--prune", "origin"]
        };
      case "git-merge-ff":
        return {
          command: binaries.git,
          args: ["-C", path.resolve(operation.target), "merge", "--ff-only", operation.commit]
        };
      case "mkdir":
        return { command: binaries.mkdir, args: ["-p", "--", path.resolve(operation.path)] };
      case "chown":
        return {
          command: binaries.chown,
          args: [`root:${scope.group}`, "--", path.resolve(operation.path)]
        };
      case "chmod":
        return {
          command: binaries.chmod,
          args: [MIRROR_PARENT_MODE, "--", path.resolve(operation.path)]
        };
      case "rebuild":
        return {
          command: binaries.nixosRebuild,
          args: [
            operation.action,
            "--flake",
            `${path.resolve(operation.flakeDir)}#${operation.hostname}`,
            ...operation.extraArgs
          ]
        };
    }
  }

  describe(operation: PrivilegedOperation): Invocation {
    this.validate(operation);
    const invocation = this.template(operation);
    if (!this.escalate) {
      return invocation;
    }
    return { command: this.binaries.sudo, args: [invocation.command, ...invocation.args] };
  }

  async execute(
    operation: PrivilegedOperation,
    stdio: StdioMode = "capture"
  ): Promise<CommandResult> {
    const invocation = this.describe(operation);
    this.logger.info(`Running: ${formatCommand(invocation.command, invocation.args)}`);
    const result = await this.runner.run({ ...invocation, stdio });
    if (this.escalate && result.spawnError) {
      throw new RebuildError(
        `Privilege escalation unavailable (${this.binaries.sudo}): ${result.spawnError}`,
        ExitCodes.PrivilegeDenied
      );
    }
    if (this.escalate && !result.ok && SUDO_DENIAL_PATTERNS.some((p) => p.test(result.stderr))) {
      throw new RebuildError(
        `Privilege escalation denied for ${operation.kind}: ${describeFailure(result)}`,
        ExitCodes.PrivilegeDenied
      );
    }
    return result;
  }
}
