import type { CommandResult, CommandRunner } from "./process";

// safe.directory is passed per call so reads of root-owned clones work without the user's global config.
export interface GitClient {
  isBareRepository(dir: string): Promise<boolean>;
  workTreeRoot(dir: string): Promise<string | null>;
  resolveCommit(repo: string, ref: string): Promise<string | null>;
  isAncestor(repo: string, ancestor: string, descendant: string): Promise<boolean>;
  currentBranch(repo: string): Promise<string | null>;
  isClean(repo: string): Promise<boolean>;
  remoteUrl(repo: string, remote: string): Promise<string | null>;
  hasPath(repo: string, commit: string, treePath: string): Promise<boolean>;
  canReach(remote: string): Promise<boolean>;
  cloneMirror(remote: string, mirrorDir: string): Promise<CommandResult>;
  initBareMirror(mirrorDir: string, remote: string | null): Promise<CommandResult>;
  fetchMirror(mirrorDir: string): Promise<CommandResult>;
  pushBranch(checkout: string, destination: string, branch: string): Promise<CommandResult>;
}

export class CliGitClient implements GitClient {
  private readonly runner: CommandRunner;
  private readonly binary: string;

  constructor(runner: CommandRunner, binary = "git") {
    this.runner = runner;
    this.binary = binary;
  }

  private async git(repo: string | null, args: string[]): Promise<CommandResult> {
    const env: Record<string, string> = { GIT_TERMINAL_PROMPT: "0" };
    if (repo) {
      env.GIT_CONFIG_COUNT = "1";
      env.GIT_CONFIG_KEY_0 = "safe.directory";
      env.GIT_CONFIG_VALUE_0 = repo;
    }
    const fullArgs = repo ? ["-C", repo, ...args] : args;
    return await this.runner.run({ command: this.binary, args: fullArgs, env });
  }

  private async read(repo: string, args: string[]): Promise<string | null> {
    const result = await this.git(repo, args);
    return result.ok ? result.stdout.trim() : null;
  }

  async isBareRepository(dir: string): Promise<boolean> {
    return (await this.read(dir, ["rev-parse", "--is-bare-repository"])) === "true";
  }

  async workTreeRoot(dir: string): Promise<string | null> {
    const root = await this.read(dir, ["rev-parse", "--show-toplevel"]);
    return root && root.length > 0 ? root : null;
  }

  async resolveCommit(repo: string, ref: string): Promise<string | null> {
    const sha = await this.read(repo, ["rev-parse", "--verify", "--quiet", `${ref}^{commit}`]);
    return sha && sha.length > 0 ? sha : null;
  }

  async isAncestor(repo: string, ancestor: string, descendant: string): Promise<boolean> {
    const result = await this.git(repo, ["merge-base", "--is-ancestor", ancestor, descendant]);
    return result.ok;
  }

  async currentBranch(repo: string): Promise<string | null> {
    const branch = await this.read(repo, ["symbolic-ref", "--quiet", "--short", "HEAD"]);
    return branch && branch.length > 0 ? branch : null;
  }

  async isClean(repo: string): Promise<boolean> {
    const result = await this.git(repo, ["--no-optional-locks", "status", "--porcelain=v1"]);
    return result.ok && result.stdout.trim().length === 0;
  }

  async remoteUrl(repo: string, remote: string): Promise<string | null> {
    const url = await this.read(repo, ["remote", "get-url", remote]);
    return url && url.length > 0 ? url : null;
  }

  async hasPath(repo: string, commit: string, treePath: string): Promise<boolean> {
    const result = await this.git(repo, ["cat-file", "-e", `${commit}:${treePath}`]);
    return result.ok;
  }

  async canReach(remote: string): Promise<boolean> {
    const result = await this.git(null, ["ls-remote", "--heads", "--", remote]);
    return result.ok;
  }

  async cloneMirror(remote: string, mirrorDir: string): Promise<CommandResult> {
    return await this.git(null, [
      "clone",
      "--mirror",
      "--config",
      "core.sharedRepository=group",
      "--",
      remote,
      mirrorDir
    ]);
  }

  async initBareMirror(mirrorDir: string, remote: string | null): Promise<CommandResult> {
    const init = await this.git(null, ["init", "--bare", "--shared=group", "--", mirrorDir]);
    if (!init.ok || !remote) {
      return init;
    }
    return await this.git(mirrorDir, ["remote", "add", "--mirror=fetch", "origin", remote]);
  }

  async fetchMirror(mirrorDir: string): Promise<CommandResult> {
    return await this.git(mirrorDir, ["fetch", "--prune", "origin"]);
  }

  async pushBranch(checkout: string, destination: string, branch: string): Promise<CommandResult> {
    return await this.git(checkout, ["push", destination, `HEAD:refs/heads/${branch}`]);
  }
}
