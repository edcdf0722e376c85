import test from "node:test";
import assert from "node:assert/strict";
import { existsSync } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import { RebuildError, ExitCodes } from "../src/errors";
import { nodeHostFs } from "../src/filesystem";
import { CliGitClient } from "../src/git";
import { SyncLock } from "../src/lock";
import { lockPathFor } from "../src/paths";
import type { PipelineDeps } from "../src/pipeline";
import { runPipeline } from "../src/pipeline";
import { PrivilegeBoundary } from "../src/privilege";
import { spawnRunner } from "../src/process";
import { createDefaultBinaries } from "../src/templates";
import type { RunConfig } from "../src/types";
import { MemoryLogger, createRunConfig } from "./helpers/fake-world";

function findGit(): string | null {
  for (const dir of (process.env.PATH ?? "").split(path.delimiter)) {
    const candidate = path.join(dir, "git");
    if (dir.length > 0 && existsSync(candidate)) {
      return candidate;
    }
  }
  return null;
}

const gitPath = findGit();

interface Host {
  root: string;
  upstream: string;
  targetDir: string;
  rebuildLog: string;
  config: RunConfig;
  deps: PipelineDeps;
}

async function git(gitBinary: string, cwd: string, ...args: string[]): Promise<string> {
  const result = await spawnRunner.run({
    command: gitBinary,
    args: [
      "-C",
      cwd,
      "-c",
      "user.name=Test",
      "-c",
      "user.email=test@example.test",
      "-c",
      "commit.gpgsign=false",
      ...args
    ]
  });
  assert.ok(result.ok, `git ${args.join(" ")}: ${result.stderr}`);
  return result.stdout.trim();
}

async function commitFile(
  gitBinary: string,
  repo: string,
  file: string,
  content: string
): Promise<string> {
  await fs.mkdir(path.dirname(path.join(repo, file)), { recursive: true });
  await fs.writeFile(path.join(repo, file), content, "utf8");
  await git(gitBinary, repo, "add", "-A");
  await git(gitBinary, repo, "commit", "-q", "-m", `update ${file}`);
  return await git(gitBinary, repo, "rev-parse", "HEAD");
}

async function createHost(gitBinary: string): Promise<Host> {
  const root = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), "rebuild-git-")));
  const upstream = path.join(root, "upstream");
  const mirrorDir = path.join(root, "state", "mirror.git");
  const targetDir = path.join(root, "etc-nixos");
  const rebuildLog = path.join(root, "rebuild.log");
  const stub = path.join(root, "nixos-rebuild");

  await fs.mkdir(upstream);
  await fs.mkdir(path.dirname(mirrorDir));
  await git(gitBinary, upstream, "init", "-q");
  await git(gitBinary, upstream, "symbolic-ref", "HEAD", "refs/heads/main");
  await commitFile(gitBinary, upstream, "hosts/testhost/default.nix", "{ }\n");
  await commitFile(gitBinary, upstream, "flake.nix", "{ outputs = _: { }; }\n");
  await fs.writeFile(stub, `#!/bin/sh\necho "$@" > '${rebuildLog}'\n`, { mode: 0o755 });

  const logger = new MemoryLogger();
  const deps: PipelineDeps = {
    git: new CliGitClient(spawnRunner, gitBinary),
    fs: nodeHostFs,
    privilege: new PrivilegeBoundary({
      runner: spawnRunner,
      binaries: { ...createDefaultBinaries(), git: gitBinary, nixosRebuild: stub },
      scope: { mirrorDir, targetDir, group: "nixos-setup" },
      escalate: false,
      logger
    }),
    logger,
    lock: new SyncLock(lockPathFor(mirrorDir))
  };
  const config = createRunConfig({ targetDir, flakeDir: targetDir, mirrorDir, remote: upstream });
  return { root, upstream, targetDir, rebuildLog, config, deps };
}

async function filesUnder(dir: string): Promise<string[]> {
  const found: string[] = [];
  for (const entry of await fs.readdir(dir, { withFileTypes: true })) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      found.push(...(await filesUnder(full)));
    } else {
      found.push(full);
    }
  }
  return found;
}

void test("bootstraps a real clone that shares no object files with the mirror", { skip: !gitPath }, async () => {
  const gitBinary = gitPath ?? "git";
  const host = await createHost(gitBinary);
  try {
    const head = await git(gitBinary, host.upstream, "rev-parse", "HEAD");

    const result = await runPipeline(host.config, host.deps);

    assert.equal(result.sync, "bootstrapped");
    assert.equal(result.mirrorHead, head);
    assert.equal(await git(gitBinary, host.targetDir, "rev-parse", "HEAD"), head);
    assert.equal(
      await fs.readFile(host.rebuildLog, "utf8"),
      `switch --flake ${host.targetDir}#testhost\n`
    );
    const objects = await filesUnder(path.join(host.targetDir, ".git", "objects"));
    assert.ok(objects.length > 0);
    for (const file of objects) {
      assert.equal((await fs.stat(file)).nlink, 1, file);
    }
  } finally {
    await fs.rm(host.root, { recursive: true, force: true });
  }
});

void test("fast-forwards a real clone to a new upstream commit", { skip: !gitPath }, async () => {
  const gitBinary = gitPath ?? "git";
  const host = await createHost(gitBinary);
  try {
    await runPipeline(host.config, host.deps);
    const next = await commitFile(
      gitBinary,
      host.upstream,
      "hosts/testhost/default.nix",
      "{ networking.hostName = \"testhost\"; }\n"
    );

    const result = await runPipeline(host.config, host.deps);

    assert.equal(result.source, "fetched");
    assert.equal(result.sync, "fast-forwarded");
    assert.equal(await git(gitBinary, host.targetDir, "rev-parse", "HEAD"), next);
    assert.equal(await git(gitBinary, host.targetDir, "status", "--porcelain"), "");
  } finally {
    await fs.rm(host.root, { recursive: true, force: true });
  }
});

void test("refuses to move a real clone whose history has diverged", { skip: !gitPath }, async () => {
  const gitBinary = gitPath ?? "git";
  const host = await createHost(gitBinary);
  try {
    await runPipeline(host.config, host.deps);
    const local = await commitFile(gitBinary, host.targetDir, "local.nix", "{ }\n");
    await commitFile(gitBinary, host.upstream, "remote.nix", "{ }\n");

    await assert.rejects(
      () => runPipeline(host.config, host.deps),
      (error) => {
        assert.ok(error instanceof RebuildError);
        assert.equal(error.code, ExitCodes.Diverged);
        return true;
      }
    );
    assert.equal(await git(gitBinary, host.targetDir, "rev-parse", "HEAD"), local);
    assert.equal(existsSync(lockPathFor(host.config.mirrorDir)), false);
  } finally {
    await fs.rm(host.root, { recursive: true, force: true });
  }
});
