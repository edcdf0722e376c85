#!/usr/bin/env node
import { helpText, parseArgs } from "./args";
import { readSettings, writeSettings } from "./config";
import { RebuildError, ExitCodes } from "./errors";
import { fileExists, nodeHostFs } from "./filesystem";
import { CliGitClient } from "./git";
import { SyncLock } from "./lock";
import { consoleLogger } from "./logger";
import { defaultSettingsPath, lockPathFor, resolvePath } from "./paths";
import { createMirrorStore, createTargetManager, runPipeline } from "./pipeline";
import type { PipelineDeps } from "./pipeline";
import { PrivilegeBoundary } from "./privilege";
import { spawnRunner } from "./process";
import { buildRunConfig } from "./run-config";
import { formatStatus, getStatus } from "./status";
import { createDefaultSettings } from "./templates";
import type { RebuildSettings } from "./types";

function isRootUser(): boolean {
  return typeof process.geteuid === "function" && process.geteuid() === 0;
}

function createDeps(
  settings: RebuildSettings,
  scope: { mirrorDir: string; targetDir: string },
  isRoot: boolean
): PipelineDeps {
  return {
    git: new CliGitClient(spawnRunner),
    fs: nodeHostFs,
    privilege: new PrivilegeBoundary({
      runner: spawnRunner,
      binaries: settings.binaries,
      scope: { ...scope, group: settings.group },
      escalate: !isRoot,
      logger: consoleLogger
    }),
    logger: consoleLogger,
    lock: new SyncLock(lockPathFor(scope.mirrorDir))
  };
}

interface StatusScope {
  mirrorDir: string;
  targetDir: string;
  remote: string | null;
  branch: string;
}

async function showStatus(
  settings: RebuildSettings,
  scope: StatusScope,
  isRoot: boolean
): Promise<void> {
  const deps = createDeps(settings, scope, isRoot);
  const status = await getStatus(
    createMirrorStore(scope, deps),
    createTargetManager(scope, deps),
    deps.git
  );
  formatStatus(status).forEach((line) => console.log(line));
}

async function run(): Promise<number> {
  const args = parseArgs(process.argv);
  if (args.help) {
    console.log(helpText());
    return ExitCodes.Success;
  }

  const env = process.env;
  const cwd = process.cwd();
  const settingsPath = defaultSettingsPath(env, cwd);

  if (args.initConfig) {
    if (await fileExists(settingsPath)) {
      throw new RebuildError(`Settings already exist: ${settingsPath}`, ExitCodes.Configuration);
    }
    await writeSettings(settingsPath, createDefaultSettings());
    console.log(`Created ${settingsPath}`);
    return ExitCodes.Success;
  }

  const settings = await readSettings(settingsPath);
  const isRoot = isRootUser();

  if (args.status) {
    await showStatus(
      settings,
      {
        mirrorDir: resolvePath(args.mirrorDir ?? settings.mirrorDir, env, cwd),
        targetDir: resolvePath(settings.targetDir, env, cwd),
        remote: args.remote ?? settings.remote,
        branch: args.branch ?? settings.branch
      },
      isRoot
    );
    return ExitCodes.Success;
  }

  const config = await buildRunConfig(args, settings, { env, cwd, isRoot });
  const deps = createDeps(settings, config, isRoot);
  const result = await runPipeline(config, deps);
  if (result.exitCode !== 0) {
    consoleLogger.error(`nixos-rebuild ${config.action} exited with ${result.exitCode}`);
  }
  return result.exitCode;
}

run()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (error instanceof RebuildError) {
      console.error(error.message);
      process.exit(error.code);
    }
    if (error instanceof Error) {
      console.error(error.message);
    } else {
      console.error("Unexpected error");
    }
    process.exit(ExitCodes.Failure);
  });
