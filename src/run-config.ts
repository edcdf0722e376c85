import type { ParsedArgs } from "./args";
import { RebuildError, ExitCodes } from "./errors";
import { resolveHostname } from "./hostname";
import { findFlakeCheckout, resolvePath } from "./paths";
import { ALLOWED_REBUILD_FLAGS, isSafeBranchName } from "./privilege";
import type { RebuildSettings, RunConfig } from "./types";

export interface CliEnvironment {
  env: NodeJS.ProcessEnv;
  cwd: string;
  isRoot: boolean;
}

function resolveDevCheckout(
  args: ParsedArgs,
  settings: RebuildSettings,
  environment: CliEnvironment
): string | null {
  const configured = args.devCheckout ?? settings.devCheckout;
  if (configured) {
    return resolvePath(configured, environment.env, environment.cwd);
  }
  return args.dev ? findFlakeCheckout(environment.cwd) : null;
}

export async function buildRunConfig(
  args: ParsedArgs,
  settings: RebuildSettings,
  environment: CliEnvironment
): Promise<RunConfig> {
  const { env, cwd } = environment;
  const resolve = (input: string): string => resolvePath(input, env, cwd);

  const hostname = await resolveHostname(args.hostname, resolve(settings.hostnameFile));

  const branch = args.branch ?? settings.branch;
  if (!isSafeBranchName(branch)) {
    throw new RebuildError(`Invalid branch name: ${branch}`, ExitCodes.Usage);
  }

  const disallowed = args.passthrough.filter((flag) => !ALLOWED_REBUILD_FLAGS.has(flag));
  if (disallowed.length > 0) {
    throw new RebuildError(
      `nixos-rebuild flags not allowed: ${disallowed.join(" ")} (allowed: ${Array.from(ALLOWED_REBUILD_FLAGS).join(" ")})`,
      ExitCodes.Usage
    );
  }

  if (args.dev && args.noMirror) {
    throw new RebuildError("--dev has no effect with --no-mirror", ExitCodes.Usage);
  }

  const targetDir = resolve(settings.targetDir);
  const devCheckout = resolveDevCheckout(args, settings, environment);
  if (args.dev && !devCheckout) {
    throw new RebuildError(
      "--dev needs a development checkout: pass --dev-checkout or run from inside one",
      ExitCodes.Configuration
    );
  }

  return {
    hostname,
    flakeDir: args.flake ? resolve(args.flake) : targetDir,
    targetDir,
    mirrorDir: resolve(args.mirrorDir ?? settings.mirrorDir),
    remote: args.remote ?? settings.remote,
    branch,
    group: settings.group,
    devCheckout,
    hostsDir: settings.hostsDir,
    flags: {
      mirrorMode: args.mirror,
      devMode: args.dev,
      offlineOk: args.offlineOk,
      noMirror: args.noMirror
    },
    action: args.action,
    extraArgs: args.passthrough,
    isRoot: environment.isRoot
  };
}
