import { RebuildError, ExitCodes } from "./errors";
import { REBUILD_ACTIONS } from "./types";
import type { RebuildAction } from "./types";

export interface ParsedArgs {
  hostname?: string;
  mirror: boolean;
  noMirror: boolean;
  mirrorDir?: string;
  offlineOk: boolean;
  dev: boolean;
  devCheckout?: string;
  flake?: string;
  branch?: string;
  remote?: string;
  action: RebuildAction;
  passthrough: string[];
  status: boolean;
  initConfig: boolean;
  help: boolean;
}

function isRebuildAction(value: string): value is RebuildAction {
  return REBUILD_ACTIONS.some((action) => action === value);
}

function requireValue(args: string[], index: number, flag: string): string {
  const value = args[index + 1];
  if (value === undefined || value.startsWith("-")) {
    throw new RebuildError(`${flag} requires a value`, ExitCodes.Usage);
  }
  return value;
}

export function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);
  const result: ParsedArgs = {
    mirror: false,
    noMirror: false,
    offlineOk: false,
    dev: false,
    action: "switch",
    passthrough: [],
    status: false,
    initConfig: false,
    help: false
  };

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    if (arg === "--") {
      result.passthrough = args.slice(i + 1);
      break;
    }
    if (!arg.startsWith("-")) {
      if (result.hostname !== undefined) {
        throw new RebuildError(`Unexpected argument: ${arg}`, ExitCodes.Usage);
      }
      result.hostname = arg;
      continue;
    }
    switch (arg) {
      case "--mirror":
        result.mirror = true;
        break;
      case "--no-mirror":
        result.noMirror = true;
        break;
      case "--mirror-dir":
        result.mirrorDir = requireValue(args, i, arg);
        i += 1;
        break;
      case "--offline-ok":
        result.offlineOk = true;
        break;
      case "--dev":
        result.dev = true;
        break;
      case "--dev-checkout":
        result.devCheckout = requireValue(args, i, arg);
        i += 1;
        break;
      case "--flake":
        result.flake = requireValue(args, i, arg);
        i += 1;
        break;
      case "--branch":
        result.branch = requireValue(args, i, arg);
        i += 1;
        break;
      case "--remote":
        result.remote = requireValue(args, i, arg);
        i += 1;
        break;
      case "--action": {
        const value = requireValue(args, i, arg);
        if (!isRebuildAction(value)) {
          throw new RebuildError(
            `Unknown action: ${value} (expected ${REBUILD_ACTIONS.join(" | ")})`,
            ExitCodes.Usage
          );
        }
        result.action = value;
        i += 1;
        break;
      }
      case "--status":
        result.status = true;
        break;
      case "--init-config":
        result.initConfig = true;
        break;
      case "--help":
      case "-h":
        result.help = true;
        break;
      default:
        throw new RebuildError(`Unknown option: ${arg}`, ExitCodes.Usage);
    }
  }

  if (result.mirror && result.noMirror) {
    throw new RebuildError("--mirror and --no-mirror cannot be combined", ExitCodes.Usage);
  }

  return result;
}

export function helpText(): string {
  const lines = [
    "rebuild [options] [hostname] [-- nixos-rebuild flags]",
    "",
    "Fetches the configuration into a local mirror as you, fast-forwards",
    "/etc/nixos from that mirror as root, then runs nixos-rebuild for the host.",
    "The host name defaults to the contents of /etc/hostname.",
    "",
    "Options:",
    "  --mirror               Sync even when --flake points away from the target",
    "  --no-mirror            Skip the sync and rebuild from the flake directory as is",
    "  --mirror-dir <path>    Mirror location (default /var/lib/nixos-setup/mirror.git)",
    "  --offline-ok           Continue with the existing mirror when the fetch fails",
    "  --dev                  Push the development checkout into the mirror when the fetch fails",
    "  --dev-checkout <path>  Development checkout for --dev (default: enclosing flake checkout)",
    "  --flake <path>         Flake directory to rebuild from (default: the target)",
    "  --branch <name>        Tracked branch (default main)",
    "  --remote <url>         Remote used to create the mirror",
    `  --action <name>        ${REBUILD_ACTIONS.join(" | ")} (default switch)`,
    "  --status               Show mirror and target state, change nothing",
    "  --init-config          Write the default settings file",
    "  -h, --help             Show help",
    "",
    "Flags after -- are passed to nixos-rebuild (--show-trace, -L and similar only).",
    "",
    "Exit codes:",
    "  0 success, 64 usage, 65 diverged history, 66 dirty target, 69 fetch failed,",
    "  74 sync step failed, 75 locked, 77 privilege denied, 78 configuration missing;",
    "  otherwise the exit code of nixos-rebuild."
  ];
  return lines.join("\n");
}
