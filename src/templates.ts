import { DEFAULT_HOSTNAME_FILE, DEFAULT_MIRROR_DIR, DEFAULT_TARGET_DIR } from "./paths";
import type { PrivilegedBinaries, RebuildSettings } from "./types";

const SYSTEM_BIN = "/run/current-system/sw/bin";

export function createDefaultBinaries(): PrivilegedBinaries {
  return {
    sudo: "/run/wrappers/bin/sudo",
    git: `${SYSTEM_BIN}/git`,
    mkdir: `${SYSTEM_BIN}/mkdir`,
    chown: `${SYSTEM_BIN}/chown`,
    chmod: `${SYSTEM_BIN}/chmod`,
    nixosRebuild: `${SYSTEM_BIN}/nixos-rebuild`
  };
}

export function createDefaultSettings(): RebuildSettings {
  return {
    version: 1,
    remote: null,
    branch: "main",
    mirrorDir: DEFAULT_MIRROR_DIR,
    targetDir: DEFAULT_TARGET_DIR,
    group: "nixos-setup",
    devCheckout: null,
    hostsDir: "hosts",
    hostnameFile: DEFAULT_HOSTNAME_FILE,
    binaries: createDefaultBinaries()
  };
}
