import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import { parseArgs } from "../src/args";
import { readSettings, writeSettings } from "../src/config";
import { RebuildError, ExitCodes } from "../src/errors";
import { readHostname, resolveHostname } from "../src/hostname";
import { defaultSettingsPath, findFlakeCheckout, lockPathFor, resolvePath } from "../src/paths";
import { buildRunConfig } from "../src/run-config";
import { createDefaultBinaries, createDefaultSettings } from "../src/templates";
import type { RebuildSettings } from "../src/types";

async function withTempDir<T>(fn: (root: string) => Promise<T>): Promise<T> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), "rebuild-"));
  try {
    return await fn(root);
  } finally {
    await fs.rm(root, { recursive: true, force: true });
  }
}

function expectCode(code: number, message?: RegExp): (error: unknown) => boolean {
  return (error) => {
    assert.ok(error instanceof RebuildError);
    assert.equal(error.code, code);
    if (message) {
      assert.match(error.message, message);
    }
    return true;
  };
}

const env = { HOME: "/home/operator" };

async function settingsWithHost(root: string, contents = "testhost\n"): Promise<RebuildSettings> {
  const hostnameFile = path.join(root, "hostname");
  await fs.writeFile(hostnameFile, contents, "utf8");
  return { ...createDefaultSettings(), hostnameFile };
}

void test("writeSettings and readSettings round trip", async () => {
  await withTempDir(async (root) => {
    const settingsPath = path.join(root, "rebuild", "config.yml");
    const settings = createDefaultSettings();
    await writeSettings(settingsPath, settings);

    assert.deepEqual(await readSettings(settingsPath), settings);
    const raw = await fs.readFile(settingsPath, "utf8");
    assert.match(raw, /version:\s*1/);
  });
});

void test("writeSettings never overwrites an existing file", async () => {
  await withTempDir(async (root) => {
    const settingsPath = path.join(root, "config.yml");
    await fs.writeFile(settingsPath, "version: 1\nbranch: release\n", "utf8");

    await assert.rejects(() => writeSettings(settingsPath, createDefaultSettings()));
    assert.equal(await fs.readFile(settingsPath, "utf8"), "version: 1\nbranch: release\n");
  });
});

void test("readSettings falls back to defaults for a missing or empty file", async () => {
  await withTempDir(async (root) => {
    assert.deepEqual(await readSettings(path.join(root, "absent.yml")), createDefaultSettings());

    const emptyPath = path.join(root, "empty.yml");
    await fs.writeFile(emptyPath, "", "utf8");
    assert.deepEqual(await readSettings(emptyPath), createDefaultSettings());
  });
});

void test("readSettings merges a partial file over the defaults", async () => {
  await withTempDir(async (root) => {
    const settingsPath = path.join(root, "config.yml");
    await fs.writeFile(
      settingsPath,
      [
        "version: 1",
        "remote: https://example.test/ops/nixos-config.git",
        "hostsDir: null",
        "binaries:",
        "  git: /usr/bin/git",
        ""
      ].join("\n"),
      "utf8"
    );

    const settings = await readSettings(settingsPath);

    assert.equal(settings.remote, "https://example.test/ops/nixos-config.git");
    assert.equal(settings.hostsDir, null);
    assert.equal(settings.branch, "main");
    assert.deepEqual(settings.binaries, { ...createDefaultBinaries(), git: "/usr/bin/git" });
  });
});

void test("readSettings rejects bad values", async () => {
  await withTempDir(async (root) => {
    const settingsPath = path.join(root, "config.yml");

    await fs.writeFile(settingsPath, "version: 2\n", "utf8");
    await assert.rejects(
      () => readSettings(settingsPath),
      expectCode(ExitCodes.Configuration, /^Unsupported settings version 2 in /)
    );

    await fs.writeFile(settingsPath, "version: 1\nbranch: 5\n", "utf8");
    await assert.rejects(
      () => readSettings(settingsPath),
      expectCode(ExitCodes.Configuration, /^Invalid settings format in /)
    );

    await fs.writeFile(settingsPath, "version: 1\nbinaries:\n  sudo: sudo\n", "utf8");
    await assert.rejects(
      () => readSettings(settingsPath),
      expectCode(ExitCodes.Configuration, /^Binary path for sudo must be absolute: sudo$/)
    );
  });
});

void test("readHostname strips whitespace and resolveHostname validates", async () => {
  await withTempDir(async (root) => {
    const hostnameFile = path.join(root, "hostname");
    await fs.writeFile(hostnameFile, "  testhost \n", "utf8");

    assert.equal(await readHostname(hostnameFile), "testhost");
    assert.equal(await readHostname(path.join(root, "missing")), null);
    assert.equal(await resolveHostname(undefined, hostnameFile), "testhost");
    assert.equal(await resolveHostname("otherhost", hostnameFile), "otherhost");

    const missing = path.join(root, "missing");
    await assert.rejects(
      () => resolveHostname(undefined, missing),
      (error) => {
        assert.ok(error instanceof RebuildError);
        assert.equal(error.code, ExitCodes.Configuration);
        assert.equal(error.message, `Host name is required and could not be inferred from ${missing}`);
        return true;
      }
    );
    await assert.rejects(
      () => resolveHostname("bad_host", hostnameFile),
      expectCode(ExitCodes.Configuration, /^Invalid host name: bad_host$/)
    );
  });
});

void test("paths expand variables and home", () => {
  assert.equal(
    resolvePath("${XDG_CONFIG_HOME:-~/.config}/rebuild", env, "/"),
    "/home/operator/.config/rebuild"
  );
  assert.equal(resolvePath("mirror.git", env, "/srv"), "/srv/mirror.git");
  assert.equal(defaultSettingsPath(env, "/tmp"), "/home/operator/.config/rebuild/config.yml");
  assert.equal(
    defaultSettingsPath({ ...env, XDG_CONFIG_HOME: "/etc/xdg" }, "/tmp"),
    "/etc/xdg/rebuild/config.yml"
  );
  assert.equal(defaultSettingsPath({ ...env, REBUILD_CONFIG: "cfg.yml" }, "/srv"), "/srv/cfg.yml");
  assert.equal(lockPathFor("/var/lib/nixos-setup/mirror.git"), "/var/lib/nixos-setup/rebuild.lock");
});

void test("findFlakeCheckout walks up to the enclosing checkout", async () => {
  await withTempDir(async (root) => {
    const checkout = path.join(root, "nixos-config");
    const nested = path.join(checkout, "hosts", "testhost");
    await fs.mkdir(nested, { recursive: true });
    await fs.mkdir(path.join(checkout, ".git"));
    await fs.writeFile(path.join(checkout, "flake.nix"), "{ }\n", "utf8");

    assert.equal(findFlakeCheckout(nested), checkout);
    assert.equal(findFlakeCheckout(root), null);
  });
});

void test("buildRunConfig fills in defaults from settings", async () => {
  await withTempDir(async (root) => {
    const settings = await settingsWithHost(root);
    const config = await buildRunConfig(
      parseArgs(["node", "rebuild", "--", "--show-trace"]),
      settings,
      { env, cwd: "/", isRoot: false }
    );

    assert.deepEqual(config, {
      hostname: "testhost",
      flakeDir: "/etc/nixos",
      targetDir: "/etc/nixos",
      mirrorDir: "/var/lib/nixos-setup/mirror.git",
      remote: null,
      branch: "main",
      group: "nixos-setup",
      devCheckout: null,
      hostsDir: "hosts",
      flags: { mirrorMode: false, devMode: false, offlineOk: false, noMirror: false },
      action: "switch",
      extraArgs: ["--show-trace"],
      isRoot: false
    });
  });
});

void test("buildRunConfig lets flags win over settings", async () => {
  await withTempDir(async (root) => {
    const settings = await settingsWithHost(root);
    const config = await buildRunConfig(
      parseArgs([
        "node",
        "rebuild",
        "otherhost",
        "--flake",
        "~/src/nixos-config",
        "--mirror-dir",
        "/srv/mirror.git",
        "--branch",
        "release",
        "--dev-checkout",
        "~/src/nixos-config",
        "--dev",
        "--mirror",
        "--action",
        "boot"
      ]),
      settings,
      { env, cwd: "/", isRoot: false }
    );

    assert.equal(config.hostname, "otherhost");
    assert.equal(config.flakeDir, "/home/operator/src/nixos-config");
    assert.equal(config.devCheckout, "/home/operator/src/nixos-config");
    assert.equal(config.mirrorDir, "/srv/mirror.git");
    assert.equal(config.branch, "release");
    assert.equal(config.action, "boot");
    assert.deepEqual(config.flags, {
      mirrorMode: true,
      devMode: true,
      offlineOk: false,
      noMirror: false
    });
  });
});

void test("buildRunConfig rejects unsafe input", async () => {
  await withTempDir(async (root) => {
    const settings = await settingsWithHost(root);
    const environment = { env, cwd: root, isRoot: false };

    await assert.rejects(
      () => buildRunConfig(parseArgs(["node", "rebuild", "--", "--impure"]), settings, environment),
      expectCode(ExitCodes.Usage, /^nixos-rebuild flags not allowed: --impure /)
    );
    await assert.rejects(
      () => buildRunConfig(parseArgs(["node", "rebuild", "--branch", "a..b"]), settings, environment),
      expectCode(ExitCodes.Usage, /^Invalid branch name: a\.\.b$/)
    );
    await assert.rejects(
      () => buildRunConfig(parseArgs(["node", "rebuild", "--dev", "--no-mirror"]), settings, environment),
      expectCode(ExitCodes.Usage)
    );
    await assert.rejects(
      () => buildRunConfig(parseArgs(["node", "rebuild", "--dev"]), settings, environment),
      expectCode(ExitCodes.Configuration, /^--dev needs a development checkout/)
    );
  });
});
