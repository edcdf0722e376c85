import fs from "fs/promises";
import path from "path";
import { parse as parseYaml, stringify as stringifyYaml, YAMLError } from "yaml";
import { RebuildError, ExitCodes } from "./errors";
import { isErrnoException } from "./filesystem";
import { createDefaultSettings } from "./templates";
import type { PrivilegedBinaries, RebuildSettings } from "./types";

type NullableStringKey = "remote" | "devCheckout" | "hostsDir";
type StringKey = "branch" | "mirrorDir" | "targetDir" | "group" | "hostnameFile";

const NULLABLE_STRING_KEYS: readonly NullableStringKey[] = ["remote", "devCheckout", "hostsDir"];
const STRING_KEYS: readonly StringKey[] = [
  "branch",
  "mirrorDir",
  "targetDir",
  "group",
  "hostnameFile"
];
const BINARY_KEYS: readonly (keyof PrivilegedBinaries)[] = [
  "sudo",
  "git",
  "mkdir",
  "chown",
  "chmod",
  "nixosRebuild"
];

export type SettingsFile = Partial<Omit<RebuildSettings, "binaries">> & {
  version: number;
  binaries?: Partial<PrivilegedBinaries>;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isOptionalString(value: unknown): boolean {
  return value === undefined || typeof value === "string";
}

function isOptionalNullableString(value: unknown): boolean {
  return value === undefined || value === null || typeof value === "string";
}

function isBinaries(value: unknown): value is Partial<PrivilegedBinaries> {
  if (!isRecord(value)) {
    return false;
  }
  return BINARY_KEYS.every((key) => isOptionalString(value[key]));
}

function isSettingsFile(value: unknown): value is SettingsFile {
  if (!isRecord(value)) {
    return false;
  }
  if (typeof value.version !== "number") {
    return false;
  }
  if (!STRING_KEYS.every((key) => isOptionalString(value[key]))) {
    return false;
  }
  if (!NULLABLE_STRING_KEYS.every((key) => isOptionalNullableString(value[key]))) {
    return false;
  }
  if (value.binaries !== undefined && !isBinaries(value.binaries)) {
    return false;
  }
  return true;
}

function formatYamlError(error: unknown, settingsPath: string): RebuildError {
  if (error instanceof YAMLError) {
    const linePos = error.linePos?.[0];
    const location = linePos ? ` (line ${linePos.line}, col ${linePos.col})` : "";
    return new RebuildError(
      `Invalid YAML in ${settingsPath}${location}: ${error.message}`,
      ExitCodes.Configuration
    );
  }
  if (error instanceof Error) {
    return new RebuildError(
      `Invalid YAML in ${settingsPath}: ${error.message}`,
      ExitCodes.Configuration
    );
  }
  return new RebuildError(`Invalid YAML in ${settingsPath}`, ExitCodes.Configuration);
}

export function mergeSettings(file: SettingsFile): RebuildSettings {
  const defaults = createDefaultSettings();
  const binaries: PrivilegedBinaries = { ...defaults.binaries };
  for (const key of BINARY_KEYS) {
    const value = file.binaries?.[key];
    if (value !== undefined) {
      if (!path.isAbsolute(value)) {
        throw new RebuildError(
          `Binary path for ${key} must be absolute: ${value}`,
          ExitCodes.Configuration
        );
      }
      binaries[key] = value;
    }
  }
  return {
    version: file.version,
    remote: file.remote === undefined ? defaults.remote : file.remote,
    branch: file.branch ?? defaults.branch,
    mirrorDir: file.mirrorDir ?? defaults.mirrorDir,
    targetDir: file.targetDir ?? defaults.targetDir,
    group: file.group ?? defaults.group,
    devCheckout: file.devCheckout === undefined ? defaults.devCheckout : file.devCheckout,
    hostsDir: file.hostsDir === undefined ? defaults.hostsDir : file.hostsDir,
    hostnameFile: file.hostnameFile ?? defaults.hostnameFile,
    binaries
  };
}

export async function readSettings(settingsPath: string): Promise<RebuildSettings> {
  let raw: string;
  try {
    raw = await fs.readFile(settingsPath, "utf8");
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return createDefaultSettings();
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(raw, { prettyErrors: true });
  } catch (error) {
    throw formatYamlError(error, settingsPath);
  }

  if (parsed === null || parsed === undefined) {
    return createDefaultSettings();
  }
  if (!isSettingsFile(parsed)) {
    throw new RebuildError(`Invalid settings format in ${settingsPath}`, ExitCodes.Configuration);
  }
  if (parsed.version !== 1) {
    throw new RebuildError(
      `Unsupported settings version ${parsed.version} in ${settingsPath}`,
      ExitCodes.Configuration
    );
  }

  return mergeSettings(parsed);
}

export async function writeSettings(
  settingsPath: string,
  settings: RebuildSettings
): Promise<void> {
  const contents = stringifyYaml(settings);
  await fs.mkdir(path.dirname(settingsPath), { recursive: true });
  await fs.writeFile(settingsPath, contents, { encoding: "utf8", flag: "wx" });
}
