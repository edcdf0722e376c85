import fs from "fs/promises";
import { RebuildError, ExitCodes } from "./errors";
import { isErrnoException } from "./filesystem";

const HOSTNAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9-]*(\.[A-Za-z0-9-]+)*$/;

export function isValidHostname(value: string): boolean {
  return value.length <= 253 && HOSTNAME_PATTERN.test(value);
}

export async function readHostname(hostnameFile: string): Promise<string | null> {
  let raw: string;
  try {
    raw = await fs.readFile(hostnameFile, "utf8");
  } catch (error) {
    if (isErrnoException(error)) {
      return null;
    }
    throw error;
  }
  const host = raw.replace(/\s+/g, "");
  return host.length > 0 ? host : null;
}

export async function resolveHostname(
  explicit: string | undefined,
  hostnameFile: string
): Promise<string> {
  const hostname = explicit ?? (await readHostname(hostnameFile));
  if (!hostname) {
    throw new RebuildError(
      `Host name is required and could not be inferred from ${hostnameFile}`,
      ExitCodes.Configuration
    );
  }
  if (!isValidHostname(hostname)) {
    throw new RebuildError(`Invalid host name: ${hostname}`, ExitCodes.Configuration);
  }
  return hostname;
}
