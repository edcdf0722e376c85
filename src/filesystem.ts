import fs from "fs/promises";

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === "object" && error !== null && "code" in error;
}

export interface HostFs {
  exists(target: string): Promise<boolean>;
  isEmptyDirectory(target: string): Promise<boolean>;
  modifiedAt(target: string): Promise<Date | null>;
}

export async function fileExists(target: string): Promise<boolean> {
  try {
    await fs.lstat(target);
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return false;
    }
    throw error;
  }
}

export async function isEmptyDirectory(target: string): Promise<boolean> {
  try {
    const entries = await fs.readdir(target);
    return entries.length === 0;
  } catch (error) {
    if (isErrnoException(error) && (error.code === "ENOENT" || error.code === "ENOTDIR")) {
      return false;
    }
    throw error;
  }
}

export async function modifiedAt(target: string): Promise<Date | null> {
  try {
    const stat = await fs.stat(target);
    return stat.mtime;
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return null;
    }
    throw error;
  }
}

export const nodeHostFs: HostFs = {
  exists: fileExists,
  isEmptyDirectory,
  modifiedAt
};
