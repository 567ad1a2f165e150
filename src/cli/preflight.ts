import { mkdir, stat } from "node:fs/promises";
import type { Logger } from "pino";

import { ConfigurationError, IOError } from "../core/errors.js";

async function kindOf(path: string): Promise<"file" | "directory" | "other" | undefined> {
  try {
    const s = await stat(path);
    return s.isFile() ? "file" : s.isDirectory() ? "directory" : "other";
  } catch (e) {
    if (isErrnoException(e) && e.code === "ENOENT") return undefined;
    throw new IOError(path, "cannot stat", { cause: e });
  }
}

function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && "code" in e;
}

export async function requireDirectory(path: string, label: string): Promise<void> {
  if ((await kindOf(path)) !== "directory") {
    throw new ConfigurationError(`${label} directory ${path} does not exist`);
  }
}

export async function requireFile(path: string, label: string): Promise<void> {
  if ((await kindOf(path)) !== "file") {
    throw new ConfigurationError(`${label} file ${path} does not exist`);
  }
}

/** Creates the export directory when missing. Returns true if it was created. */
export async function ensureDirectory(path: string, logger: Logger): Promise<boolean> {
  if ((await kindOf(path)) === "directory") return false;
  try {
    await mkdir(path, { recursive: true });
  } catch (e) {
    throw new IOError(path, "cannot create directory", { cause: e });
  }
  logger.info({ dir: path }, "export directory created");
  return true;
}
