import { mkdir, readFile, rename, unlink, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { randomBytes } from "node:crypto";
import { StateStoreError, errorMessage, isErrnoException } from "./errors.ts";

/** Prefix for in-flight temp files. Readers skip anything starting with it. */
export const TEMP_PREFIX = ".tmp-";

/**
 * Write a file by writing a sibling temp file and renaming it into place,
 * so readers never observe partially written content.
 */
export async function writeFileAtomic(
  filePath: string,
  content: string,
): Promise<void> {
  const dir = dirname(filePath);
  const tempPath = join(
    dir,
    `${TEMP_PREFIX}${basename(filePath)}-${process.pid}-${randomBytes(4).toString("hex")}`,
  );
  try {
    await mkdir(dir, { recursive: true });
    await writeFile(tempPath, content, "utf-8");
    await rename(tempPath, filePath);
  } catch (err: unknown) {
    // Temp file may never have been created
    await unlink(tempPath).catch(() => undefined);
    throw new StateStoreError(
      `Failed to write: ${filePath}: ${errorMessage(err)}`,
      "WRITE_FAILED",
      filePath,
    );
  }
}

export async function writeJsonAtomic(
  filePath: string,
  data: unknown,
): Promise<void> {
  await writeFileAtomic(filePath, JSON.stringify(data, null, 2) + "\n");
}

/**
 * Read and parse a JSON file.
 * Throws StateStoreError: NOT_FOUND when the file does not exist,
 * READ_FAILED or PARSE_ERROR otherwise.
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(filePath, "utf-8");
  } catch (err: unknown) {
    if (isErrnoException(err) && err.code === "ENOENT") {
      throw new StateStoreError(`Not found: ${filePath}`, "NOT_FOUND", filePath);
    }
    throw new StateStoreError(
      `Failed to read: ${filePath}`,
      "READ_FAILED",
      filePath,
    );
  }

  try {
    return JSON.parse(content);
  } catch {
    throw new StateStoreError(
      `Invalid JSON in ${filePath}`,
      "PARSE_ERROR",
      filePath,
    );
  }
}
