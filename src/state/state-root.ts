import type { Stats } from "node:fs";
import { access, constants, mkdir, stat } from "node:fs/promises";
import { FatalSetupError, errorMessage, isErrnoException } from "./errors.ts";

export interface StateRootOptions {
  /**
   * Create the root when it does not exist. Only the root itself is made,
   * never its parents. Set for the built-in default location only.
   */
  readonly create?: boolean;
}

/**
 * Make sure the state-store root exists and is a writable directory.
 * Throws FatalSetupError otherwise. A missing root is fatal unless
 * `options.create` is set.
 */
export async function ensureStateRoot(
  rootDir: string,
  options: StateRootOptions = {},
): Promise<void> {
  let rootStat: Stats;
  try {
    rootStat = await stat(rootDir);
  } catch (err: unknown) {
    if (!(isErrnoException(err) && err.code === "ENOENT")) {
      throw new FatalSetupError(
        `State root cannot be read: ${rootDir} (${errorMessage(err)})`,
        rootDir,
        err instanceof Error ? err : undefined,
      );
    }
    if (!options.create) {
      throw new FatalSetupError(`State root does not exist: ${rootDir}`, rootDir, err);
    }
    rootStat = await createRoot(rootDir);
  }

  try {
    if (!rootStat.isDirectory()) {
      throw new Error("not a directory");
    }
    await access(rootDir, constants.W_OK);
  } catch (err: unknown) {
    throw new FatalSetupError(
      `State root is not a writable directory: ${rootDir} (${errorMessage(err)})`,
      rootDir,
      err instanceof Error ? err : undefined,
    );
  }
}

async function createRoot(rootDir: string): Promise<Stats> {
  try {
    await mkdir(rootDir);
    return await stat(rootDir);
  } catch (err: unknown) {
    throw new FatalSetupError(
      `State root cannot be created: ${rootDir} (${errorMessage(err)})`,
      rootDir,
      err instanceof Error ? err : undefined,
    );
  }
}
