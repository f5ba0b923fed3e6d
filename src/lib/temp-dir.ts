import { promises as fs } from "fs";
import * as path from "path";
import { nanoid } from "nanoid";
import { config } from "../config/engine-config";
import { WorkspaceError } from "./errors";
import { createLogger } from "./logger";
import { err, ok, type Result } from "./result";

const log = createLogger("TEMP");

/**
 * Run `fn` inside a fresh working directory that is removed on every exit path
 */
export async function withTempDir<T>(prefix: string, fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await fs.mkdtemp(path.join(config.tmpDir, `${prefix}-${nanoid(8)}-`));
  try {
    return await fn(dir);
  } finally {
    await removeTempDir(dir);
  }
}

async function removeTempDir(dir: string): Promise<void> {
  try {
    await fs.rm(dir, { recursive: true, force: true });
  } catch (error) {
    // Removal failure must not mask the pipeline's own result
    log.warn("CLEANUP_FAILED", { dir, error: error instanceof Error ? error.message : String(error) });
  }
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export async function writeWorkFile(filePath: string, content: string): Promise<Result<void, WorkspaceError>> {
  try {
    await fs.writeFile(filePath, content, "utf-8");
    return ok(undefined);
  } catch (error) {
    return err(new WorkspaceError(filePath, error instanceof Error ? error.message : String(error), { cause: error }));
  }
}
