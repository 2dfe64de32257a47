import fs from "node:fs/promises";
import path from "node:path";
import crypto from "node:crypto";
import type { Stats } from "node:fs";

// Uploads and tool output are staged here for the lifetime of one request.
// Nothing in this directory is meant to outlive the request that created it;
// the sweeper only catches files orphaned by a crash.

export async function ensureTempDir(dir: string): Promise<void> {
  await fs.mkdir(dir, { recursive: true });
  await fs.chmod(dir, 0o755);
}

export function createTempPath(dir: string, prefix: string): string {
  return path.join(dir, `${prefix}-${crypto.randomUUID()}.pdf`);
}

export async function removeTempFiles(paths: string[]): Promise<void> {
  for (const filePath of paths) {
    try {
      await fs.rm(filePath, { force: true });
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      console.warn(`[pdf-unlocker] Cleanup failed for ${filePath}: ${errorMessage}`);
    }
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export async function sweepStaleFiles(dir: string, maxAgeSeconds: number, now: number = Date.now()): Promise<number> {
  let entries: string[];
  try {
    entries = await fs.readdir(dir);
  } catch (error) {
    if (isNotFound(error)) {
      return 0;
    }
    throw error;
  }

  const cutoff = now - maxAgeSeconds * 1000;
  let removed = 0;

  for (const entry of entries) {
    const filePath = path.join(dir, entry);
    // Requests delete their own files while the sweep runs.
    let stats: Stats;
    try {
      stats = await fs.stat(filePath);
    } catch (error) {
      if (isNotFound(error)) {
        continue;
      }
      throw error;
    }
    if (!stats.isFile() || stats.mtimeMs >= cutoff) {
      continue;
    }
    await fs.rm(filePath, { force: true });
    removed++;
  }

  if (removed > 0) {
    console.log(`[pdf-unlocker] Swept ${removed} stale file(s) from ${dir}`);
  }
  return removed;
}

export function startTempSweeper(dir: string, staleAfterSeconds: number, intervalSeconds: number): () => void {
  function sweep(): void {
    sweepStaleFiles(dir, staleAfterSeconds).catch((error: unknown) => {
      console.error("[pdf-unlocker] Temp directory sweep failed:", error);
    });
  }

  sweep();
  const timer = setInterval(sweep, intervalSeconds * 1000);
  timer.unref();

  return () => clearInterval(timer);
}
