/**
 * Filesystem Scan Helpers
 *
 * Recursive walks used by the cache inventory. Each directory is read on its
 * own: an unreadable directory or a file that vanishes mid-scan contributes
 * nothing and the walk carries on with its siblings.
 */

import * as fs from 'node:fs/promises';
import type { Dirent, Stats } from 'node:fs';
import * as path from 'node:path';
import type { Logger } from 'pino';
import { errnoCode } from '../utils/errors.js';

export interface ScannedFile {
  path: string;
  stats: Stats;
}

export interface TreeSummary {
  size: number;
  fileCount: number;
}

export interface RepoDirectory {
  org: string;
  repo: string;
  path: string;
}

function logSkipped(logger: Logger | undefined, target: string, error: unknown): void {
  logger?.debug({ path: target, code: errnoCode(error) }, 'Skipping unreadable path');
}

/**
 * Check if a directory exists
 */
export async function directoryExists(dirPath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(dirPath);
    return stats.isDirectory();
  } catch {
    return false;
  }
}

/**
 * Stat a path, or null when it cannot be stat'ed
 */
export async function statOrNull(target: string, logger?: Logger): Promise<Stats | null> {
  try {
    return await fs.stat(target);
  } catch (error) {
    logSkipped(logger, target, error);
    return null;
  }
}

/**
 * Subdirectory names of `dirPath`; empty when it cannot be read
 */
export async function listSubdirectories(dirPath: string, logger?: Logger): Promise<string[]> {
  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });
    return entries.filter((entry) => entry.isDirectory()).map((entry) => entry.name);
  } catch (error) {
    logSkipped(logger, dirPath, error);
    return [];
  }
}

/**
 * Yield every regular file below `dirPath` with its stats
 *
 * Symlinks to files are followed; symlinked directories are not descended
 * into, which keeps link cycles from recursing forever.
 */
export async function* walkFiles(dirPath: string, logger?: Logger): AsyncGenerator<ScannedFile> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dirPath, { withFileTypes: true });
  } catch (error) {
    logSkipped(logger, dirPath, error);
    return;
  }

  for (const entry of entries) {
    const fullPath = path.join(dirPath, entry.name);

    if (entry.isDirectory()) {
      yield* walkFiles(fullPath, logger);
    } else if (entry.isFile() || entry.isSymbolicLink()) {
      const stats = await statOrNull(fullPath, logger);
      if (stats?.isFile()) {
        yield { path: fullPath, stats };
      }
    }
  }
}

/**
 * Total byte size and file count of a tree
 */
export async function summarizeTree(dirPath: string, logger?: Logger): Promise<TreeSummary> {
  let size = 0;
  let fileCount = 0;
  for await (const file of walkFiles(dirPath, logger)) {
    size += file.stats.size;
    fileCount++;
  }
  return { size, fileCount };
}

/**
 * `<org>/<repo>` directories two levels below a category directory,
 * in directory enumeration order
 */
export async function listRepoDirectories(categoryDir: string, logger?: Logger): Promise<RepoDirectory[]> {
  const repos: RepoDirectory[] = [];

  for (const org of await listSubdirectories(categoryDir, logger)) {
    const orgDir = path.join(categoryDir, org);
    for (const repo of await listSubdirectories(orgDir, logger)) {
      repos.push({ org, repo, path: path.join(orgDir, repo) });
    }
  }

  return repos;
}
