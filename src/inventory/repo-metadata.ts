/**
 * Repository Metadata
 *
 * Best-effort details read straight from a cached repository directory:
 * the checked-out branch from `.git/HEAD` and a short description from the
 * first README. No version-control tooling is invoked.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { Logger } from 'pino';
import type { GitInfo } from '../types/inventory.js';
import { CACHE_INVENTORY } from '../config/defaults.js';
import { directoryExists } from './fs-scan.js';

const HEAD_REF_PREFIX = 'ref: refs/heads/';

/**
 * Branch named by the contents of a HEAD file
 *
 * @example
 * ```typescript
 * parseGitHead('ref: refs/heads/main\n')   // => 'main'
 * parseGitHead('4f1c2d3e9a8b7c6d5e4f...')  // => '4f1c2d3e'
 * ```
 */
export function parseGitHead(content: string): string {
  const head = content.trim();
  if (head.startsWith(HEAD_REF_PREFIX)) {
    return head.slice(HEAD_REF_PREFIX.length);
  }
  return head.slice(0, CACHE_INVENTORY.SHORT_HASH_LENGTH);
}

/**
 * Git info for a repository directory, or null when it has no readable HEAD
 */
export async function readGitInfo(repoPath: string, logger?: Logger): Promise<GitInfo | null> {
  const gitDir = path.join(repoPath, '.git');
  if (!(await directoryExists(gitDir))) {
    return null;
  }

  try {
    const head = await fs.readFile(path.join(gitDir, 'HEAD'), 'utf8');
    return { branch: parseGitHead(head), isGitRepo: true };
  } catch (error) {
    logger?.debug({ path: gitDir, err: error }, 'Could not read git HEAD');
    return null;
  }
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * First `maxChars` characters (trimmed) of the first README that exists and
 * decodes as UTF-8; empty string when there is none
 */
export async function readDescription(
  repoPath: string,
  maxChars: number = CACHE_INVENTORY.DESCRIPTION_MAX_CHARS,
  logger?: Logger
): Promise<string> {
  for (const name of CACHE_INVENTORY.README_FILES) {
    const readmePath = path.join(repoPath, name);

    let content: string;
    try {
      content = utf8.decode(await fs.readFile(readmePath));
    } catch (error) {
      logger?.debug({ path: readmePath, err: error }, 'README not usable');
      continue;
    }

    // Slice by code point so a surrogate pair is never cut in half
    return Array.from(content).slice(0, maxChars).join('').trim();
  }

  return '';
}
