/**
 * Cache Inventory
 *
 * Read-only statistics over the mirror's on-disk cache: per-category usage,
 * cached repositories with sorting and search, per-repository details and
 * access-time efficiency. Every call is an independent scan; nothing is cached
 * between calls.
 */

import * as path from 'node:path';
import type { Logger } from 'pino';
import {
  CACHE_CATEGORIES,
  REPO_TYPES,
  isRepoType,
  type CacheCategory,
  type CacheEfficiency,
  type CacheOverview,
  type CategoryUsage,
  type ListReposOptions,
  type RepoDetails,
  type RepoRecord,
  type RepoSortKey,
  type RepoType,
} from '../types/inventory.js';
import { CACHE_INVENTORY, CACHE_LAYOUT } from '../config/defaults.js';
import { formatBytes, safePercent } from '../utils/math-helpers.js';
import { lazyLog } from '../utils/logger-helpers.js';
import {
  directoryExists,
  listRepoDirectories,
  statOrNull,
  summarizeTree,
  walkFiles,
} from './fs-scan.js';
import { readDescription, readGitInfo } from './repo-metadata.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface CacheInventoryOptions {
  logger?: Logger;
  /** Clock for access-time buckets and timestamps (epoch ms) */
  now?: () => number;
  recentAccessDays?: number;
  staleAccessDays?: number;
  descriptionMaxChars?: number;
}

type RepoComparator = (a: RepoRecord, b: RepoRecord) => number;

const COMPARATORS: Record<RepoSortKey, RepoComparator> = {
  size: (a, b) => a.size - b.size,
  last_access: (a, b) => Date.parse(a.lastAccess) - Date.parse(b.lastAccess),
  last_modified: (a, b) => Date.parse(a.lastModified) - Date.parse(b.lastModified),
  name: (a, b) => (a.fullName < b.fullName ? -1 : a.fullName > b.fullName ? 1 : 0),
};

/**
 * True when `name` can be joined onto a directory without leaving it
 */
function isPathSegment(name: string): boolean {
  return name !== '' && name !== '.' && name !== '..' && !name.includes('/') && !name.includes('\\');
}

/**
 * Cache Inventory
 *
 * @example
 * ```typescript
 * const inventory = new CacheInventory('/data/repos', { logger });
 * const top = await inventory.listRepos({ repoType: 'models', limit: 10 });
 * ```
 */
export class CacheInventory {
  private readonly reposPath: string;
  private readonly cacheDirs: Record<CacheCategory, string>;
  private readonly logger?: Logger;
  private readonly now: () => number;
  private readonly recentAccessDays: number;
  private readonly staleAccessDays: number;
  private readonly descriptionMaxChars: number;

  constructor(reposPath: string, options: CacheInventoryOptions = {}) {
    this.reposPath = reposPath;
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
    this.recentAccessDays = options.recentAccessDays ?? CACHE_INVENTORY.RECENT_ACCESS_DAYS;
    this.staleAccessDays = options.staleAccessDays ?? CACHE_INVENTORY.STALE_ACCESS_DAYS;
    this.descriptionMaxChars = options.descriptionMaxChars ?? CACHE_INVENTORY.DESCRIPTION_MAX_CHARS;

    this.cacheDirs = {
      models: path.join(reposPath, CACHE_LAYOUT.models),
      datasets: path.join(reposPath, CACHE_LAYOUT.datasets),
      spaces: path.join(reposPath, CACHE_LAYOUT.spaces),
      files: path.join(reposPath, CACHE_LAYOUT.files),
      lfs: path.join(reposPath, CACHE_LAYOUT.lfs),
    };
  }

  public getReposPath(): string {
    return this.reposPath;
  }

  /**
   * Category directories, whether or not they exist
   */
  public getCacheDirs(): Record<CacheCategory, string> {
    return { ...this.cacheDirs };
  }

  /**
   * Usage per existing category plus global totals
   */
  public async getOverview(): Promise<CacheOverview> {
    let totalSize = 0;
    let totalFiles = 0;
    const repoCounts: Partial<Record<CacheCategory, CategoryUsage>> = {};

    for (const category of CACHE_CATEGORIES) {
      const dir = this.cacheDirs[category];
      if (!(await directoryExists(dir))) {
        continue;
      }

      const { size, fileCount } = await summarizeTree(dir, this.logger);
      const repos = await listRepoDirectories(dir, this.logger);

      totalSize += size;
      totalFiles += fileCount;
      repoCounts[category] = {
        size,
        sizeHuman: formatBytes(size),
        fileCount,
        repoCount: repos.length,
      };
    }

    this.logger?.debug({ totalSize, totalFiles }, 'Computed cache overview');

    return {
      totalSize,
      totalSizeHuman: formatBytes(totalSize),
      totalFiles,
      repoCounts,
      cacheDirs: this.getCacheDirs(),
      lastUpdated: new Date(this.now()).toISOString(),
    };
  }

  /**
   * Cached repositories, sorted (size, descending by default) and optionally
   * truncated to `limit` entries
   */
  public async listRepos(options: ListReposOptions = {}): Promise<RepoRecord[]> {
    const { repoType, limit, sortBy = 'size', sortOrder = 'desc' } = options;
    const types: readonly RepoType[] = repoType ? [repoType] : REPO_TYPES;

    const repos: RepoRecord[] = [];
    for (const type of types) {
      const categoryDir = this.cacheDirs[type];
      for (const dir of await listRepoDirectories(categoryDir, this.logger)) {
        const record = await this.buildRepoRecord(type, dir.org, dir.repo, dir.path);
        if (record) {
          repos.push(record);
        }
      }
    }

    // Array.prototype.sort is stable, so ties keep enumeration order either way
    const compare = COMPARATORS[sortBy];
    repos.sort(sortOrder === 'desc' ? (a, b) => compare(b, a) : compare);

    lazyLog(
      this.logger,
      'debug',
      () => ({ repoType, sortBy, sortOrder, limit, found: repos.length }),
      'Listed cached repositories'
    );

    return limit === undefined ? repos : repos.slice(0, Math.max(0, limit));
  }

  /**
   * Full details of one repository, or null when it is not cached
   *
   * `repoType` is checked at run time as well, since route parameters reach
   * this unvalidated.
   */
  public async getRepoDetails(repoType: string, org: string, repo: string): Promise<RepoDetails | null> {
    if (!isRepoType(repoType) || !isPathSegment(org) || !isPathSegment(repo)) {
      this.logger?.debug({ repoType, org, repo }, 'Rejected repository name');
      return null;
    }

    const repoPath = path.join(this.cacheDirs[repoType], org, repo);
    if (!(await directoryExists(repoPath))) {
      return null;
    }

    const record = await this.buildRepoRecord(repoType, org, repo, repoPath);
    if (!record) {
      return null;
    }

    const { fileCount } = await summarizeTree(repoPath, this.logger);

    return {
      ...record,
      fileCount,
      gitInfo: await readGitInfo(repoPath, this.logger),
      description: await readDescription(repoPath, this.descriptionMaxChars, this.logger),
    };
  }

  /**
   * Repositories whose full name or README description contains `query`,
   * case-insensitively, in `listRepos` order
   */
  public async search(query: string, repoType?: RepoType): Promise<RepoRecord[]> {
    const needle = query.toLowerCase();
    const matches: RepoRecord[] = [];

    for (const record of await this.listRepos({ repoType })) {
      if (record.fullName.toLowerCase().includes(needle)) {
        matches.push(record);
        continue;
      }

      const description = await readDescription(record.path, this.descriptionMaxChars, this.logger);
      if (description.toLowerCase().includes(needle)) {
        matches.push(record);
      }
    }

    this.logger?.debug({ query, repoType, matches: matches.length }, 'Searched cached repositories');
    return matches;
  }

  /**
   * Access-time analysis over every cached file
   *
   * Files accessed less than `recentAccessDays` ago are recent, files not
   * accessed for more than `staleAccessDays` are stale; files in between are
   * counted in neither bucket.
   */
  public async getEfficiency(): Promise<CacheEfficiency> {
    const now = this.now();
    const recentMs = this.recentAccessDays * DAY_MS;
    const staleMs = this.staleAccessDays * DAY_MS;

    let totalSize = 0;
    let totalFiles = 0;
    let recentAccessCount = 0;
    let staleAccessCount = 0;

    for (const category of CACHE_CATEGORIES) {
      for await (const file of walkFiles(this.cacheDirs[category], this.logger)) {
        totalSize += file.stats.size;
        totalFiles++;

        const age = now - file.stats.atimeMs;
        if (age < recentMs) {
          recentAccessCount++;
        } else if (age > staleMs) {
          staleAccessCount++;
        }
      }
    }

    return {
      totalSize,
      totalSizeHuman: formatBytes(totalSize),
      totalFiles,
      recentAccessCount,
      staleAccessCount,
      accessEfficiency: safePercent(recentAccessCount, totalFiles),
      lastUpdated: new Date(now).toISOString(),
    };
  }

  private async buildRepoRecord(
    repoType: RepoType,
    org: string,
    repo: string,
    repoPath: string
  ): Promise<RepoRecord | null> {
    const stats = await statOrNull(repoPath, this.logger);
    if (!stats) {
      return null;
    }

    const { size } = await summarizeTree(repoPath, this.logger);

    return {
      repoType,
      org,
      repo,
      fullName: `${org}/${repo}`,
      size,
      sizeHuman: formatBytes(size),
      lastModified: stats.mtime.toISOString(),
      lastAccess: stats.atime.toISOString(),
      path: repoPath,
    };
  }
}
