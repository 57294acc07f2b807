/**
 * Cache Inventory Types
 */

/**
 * Categories that are organized as `<org>/<repo>` trees
 */
export const REPO_TYPES = ['models', 'datasets', 'spaces'] as const;
export type RepoType = (typeof REPO_TYPES)[number];

/**
 * Every category directory under the repos path, including the flat ones
 */
export const CACHE_CATEGORIES = [...REPO_TYPES, 'files', 'lfs'] as const;
export type CacheCategory = (typeof CACHE_CATEGORIES)[number];

export const REPO_SORT_KEYS = ['size', 'last_access', 'last_modified', 'name'] as const;
export type RepoSortKey = (typeof REPO_SORT_KEYS)[number];

export type SortOrder = 'asc' | 'desc';

export function isRepoType(value: string): value is RepoType {
  return (REPO_TYPES as readonly string[]).includes(value);
}

export interface CategoryUsage {
  size: number;
  sizeHuman: string;
  fileCount: number;
  /** Directories two levels below the category directory, in every category */
  repoCount: number;
}

export interface CacheOverview {
  totalSize: number;
  totalSizeHuman: string;
  totalFiles: number;
  /** Only categories whose directory exists */
  repoCounts: Partial<Record<CacheCategory, CategoryUsage>>;
  cacheDirs: Record<CacheCategory, string>;
  /** ISO-8601 time the overview was computed */
  lastUpdated: string;
}

export interface RepoRecord {
  repoType: RepoType;
  org: string;
  repo: string;
  /** `org/repo` */
  fullName: string;
  size: number;
  sizeHuman: string;
  /** ISO-8601 */
  lastModified: string;
  /** ISO-8601 */
  lastAccess: string;
  path: string;
}

export interface GitInfo {
  /** Branch name, or the first 8 characters of a detached HEAD hash */
  branch: string;
  isGitRepo: true;
}

export interface RepoDetails extends RepoRecord {
  fileCount: number;
  gitInfo: GitInfo | null;
  description: string;
}

export interface ListReposOptions {
  repoType?: RepoType;
  limit?: number;
  sortBy?: RepoSortKey;
  sortOrder?: SortOrder;
}

export interface CacheEfficiency {
  totalSize: number;
  totalSizeHuman: string;
  totalFiles: number;
  /** Files accessed within the recent window (7 days by default) */
  recentAccessCount: number;
  /**
   * Files not accessed for longer than the stale window (30 days by default).
   * Files between the two windows are counted in neither bucket.
   */
  staleAccessCount: number;
  /** recentAccessCount / totalFiles * 100, 0 with no files */
  accessEfficiency: number;
  lastUpdated: string;
}
