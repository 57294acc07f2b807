/**
 * Cache Inventory Module
 */

export { CacheInventory, type CacheInventoryOptions } from './cache-inventory.js';
export { parseGitHead, readDescription, readGitInfo } from './repo-metadata.js';
export {
  directoryExists,
  listRepoDirectories,
  summarizeTree,
  walkFiles,
  type RepoDirectory,
  type ScannedFile,
  type TreeSummary,
} from './fs-scan.js';
