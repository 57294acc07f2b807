import { describe, it, expect, vi, beforeAll, afterAll } from 'vitest';
import { mkdtemp, mkdir, rm, utimes, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { pino } from 'pino';
import { CacheInventory } from '@/inventory/cache-inventory.js';

const denied = vi.hoisted(() => new Set<string>());

vi.mock('node:fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs/promises')>();
  const permissionDenied = (target: string): Error =>
    Object.assign(new Error(`EACCES: permission denied, '${target}'`), { code: 'EACCES' });

  return {
    ...actual,
    readdir: vi.fn(async (target: string, options: { withFileTypes: true }) => {
      if (denied.has(target)) {
        throw permissionDenied(target);
      }
      return actual.readdir(target, options);
    }),
    stat: vi.fn(async (target: string) => {
      if (denied.has(target)) {
        throw permissionDenied(target);
      }
      return actual.stat(target);
    }),
  };
});

const logger = pino({ level: 'silent' });
const DAY_MS = 24 * 60 * 60 * 1000;

async function put(root: string, relativePath: string, content: string | Buffer): Promise<string> {
  const target = join(root, relativePath);
  await mkdir(dirname(target), { recursive: true });
  await writeFile(target, content);
  return target;
}

describe('CacheInventory', () => {
  describe('with a populated cache', () => {
    let root: string;
    let inventory: CacheInventory;

    beforeAll(async () => {
      root = await mkdtemp(join(tmpdir(), 'olah-inventory-'));
      await put(root, 'api/models/test-org/test-model/weights.bin', 'x'.repeat(300));
      await put(root, 'api/models/acme/widget/README.md', 'Quantized widget model');
      await put(root, 'api/models/acme/widget/model.bin', 'x'.repeat(100));
      await put(root, 'api/datasets/test-org/test-dataset/data.csv', 'x'.repeat(50));
      await put(root, 'api/spaces/demo/app/app.py', 'x'.repeat(50));
      await put(root, 'files/flat.bin', 'x'.repeat(10));
      inventory = new CacheInventory(root, { logger });
    });

    afterAll(async () => {
      await rm(root, { recursive: true, force: true });
    });

    describe('getOverview', () => {
      it('should count repositories per category', async () => {
        const overview = await inventory.getOverview();

        expect(overview.repoCounts.models?.repoCount).toBe(2);
        expect(overview.repoCounts.datasets?.repoCount).toBe(1);
        expect(overview.repoCounts.spaces?.repoCount).toBe(1);
        expect(overview.repoCounts.files?.repoCount).toBe(0);
      });

      it('should sum sizes and files per category and overall', async () => {
        const overview = await inventory.getOverview();

        expect(overview.repoCounts.models).toEqual({
          size: 422,
          sizeHuman: '422.00 B',
          fileCount: 3,
          repoCount: 2,
        });
        expect(overview.totalSize).toBe(532);
        expect(overview.totalSizeHuman).toBe('532.00 B');
        expect(overview.totalFiles).toBe(6);
      });

      it('should omit categories whose directory is missing', async () => {
        const overview = await inventory.getOverview();

        expect(overview.repoCounts.lfs).toBeUndefined();
        expect(Object.keys(overview.repoCounts).sort()).toEqual(['datasets', 'files', 'models', 'spaces']);
      });

      it('should list every category directory', async () => {
        const overview = await inventory.getOverview();

        expect(overview.cacheDirs).toEqual({
          models: join(root, 'api/models'),
          datasets: join(root, 'api/datasets'),
          spaces: join(root, 'api/spaces'),
          files: join(root, 'files'),
          lfs: join(root, 'lfs'),
        });
        expect(Number.isNaN(Date.parse(overview.lastUpdated))).toBe(false);
      });
    });

    describe('listRepos', () => {
      it('should sort by size descending by default, ties in enumeration order', async () => {
        const repos = await inventory.listRepos();

        expect(repos.map((r) => r.fullName)).toEqual([
          'test-org/test-model',
          'acme/widget',
          'test-org/test-dataset',
          'demo/app',
        ]);
      });

      it('should sort ascending keeping tie order', async () => {
        const repos = await inventory.listRepos({ sortOrder: 'asc' });

        expect(repos.map((r) => r.fullName)).toEqual([
          'test-org/test-dataset',
          'demo/app',
          'acme/widget',
          'test-org/test-model',
        ]);
      });

      it('should sort by full name', async () => {
        const repos = await inventory.listRepos({ sortBy: 'name', sortOrder: 'asc' });

        expect(repos.map((r) => r.fullName)).toEqual([
          'acme/widget',
          'demo/app',
          'test-org/test-dataset',
          'test-org/test-model',
        ]);
      });

      it('should filter by repository type', async () => {
        const repos = await inventory.listRepos({ repoType: 'datasets' });

        expect(repos).toHaveLength(1);
        expect(repos[0]).toMatchObject({
          repoType: 'datasets',
          org: 'test-org',
          repo: 'test-dataset',
          fullName: 'test-org/test-dataset',
          size: 50,
          sizeHuman: '50.00 B',
          path: join(root, 'api/datasets/test-org/test-dataset'),
        });
      });

      it('should keep the first entries after sorting when limited', async () => {
        expect((await inventory.listRepos({ limit: 2 })).map((r) => r.fullName)).toEqual([
          'test-org/test-model',
          'acme/widget',
        ]);
        expect(await inventory.listRepos({ limit: 0 })).toEqual([]);
      });

      it('should report ISO timestamps', async () => {
        const [first] = await inventory.listRepos();

        expect(first?.lastModified).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
        expect(first?.lastAccess).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
      });
    });

    describe('search', () => {
      it('should match on the full name case-insensitively', async () => {
        const results = await inventory.search('TEST');

        expect(results.map((r) => r.fullName)).toEqual(['test-org/test-model', 'test-org/test-dataset']);
      });

      it('should match on the README description', async () => {
        const results = await inventory.search('quantized');

        expect(results.map((r) => r.fullName)).toEqual(['acme/widget']);
      });

      it('should restrict to a repository type', async () => {
        const results = await inventory.search('test', 'datasets');

        expect(results.map((r) => r.fullName)).toEqual(['test-org/test-dataset']);
      });

      it('should return an empty list without matches', async () => {
        expect(await inventory.search('nonexistent')).toEqual([]);
      });
    });

    describe('getRepoDetails', () => {
      it('should return base fields plus file count and description', async () => {
        const details = await inventory.getRepoDetails('models', 'acme', 'widget');

        expect(details).toMatchObject({
          repoType: 'models',
          fullName: 'acme/widget',
          size: 122,
          fileCount: 2,
          gitInfo: null,
          description: 'Quantized widget model',
        });
      });

      it('should return null for a repository that is not cached', async () => {
        expect(await inventory.getRepoDetails('models', 'nonexistent', 'repo')).toBeNull();
        expect(await inventory.getRepoDetails('spaces', 'acme', 'widget')).toBeNull();
      });

      it('should return null for names that are not a single path segment', async () => {
        expect(await inventory.getRepoDetails('models', '..', 'models')).toBeNull();
        expect(await inventory.getRepoDetails('models', 'acme/widget', 'x')).toBeNull();
        expect(await inventory.getRepoDetails('models', 'acme', '')).toBeNull();
      });

      it('should return null for an unknown repository type', async () => {
        expect(await inventory.getRepoDetails('checkpoints', 'acme', 'widget')).toBeNull();
        expect(await inventory.getRepoDetails('files', 'acme', 'widget')).toBeNull();
      });
    });
  });

  describe('git info', () => {
    let root: string;

    beforeAll(async () => {
      root = await mkdtemp(join(tmpdir(), 'olah-git-'));
      await put(root, 'api/models/org/branch-repo/.git/HEAD', 'ref: refs/heads/main\n');
      await put(root, 'api/models/org/detached-repo/.git/HEAD', '0123456789abcdef0123456789abcdef01234567\n');
    });

    afterAll(async () => {
      await rm(root, { recursive: true, force: true });
    });

    it('should read the branch from HEAD', async () => {
      const details = await new CacheInventory(root, { logger }).getRepoDetails('models', 'org', 'branch-repo');

      expect(details?.gitInfo).toEqual({ branch: 'main', isGitRepo: true });
      expect(details?.fileCount).toBe(1);
      expect(details?.description).toBe('');
    });

    it('should abbreviate a detached HEAD hash to 8 characters', async () => {
      const details = await new CacheInventory(root, { logger }).getRepoDetails('models', 'org', 'detached-repo');

      expect(details?.gitInfo).toEqual({ branch: '01234567', isGitRepo: true });
    });
  });

  describe('getEfficiency', () => {
    const NOW = Date.UTC(2026, 5, 1);
    let root: string;

    async function putAccessed(relativePath: string, daysAgo: number): Promise<void> {
      const target = await put(root, relativePath, 'x'.repeat(25));
      const when = new Date(NOW - daysAgo * DAY_MS);
      await utimes(target, when, when);
    }

    beforeAll(async () => {
      root = await mkdtemp(join(tmpdir(), 'olah-efficiency-'));
      await putAccessed('api/models/org/recent/a.bin', 1);
      await putAccessed('api/models/org/middle/b.bin', 15);
      await putAccessed('api/datasets/org/stale/c.bin', 60);
      await putAccessed('lfs/d.bin', 2);
    });

    afterAll(async () => {
      await rm(root, { recursive: true, force: true });
    });

    it('should bucket files by access time, leaving the 7-30 day gap in neither', async () => {
      const efficiency = await new CacheInventory(root, { logger, now: () => NOW }).getEfficiency();

      expect(efficiency).toEqual({
        totalSize: 100,
        totalSizeHuman: '100.00 B',
        totalFiles: 4,
        recentAccessCount: 2,
        staleAccessCount: 1,
        accessEfficiency: 50,
        lastUpdated: new Date(NOW).toISOString(),
      });
    });

    it('should stay within 0-100 for any mix of access times', async () => {
      for (const daysFromNow of [0, 10, 40, 365]) {
        const now = NOW + daysFromNow * DAY_MS;
        const { accessEfficiency } = await new CacheInventory(root, { logger, now: () => now }).getEfficiency();
        expect(accessEfficiency).toBeGreaterThanOrEqual(0);
        expect(accessEfficiency).toBeLessThanOrEqual(100);
      }
    });

    it('should report 0 for an empty cache', async () => {
      const empty = await mkdtemp(join(tmpdir(), 'olah-empty-'));
      try {
        const efficiency = await new CacheInventory(empty, { logger, now: () => NOW }).getEfficiency();

        expect(efficiency.totalFiles).toBe(0);
        expect(efficiency.recentAccessCount).toBe(0);
        expect(efficiency.staleAccessCount).toBe(0);
        expect(efficiency.accessEfficiency).toBe(0);
      } finally {
        await rm(empty, { recursive: true, force: true });
      }
    });

    it('should honour configured windows', async () => {
      const inventory = new CacheInventory(root, {
        logger,
        now: () => NOW,
        recentAccessDays: 20,
        staleAccessDays: 20,
      });
      const efficiency = await inventory.getEfficiency();

      expect(efficiency.recentAccessCount).toBe(3);
      expect(efficiency.staleAccessCount).toBe(1);
      expect(efficiency.accessEfficiency).toBe(75);
    });
  });

  it('should report an empty overview for a missing root', async () => {
    const inventory = new CacheInventory(join(tmpdir(), 'olah-missing-root-does-not-exist'), { logger });
    const overview = await inventory.getOverview();

    expect(overview.totalSize).toBe(0);
    expect(overview.totalFiles).toBe(0);
    expect(overview.repoCounts).toEqual({});
    expect(await inventory.listRepos()).toEqual([]);
  });

  describe('with an unreadable subtree', () => {
    let root: string;
    let inventory: CacheInventory;

    beforeAll(async () => {
      root = await mkdtemp(join(tmpdir(), 'olah-inventory-denied-'));
      await put(root, 'api/models/acme/widget/model.bin', 'x'.repeat(100));
      await put(root, 'api/models/locked-org/secret/weights.bin', 'x'.repeat(40));
      await put(root, 'files/nested/deep/blob.bin', 'x'.repeat(8));
      denied.add(join(root, 'api/models/locked-org'));
      inventory = new CacheInventory(root, { logger });
    });

    afterAll(async () => {
      denied.clear();
      await rm(root, { recursive: true, force: true });
    });

    it('should count readable siblings and contribute zero for the unreadable one', async () => {
      const overview = await inventory.getOverview();

      expect(overview.repoCounts.models).toEqual({
        size: 100,
        sizeHuman: '100.00 B',
        fileCount: 1,
        repoCount: 1,
      });
      expect(overview.totalSize).toBe(108);
      expect(overview.totalFiles).toBe(2);
    });

    it('should count two-level directories in flat categories too', async () => {
      const overview = await inventory.getOverview();

      expect(overview.repoCounts.files?.repoCount).toBe(1);
    });

    it('should list only readable repositories', async () => {
      const repos = await inventory.listRepos();

      expect(repos.map((r) => r.fullName)).toEqual(['acme/widget']);
    });

    it('should walk past the unreadable subtree when measuring efficiency', async () => {
      const efficiency = await inventory.getEfficiency();

      expect(efficiency.totalFiles).toBe(2);
      expect(efficiency.totalSize).toBe(108);
    });
  });
});
