import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { tmpdir } from 'node:os';
import { fileURLToPath } from 'node:url';

vi.mock('../../src/ui/logger.js', () => ({
  logger: {
    info: vi.fn(),
    success: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    header: vi.fn(),
    dim: vi.fn(),
    plain: vi.fn(),
    fileModified: vi.fn(),
    lineChange: vi.fn(),
  },
}));

vi.mock('../../src/ui/spinner.js', () => ({
  withSpinner: vi.fn(async (_text: string, fn: () => Promise<unknown>) => fn()),
}));

import { logger } from '../../src/ui/logger.js';
import { tagsCommand } from '../../src/commands/tags.js';
import { optionsCommand } from '../../src/commands/options.js';
import { servicesCommand } from '../../src/commands/services.js';
import { UsageError } from '../../src/utils/errors.js';

const fixtures = join(dirname(fileURLToPath(import.meta.url)), '..', 'fixtures');
const prods = join(fixtures, 'prods');
const compose = join(fixtures, 'compose');

describe('scan commands (e2e)', () => {
  let tempDir: string;

  beforeEach(async () => {
    vi.clearAllMocks();
    tempDir = await mkdtemp(join(tmpdir(), 'stackscan-scan-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  describe('tags', () => {
    it('lists custom tags of prodN files only', async () => {
      const rows = await tagsCommand(prods, {});

      expect(rows).toEqual([
        { file: 'prod1', service: 'api', tag: 'feature/login', line: 5 },
        { file: 'prod1', service: 'billing', tag: 'release/42', line: 11 },
        { file: 'prod2', service: 'api', tag: 'hotfix/urgent', line: 3 },
      ]);
      expect(logger.info).toHaveBeenCalledWith(
        'Files scanned: 2, with custom tags: 2, occurrences: 3, distinct: 3',
      );
    });

    it('includes generic and version tags with --all', async () => {
      const rows = await tagsCommand(prods, { all: true });
      expect(rows.map((row) => row.tag)).toEqual(['feature/login', '1.4.2', 'release/42', 'hotfix/urgent', 'latest']);
    });

    it('filters services by substring', async () => {
      const rows = await tagsCommand(prods, { service: 'BILL' });
      expect(rows).toEqual([{ file: 'prod1', service: 'billing', tag: 'release/42', line: 11 }]);
    });

    it('writes a CSV report', async () => {
      const output = join(tempDir, 'reports', 'tags.csv');
      await tagsCommand(prods, { output, format: 'csv', quiet: true });

      expect(await readFile(output, 'utf-8')).toBe(
        'file,service,tag,line\nprod1,api,feature/login,5\nprod1,billing,release/42,11\nprod2,api,hotfix/urgent,3\n',
      );
      expect(logger.plain).not.toHaveBeenCalled();
      expect(logger.success).toHaveBeenCalledWith(`Report saved: ${output}`);
    });

    it('warns when no prodN file is present', async () => {
      expect(await tagsCommand(compose, {})).toEqual([]);
      expect(logger.warn).toHaveBeenCalledWith(`No prod*.yml files found in ${compose}`);
    });

    it('scans every YAML file with --pattern yaml', async () => {
      const rows = await tagsCommand(prods, { pattern: 'yaml', service: 'api' });
      expect(rows.map((row) => row.file)).toEqual(['prod1', 'prod2', 'staging']);
    });
  });

  describe('options', () => {
    it('collects option tokens per service', async () => {
      const { rows, distinct } = await optionsCommand(compose, { quiet: true });

      expect(rows).toEqual([
        { file: 'a', service: 'admin-api', option: '-Xmx2g' },
        { file: 'a', service: 'admin-api', option: '-XX:+UseG1GC' },
        { file: 'a', service: 'admin-api', option: '-Dapp.name=admin api' },
        { file: 'a', service: 'announcing', option: '-Xms512m' },
        { file: 'a', service: 'announcing', option: '-Xmx2g' },
        { file: 'b', service: 'admin-api', option: '-Xmx4g' },
      ]);
      expect(distinct).toEqual(['-Dapp.name=admin api', '-XX:+UseG1GC', '-Xms512m', '-Xmx2g', '-Xmx4g']);
    });

    it('computes distinct values from the filtered rows', async () => {
      const { distinct } = await optionsCommand(compose, { service: 'admin', quiet: true });
      expect(distinct).toEqual(['-Dapp.name=admin api', '-XX:+UseG1GC', '-Xmx2g', '-Xmx4g']);
    });

    it('reads another field with --field', async () => {
      const { rows } = await optionsCommand(compose, { field: 'image', quiet: true });
      expect(rows).toEqual([{ file: 'a', service: 'frontend', option: 'nginx' }]);
    });

    it('lists services per file', async () => {
      const result = await optionsCommand(compose, { listServices: true });

      expect(result).toEqual({ rows: [], distinct: [] });
      expect(logger.plain).toHaveBeenCalledWith('  - admin-api');
      expect(logger.info).toHaveBeenCalledWith('Services found: 4');
    });
  });

  describe('services', () => {
    it('requires a selector', async () => {
      await expect(servicesCommand(compose, {})).rejects.toThrow(UsageError);
    });

    it('exports the per-service file count as CSV', async () => {
      const output = join(tempDir, 'summary.csv');
      await servicesCommand(compose, { summary: 'services', output });

      expect(await readFile(output, 'utf-8')).toBe('service,file_count\nadmin-api,2\nannouncing,1\nfrontend,1\n');
    });

    it('exports service and file pairs for a filter', async () => {
      const output = join(tempDir, 'pairs.csv');
      await servicesCommand(compose, { service: 'admin', output });

      expect(await readFile(output, 'utf-8')).toBe('service,file\nadmin-api,a\nadmin-api,b\n');
      expect(logger.plain).toHaveBeenCalledWith('admin-api (2 file(s))');
    });

    it('lists the services of one file', async () => {
      await servicesCommand(compose, { file: 'b' });
      expect(logger.plain).toHaveBeenCalledWith('  • admin-api (lines 2-3)');
      expect(logger.info).toHaveBeenCalledWith('Services: 1');
    });

    it('warns about an unknown file label', async () => {
      await servicesCommand(compose, { file: 'zzz' });
      expect(logger.warn).toHaveBeenCalledWith("File 'zzz' not found");
      expect(logger.dim).toHaveBeenCalledWith('Available: a, b');
    });
  });
});
