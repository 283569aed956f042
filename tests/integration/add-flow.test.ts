import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import { parse } from 'yaml';

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

vi.mock('../../src/ui/prompts.js', () => ({
  confirmPrompt: vi.fn(),
}));

import { logger } from '../../src/ui/logger.js';
import { confirmPrompt } from '../../src/ui/prompts.js';
import { addCommand } from '../../src/commands/add.js';

const APP = [
  'services:',
  '  api:',
  '    image: api',
  '    active_profiles: prod',
  '  api-worker:',
  '    image: worker',
  '  web:',
  '    image: web',
  '',
].join('\n');

const APP_AFTER = [
  'services:',
  '  api:',
  '    image: api',
  '    active_profiles: prod,staging',
  '  api-worker:',
  '    active_profiles: staging',
  '    image: worker',
  '  web:',
  '    image: web',
  '',
].join('\n');

describe('add flow (e2e)', () => {
  let tempDir: string;
  let file: string;

  beforeEach(async () => {
    vi.clearAllMocks();
    tempDir = await mkdtemp(join(tmpdir(), 'stackscan-add-'));
    file = join(tempDir, 'app.yml');
    await writeFile(file, APP, 'utf-8');
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('updates one service and inserts into another', async () => {
    const { plans, results } = await addCommand(tempDir, 'staging', { service: 'api', yes: true });

    expect(plans.map((plan) => plan.status)).toEqual(['planned', 'planned']);
    expect(results).toHaveLength(1);
    expect(results[0].status).toBe('written');
    expect(await readFile(file, 'utf-8')).toBe(APP_AFTER);
    expect(logger.fileModified).toHaveBeenCalledWith('app.yml');
  });

  it('changes nothing on a second run', async () => {
    await addCommand(tempDir, 'staging', { service: 'api', yes: true });
    vi.clearAllMocks();

    const { plans, results } = await addCommand(tempDir, 'staging', { service: 'api', yes: true });

    expect(plans).toEqual([
      { status: 'already-present', target: { file, service: 'api' }, line: 3 },
      { status: 'already-present', target: { file, service: 'api-worker' }, line: 5 },
    ]);
    expect(results).toEqual([]);
    expect(logger.success).toHaveBeenCalledWith('Nothing to change');
    expect(await readFile(file, 'utf-8')).toBe(APP_AFTER);
  });

  it('previews edits in a dry run without writing', async () => {
    const { results } = await addCommand(tempDir, 'staging', { service: 'api', dryRun: true });

    expect(results[0].status).toBe('dry-run');
    if (results[0].status === 'dry-run') {
      expect(results[0].after).toBe(APP_AFTER);
    }
    expect(await readFile(file, 'utf-8')).toBe(APP);
    expect(logger.lineChange).toHaveBeenNthCalledWith(1, 4, '    active_profiles: prod', '    active_profiles: prod,staging');
    expect(logger.lineChange).toHaveBeenNthCalledWith(2, 6, null, '    active_profiles: staging');
    expect(logger.info).toHaveBeenCalledWith('Dry run: no files were written.');
  });

  it('writes to another field with --field', async () => {
    await addCommand(tempDir, 'eu', { service: 'web', field: 'regions', yes: true });

    expect(await readFile(file, 'utf-8')).toBe(APP.replace('  web:\n', '  web:\n    regions: eu\n'));
  });

  it('plans every block of a service repeated in one file', async () => {
    const repeated = [
      'services:',
      '  - name: api',
      '    image: a',
      '  - name: api',
      '    image: b',
      '    active_profiles: prod,staging',
      '',
    ].join('\n');
    await writeFile(file, repeated, 'utf-8');

    const { plans } = await addCommand(tempDir, 'staging', { service: 'api', yes: true });

    expect(plans).toEqual([
      {
        status: 'planned',
        target: { file, service: 'api' },
        edit: { file, line: 1, action: 'insert-after', text: '    active_profiles: staging' },
      },
      { status: 'already-present', target: { file, service: 'api' }, line: 5 },
    ]);
    expect(await readFile(file, 'utf-8')).toBe(
      repeated.replace('    image: a\n', '    active_profiles: staging\n    image: a\n'),
    );
  });

  it('keeps a service opened by a name line valid YAML', async () => {
    await writeFile(file, 'services:\n  - image: registry/api\n    name: api\n    tag: feature/x\n', 'utf-8');

    await addCommand(tempDir, 'staging', { service: 'api', yes: true });

    const written = await readFile(file, 'utf-8');
    expect(written).toBe(
      'services:\n  - image: registry/api\n    name: api\n    active_profiles: staging\n    tag: feature/x\n',
    );
    expect(parse(written)).toEqual({
      services: [{ image: 'registry/api', name: 'api', active_profiles: 'staging', tag: 'feature/x' }],
    });
  });

  it('warns when no service matches', async () => {
    const { plans } = await addCommand(tempDir, 'staging', { service: 'db', yes: true });

    expect(plans).toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith("No services matching 'db'");
  });

  it('asks before writing on a terminal and respects a refusal', async () => {
    const isTTY = process.stdout.isTTY;
    process.stdout.isTTY = true;
    vi.mocked(confirmPrompt).mockResolvedValue(false);

    try {
      const { results } = await addCommand(tempDir, 'staging', { service: 'api' });

      expect(confirmPrompt).toHaveBeenCalledWith('Apply 2 edit(s)?', true);
      expect(results).toEqual([]);
      expect(await readFile(file, 'utf-8')).toBe(APP);
    } finally {
      process.stdout.isTTY = isTTY;
    }
  });
});
