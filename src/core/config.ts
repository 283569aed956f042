import { readFile } from 'node:fs/promises';
import { join } from 'node:path';

import { parse } from 'yaml';
import { z } from 'zod';

import { fileExists } from '../utils/fs.js';
import { ConfigError, errorMessage } from '../utils/errors.js';
import { DEFAULT_GENERIC_TAGS } from './custom-tag.js';
import type { TrackerSettings } from './indent-tracker.js';

export interface ScanSettings extends TrackerSettings {
  tagField: string;
  optionsField: string;
  profileField: string;
  genericTags: readonly string[];
  indentStep: number;
}

export const CONFIG_FILENAME = '.stackscan.yml';

// Structural keys of compose-style files that never name a service
export const DEFAULT_EXCLUDED_KEYS: readonly string[] = [
  'services',
  'volumes',
  'networks',
  'configs',
  'secrets',
  'environment',
  'labels',
  'ports',
  'image',
  'deploy',
  'version',
  'build',
  'depends_on',
  'restart',
];

const fieldName = z.string().regex(/^[A-Za-z0-9_.-]+$/, 'must be a plain key name');

const configFileSchema = z
  .object({
    rootBlock: fieldName.optional(),
    nameField: fieldName.optional(),
    tagField: fieldName.optional(),
    optionsField: fieldName.optional(),
    profileField: fieldName.optional(),
    excludedKeys: z.array(z.string()).optional(),
    genericTags: z.array(z.string()).optional(),
    indentStep: z.number().int().min(1).max(8).optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

export function resolveSettings(config: ConfigFile = {}): ScanSettings {
  return {
    rootBlock: config.rootBlock ?? 'services',
    nameField: config.nameField ?? 'name',
    tagField: config.tagField ?? 'tag',
    optionsField: config.optionsField ?? 'jvm_run_opts',
    profileField: config.profileField ?? 'active_profiles',
    excludedKeys: new Set(config.excludedKeys ?? DEFAULT_EXCLUDED_KEYS),
    genericTags: config.genericTags ?? DEFAULT_GENERIC_TAGS,
    indentStep: config.indentStep ?? 2,
  };
}

export function parseConfigFile(raw: string, source: string): ConfigFile {
  let parsed: unknown;
  try {
    parsed = parse(raw);
  } catch (error) {
    throw new ConfigError(`${source}: ${errorMessage(error)}`);
  }

  // an empty file parses to null
  const result = configFileSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`${source}: ${issues}`);
  }
  return result.data;
}

/**
 * Loads settings from an explicit config file, or from `.stackscan.yml` in the
 * scanned directory when present. Falls back to defaults otherwise.
 */
export async function loadScanSettings(scanDir: string, configPath?: string): Promise<ScanSettings> {
  const path = configPath ?? join(scanDir, CONFIG_FILENAME);

  if (!(await fileExists(path))) {
    if (configPath) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
    return resolveSettings();
  }

  const raw = await readFile(path, 'utf-8');
  return resolveSettings(parseConfigFile(raw, path));
}
