const SEMVER_PATTERN = /^v?\d+\.\d+(\.\d+)?(-\w+)?$/;
const COMMIT_HASH_PATTERN = /^[0-9a-f]{7,40}$/i;

export const DEFAULT_GENERIC_TAGS: readonly string[] = [
  'latest',
  'stable',
  'production',
  'main',
  'master',
  'develop',
];

/**
 * A tag is custom when it names a deploy branch (`feature/login`, `release/42`).
 * Version strings, commit hashes and generic labels are not.
 */
export function isCustomTag(tag: string, genericTags: readonly string[] = DEFAULT_GENERIC_TAGS): boolean {
  const value = tag.trim().replace(/^["']+|["']+$/g, '');

  if (SEMVER_PATTERN.test(value)) return false;
  if (COMMIT_HASH_PATTERN.test(value)) return false;

  const lower = value.toLowerCase();
  if (genericTags.some((generic) => generic.toLowerCase() === lower)) return false;

  return value.includes('/');
}
