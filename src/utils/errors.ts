export class PathNotFoundError extends Error {
  readonly path: string;

  constructor(path: string) {
    super(`Path does not exist: ${path}`);
    this.name = 'PathNotFoundError';
    this.path = path;
  }
}

export class NotADirectoryError extends Error {
  readonly path: string;

  constructor(path: string) {
    super(`Not a directory: ${path}`);
    this.name = 'NotADirectoryError';
    this.path = path;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * Raised when an edit points outside the file it is applied to, which means the
 * file changed between planning and applying.
 */
export class MutationTargetError extends Error {
  readonly file: string;
  readonly line: number;

  constructor(file: string, line: number) {
    super(`Edit target line ${line + 1} is outside ${file}`);
    this.name = 'MutationTargetError';
    this.file = file;
    this.line = line;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
