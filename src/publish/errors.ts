/**
 * Publish error taxonomy.
 *
 * Every failure aborts the whole run. The CLI maps them all to exit code 1;
 * `code` lets callers and tests tell them apart without instanceof chains.
 */

export type PublishErrorCode =
  | 'USAGE'
  | 'CONFIGURATION'
  | 'NOT_FOUND'
  | 'AMBIGUOUS_MATCH'
  | 'MALFORMED_VERSION'
  | 'BROKEN_TARGET'
  | 'ALREADY_PUBLISHED'
  | 'EXTERNAL_TOOL';

export class PublishError extends Error {
  constructor(
    message: string,
    public readonly code: PublishErrorCode
  ) {
    super(message);
    this.name = 'PublishError';
  }
}

/**
 * Bad or missing CLI input. Raised before any side effect.
 */
export class UsageError extends PublishError {
  constructor(message: string, code: PublishErrorCode = 'USAGE') {
    super(message, code);
    this.name = 'UsageError';
  }
}

/**
 * Missing or invalid environment / configuration data.
 */
export class ConfigurationError extends UsageError {
  constructor(message: string) {
    super(message, 'CONFIGURATION');
    this.name = 'ConfigurationError';
  }
}

/**
 * An expected build artifact is missing or ambiguous.
 */
export class DiscoveryError extends PublishError {
  constructor(
    message: string,
    public readonly pattern: string,
    public readonly matchCount: number,
    code: PublishErrorCode
  ) {
    super(message, code);
    this.name = 'DiscoveryError';
  }
}

export class NotFoundError extends DiscoveryError {
  constructor(pattern: string, what?: string) {
    super(`Didn't find any matching ${what ?? 'files'}: ${pattern}`, pattern, 0, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class AmbiguousMatchError extends DiscoveryError {
  constructor(
    pattern: string,
    public readonly matches: string[]
  ) {
    super(
      `Expected exactly one match for ${pattern}, found ${matches.length}: ${matches.join(', ')}`,
      pattern,
      matches.length,
      'AMBIGUOUS_MATCH'
    );
    this.name = 'AmbiguousMatchError';
  }
}

export class MalformedVersionError extends PublishError {
  constructor(
    public readonly value: string,
    public readonly expected: string
  ) {
    super(`Malformed version string "${value}", expected ${expected}`, 'MALFORMED_VERSION');
    this.name = 'MalformedVersionError';
  }
}

/**
 * An alias or disk-image link would point at nothing.
 */
export class BrokenTargetError extends PublishError {
  constructor(
    public readonly target: string,
    public readonly link: string
  ) {
    super(`Nonexistent link target ${target} for ${link}`, 'BROKEN_TARGET');
    this.name = 'BrokenTargetError';
  }
}

export class AlreadyPublishedError extends PublishError {
  constructor(public readonly path: string) {
    super(`${path} already exists. Refusing to overwrite published release content.`, 'ALREADY_PUBLISHED');
    this.name = 'AlreadyPublishedError';
  }
}

/**
 * A copy, link, sync or metadata-index command failed. Carries the tool's own diagnostics.
 */
export class ExternalToolError extends PublishError {
  constructor(
    public readonly command: string,
    public readonly args: readonly string[],
    public readonly exitCode: number | null,
    public readonly stderr: string
  ) {
    const detail = stderr.trim() || `exit code ${exitCode ?? 'unknown'}`;
    super(`${command} failed: ${detail}`, 'EXTERNAL_TOOL');
    this.name = 'ExternalToolError';
  }
}

export function isPublishError(error: unknown): error is PublishError {
  return error instanceof PublishError;
}

export function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

/**
 * True for a Node system error (ENOENT, EEXIST, ...) with one of the given codes.
 *
 * Checked structurally: system errors raised by fs are not always instances of
 * this realm's Error (a Jest sandbox, a vm context).
 */
export function hasErrorCode(error: unknown, ...codes: string[]): boolean {
  if (typeof error !== 'object' || error === null || !('code' in error)) return false;
  return typeof error.code === 'string' && codes.includes(error.code);
}
