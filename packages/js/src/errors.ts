import { SvgMetadataErrorCode } from './types.js';

/**
 * Failure raised anywhere in the extraction pipeline. `code` identifies the
 * failing step; the message is meant for people.
 */
export class SvgMetadataError extends Error {
  readonly code: SvgMetadataErrorCode;

  constructor(code: SvgMetadataErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SvgMetadataError';
    this.code = code;
  }
}

export function isSvgMetadataError(error: unknown): error is SvgMetadataError {
  return error instanceof SvgMetadataError;
}

/** Message text for anything thrown, including non-Error values */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
