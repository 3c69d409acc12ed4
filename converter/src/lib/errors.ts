/**
 * Conversion Errors
 *
 * Every fatal condition is surfaced as a ConversionError so callers can tell
 * which stage failed without depending on lower-level error shapes.
 */

/**
 * Stage that failed: reading input, encoding a geometry, or writing output
 */
export type ConversionErrorKind = 'input' | 'geometry' | 'write';

export class ConversionError extends Error {
  kind: ConversionErrorKind;

  constructor(kind: ConversionErrorKind, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'ConversionError';
    this.kind = kind;
  }
}

export function isConversionError(value: unknown): value is ConversionError {
  return value instanceof ConversionError;
}

/**
 * Message of an unknown thrown value
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
