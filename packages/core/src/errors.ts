/**
 * @module errors
 * Error taxonomy for brush decoding.
 */

/** Failure categories raised by the decoders. */
export type BrushErrorKind =
  /** A read would run past the end of the buffer. */
  | 'OutOfBounds'
  /** Recognized format, unhandled version or variant. */
  | 'UnsupportedVersion'
  /** Structural precondition violated (bad magic, too few lines). */
  | 'MalformedHeader'
  /** Descriptor parser met an unknown type tag. */
  | 'UnrecognizedValueType'
  /** Boundary scan found no start/end signature pair. */
  | 'NoImageFound'
  /** Descriptor nesting deeper than the configured bound. */
  | 'DepthLimitExceeded'
  /** No decoder accepts the input. */
  | 'UnsupportedFormat';

/**
 * Error raised while decoding a brush file.
 * Carries the byte offset and, where relevant, the offending tag.
 */
export class BrushDecodeError extends Error {
  constructor(
    message: string,
    public readonly kind: BrushErrorKind,
    public readonly offset?: number,
    public readonly tag?: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'BrushDecodeError';
  }
}

/** Options accepted by {@link createDecodeError}. */
export interface DecodeErrorContext {
  offset?: number;
  tag?: string;
  cause?: Error;
}

/**
 * Create a decode error whose message includes its context.
 */
export function createDecodeError(
  kind: BrushErrorKind,
  message: string,
  context: DecodeErrorContext = {},
): BrushDecodeError {
  let fullMessage = message;
  if (context.tag !== undefined) {
    fullMessage += ` (tag: ${context.tag})`;
  }
  if (context.offset !== undefined) {
    fullMessage += ` (offset: ${context.offset})`;
  }
  return new BrushDecodeError(fullMessage, kind, context.offset, context.tag, context.cause);
}

/** Narrow an unknown thrown value to a decode error. */
export function isBrushDecodeError(err: unknown): err is BrushDecodeError {
  return err instanceof BrushDecodeError;
}
