/**
 * @module options
 * Decoder tuning knobs shared by every format.
 */

import { createLogger, type Logger } from './logger';

/** Options accepted by every decoder. */
export interface DecoderOptions {
  /** Destination for warnings and summaries. */
  logger?: Logger;
  /** Maximum descriptor nesting before `DepthLimitExceeded` (default 64). */
  maxDescriptorDepth?: number;
  /** Images taller than this are treated as segmented and skipped (default 16384). */
  segmentedHeightLimit?: number;
}

/** Options with every default filled in. */
export type ResolvedDecoderOptions = Required<DecoderOptions>;

export const DEFAULT_MAX_DESCRIPTOR_DEPTH = 64;
export const DEFAULT_SEGMENTED_HEIGHT_LIMIT = 16384;

const defaultLogger = createLogger('decoder');

/**
 * Merge caller options over the defaults.
 * @param options - Partial options from the caller.
 * @param module - Module name for the default child logger.
 */
export function resolveDecoderOptions(
  options: DecoderOptions = {},
  module?: string,
): ResolvedDecoderOptions {
  return {
    logger: options.logger ?? (module ? defaultLogger.child({ decoder: module }) : defaultLogger),
    maxDescriptorDepth: options.maxDescriptorDepth ?? DEFAULT_MAX_DESCRIPTOR_DEPTH,
    segmentedHeightLimit: options.segmentedHeightLimit ?? DEFAULT_SEGMENTED_HEIGHT_LIMIT,
  };
}

/**
 * Record a non-fatal finding both in the result and in the log.
 */
export function reportWarning(
  logger: Logger,
  warnings: string[],
  message: string,
  fields: Record<string, unknown> = {},
): void {
  warnings.push(message);
  logger.warn(fields, message);
}
