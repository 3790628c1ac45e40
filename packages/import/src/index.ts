/**
 * @brushtex/import
 *
 * Entry point: picks the decoder for a brush file and runs it.
 *
 * @packageDocumentation
 */

export { createDecoder, decodeBrushFile, decodeBrushFiles, detectFormat, importBrushFile } from './router';
export type { BrushFileInput, BrushFileResult, ImportOptions } from './router';
