/**
 * @brushtex/adapter-sut
 *
 * Decoder for SQLite brush containers with embedded PNG textures.
 *
 * @packageDocumentation
 */

export { SutDecoder, columnValue, hasSqliteHeader, rgbaMatrix } from './parse-sut';
export type { SutDecoderOptions } from './parse-sut';
export { openSqliteStore, withBrushStore } from './sqlite-store';
export type { BrushStore, StoreOpener, StoreRow } from './sqlite-store';
