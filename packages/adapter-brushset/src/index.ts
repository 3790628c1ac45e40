/**
 * @brushtex/adapter-brushset
 *
 * Decoder for zip-archived brush bundles whose settings live in keyed
 * property lists.
 *
 * @packageDocumentation
 */

export { BrushsetDecoder, isZipSignature, redChannel } from './parse-brushset';
export type { BrushsetDecoderOptions } from './parse-brushset';
export { openZipArchive } from './archive';
export type { ArchiveReader } from './archive';
export {
  readArchivedBrushInfo,
  simplePlistReader,
  toParameterMap,
  toParameterValue,
} from './property-list';
export type { ArchivedBrushInfo, PropertyListReader } from './property-list';
