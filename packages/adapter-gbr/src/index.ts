/**
 * @brushtex/adapter-gbr
 *
 * GIMP brush decoders: single brushes (GBR) and image-pipe collections (GIH).
 *
 * @packageDocumentation
 */

export { GbrDecoder, gbrRecordEnd, isSupportedGbrHeader, readGbrHeader, readGbrPixels } from './parse-gbr';
export type { GbrHeader } from './parse-gbr';
export { GihDecoder, readGihPreamble } from './parse-gih';
export type { GihPreamble } from './parse-gih';
