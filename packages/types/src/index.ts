/**
 * @brushtex/types
 *
 * Shared type definitions for the brush importer.
 * This package contains zero runtime code, only TypeScript interfaces
 * and types that serve as the contract between all packages.
 *
 * @packageDocumentation
 */

export type { PixelBuffer, PixelMatrix, RgbaImage, SampleWidth } from './pixels';
export type { ParameterMap, ParameterValue, UnitKind } from './parameters';
export type { BrushFormat, BrushSample, FormatVersion, ParsedBrushFile } from './brush';
export type { BitmapDecoder, BrushDecoder } from './decoder';
