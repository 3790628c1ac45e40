/**
 * @module parameters
 * Brush parameter values recovered from descriptors, property lists and
 * database rows.
 */

/** Unit attached to a unit-tagged float. */
export type UnitKind = 'angle' | 'density' | 'distance' | 'none' | 'percent' | 'pixels' | 'unknown';

/** A single brush parameter. */
export type ParameterValue =
  | { type: 'integer'; value: number }
  | { type: 'double'; value: number }
  | { type: 'boolean'; value: boolean }
  | { type: 'string'; value: string }
  /** `unitTag` keeps the raw 4-byte tag, so unknown units survive. */
  | { type: 'unitFloat'; unit: UnitKind; unitTag: string; value: number }
  | { type: 'list'; items: ParameterValue[] }
  | { type: 'map'; entries: ParameterMap };

/** Ordered string-keyed parameter map. Insertion order is preserved. */
export type ParameterMap = Map<string, ParameterValue>;
