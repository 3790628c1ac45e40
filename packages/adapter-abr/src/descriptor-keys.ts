/**
 * @module descriptor-keys
 * Four-character property codes used by brush descriptors and the names
 * they resolve to.
 */

import type { UnitKind } from '@brushtex/types';

export const DESCRIPTOR_KEYS: Readonly<Record<string, string>> = {
  'Nm  ': 'name',
  Brsh: 'brush',
  Dmtr: 'diameter',
  Hrdn: 'hardness',
  Angl: 'angle',
  Rndn: 'roundness',
  Spcn: 'spacing',
  Intr: 'interpretation',
  Opct: 'opacity',
  Txtr: 'texture',
  Idnt: 'identifier',
  'Scl ': 'scale',
  'Md  ': 'mode',
  Dpth: 'depth',
  'Clr ': 'color',
  Invr: 'invert',
  Ptrn: 'pattern',
  'Cnt ': 'count',
  Jttr: 'jitter',
  'Mnm ': 'minimum',
  Nose: 'noise',
  Wtdg: 'wetEdges',
  Vrsn: 'version',
  Wdth: 'width',
  Hght: 'height',
  'Rd  ': 'red',
  'Grn ': 'green',
  'Bl  ': 'blue',
};

/** Unit tags of unit-valued floats. */
export const UNIT_TAGS: Readonly<Record<string, UnitKind>> = {
  '#Ang': 'angle',
  '#Rsl': 'density',
  '#Rlt': 'distance',
  '#Nne': 'none',
  '#Prc': 'percent',
  '#Pxl': 'pixels',
};
