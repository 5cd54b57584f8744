/**
 * @fileoverview Barrel export for the user annotation format converters.
 * @module src/services/motif/converters/index
 */
export type { MotifFileConverter } from './MotifFileConverter.js';
export { Fr3dConverter, parseFr3dPositions } from './fr3d.converter.js';
export type { Fr3dPositions } from './fr3d.converter.js';
export {
  RnaMotifScanConverter,
  detectDelimiter,
} from './rnamotifscan.converter.js';
