/**
 * @fileoverview BGSU RNA 3D Hub loop download configuration constants.
 * @module src/services/motif/providers/bgsu/config
 */

/**
 * Loop-type prefixes of RNA 3D Hub loop ids and their display names
 */
export const LOOP_TYPE_NAMES: Readonly<Record<string, string>> = {
  HL: 'Hairpin Loop',
  IL: 'Internal Loop',
  J3: '3-way Junction',
  J4: '4-way Junction',
  J5: '5-way Junction',
  J6: '6-way Junction',
  J7: '7-way Junction',
  J8: '8-way Junction',
};

/**
 * Content types accepted from the loop download endpoint
 */
export const ACCEPT_HEADER = 'text/csv, text/plain';
