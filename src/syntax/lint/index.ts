/**
 * Linter Registry
 *
 * Maps the linter names used in the syntax dictionary to their
 * implementations.
 */

import { lintCsum, lintCsumAlpha } from './checksum.js';
import {
  lintIso3166,
  lintIso3166999,
  lintIso3166Alpha2,
  lintIso3166List,
  lintIso4217,
  lintMediaType,
  lintPackageType,
} from './codelists.js';
import { lintCset39, lintCset64, lintCset82, lintCsetNumeric } from './cset.js';
import {
  lintHh,
  lintHhmi,
  lintHhmm,
  lintMi,
  lintMmoptss,
  lintSs,
  lintYymmd0,
  lintYymmdd,
  lintYymmddhh,
  lintYyyymmd0,
  lintYyyymmdd,
} from './datetime.js';
import { lintGcpPos1, lintGcpPos2, lintImporterIdx, lintKey } from './gcp.js';
import { lintIban } from './iban.js';
import { lintLatitude, lintLatLong, lintLongitude } from './location.js';
import type { Linter } from './messages.js';
import { lintPcenc, lintPieceOfTotal, lintPosInSeqSlash } from './structured.js';
import {
  lintHasNonDigit,
  lintHyphen,
  lintIso5218,
  lintNonZero,
  lintNoZeroPrefix,
  lintWinding,
  lintYesNo,
  lintZero,
} from './values.js';

export const LINTERS = {
  csetnumeric: lintCsetNumeric,
  cset82: lintCset82,
  cset39: lintCset39,
  cset64: lintCset64,
  csum: lintCsum,
  csumalpha: lintCsumAlpha,
  key: lintKey,
  gcppos1: lintGcpPos1,
  gcppos2: lintGcpPos2,
  importeridx: lintImporterIdx,
  nonzero: lintNonZero,
  zero: lintZero,
  nozeroprefix: lintNoZeroPrefix,
  hasnondigit: lintHasNonDigit,
  hyphen: lintHyphen,
  yesno: lintYesNo,
  winding: lintWinding,
  iso5218: lintIso5218,
  iso3166: lintIso3166,
  iso3166999: lintIso3166999,
  iso3166alpha2: lintIso3166Alpha2,
  iso3166list: lintIso3166List,
  iso4217: lintIso4217,
  mediatype: lintMediaType,
  packagetype: lintPackageType,
  iban: lintIban,
  yymmd0: lintYymmd0,
  yymmdd: lintYymmdd,
  yyyymmd0: lintYyyymmd0,
  yyyymmdd: lintYyyymmdd,
  yymmddhh: lintYymmddhh,
  hhmi: lintHhmi,
  hhmm: lintHhmm,
  hh: lintHh,
  mi: lintMi,
  ss: lintSs,
  mmoptss: lintMmoptss,
  pieceoftotal: lintPieceOfTotal,
  posinseqslash: lintPosInSeqSlash,
  pcenc: lintPcenc,
  latitude: lintLatitude,
  longitude: lintLongitude,
  latlong: lintLatLong,
} satisfies Record<string, Linter>;

export type LinterName = keyof typeof LINTERS;

export function isLinterName(name: string): name is LinterName {
  return Object.hasOwn(LINTERS, name);
}

export * from './messages.js';
