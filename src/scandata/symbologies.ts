/**
 * Symbology Identifiers
 *
 * Maps symbologies to the AIM symbology identifiers that prefix their
 * scan data, for GS1 (AI) and plain data. The first matching row is the
 * default in either direction.
 */

import type { Symbology } from '../types.js';

export type DataMode = 'ai' | 'plain';

interface SymIdEntry {
  symId: string;
  mode: DataMode;
  sym: Symbology;
}

export const SYM_ID_TABLE: readonly SymIdEntry[] = [
  { symId: 'C1', mode: 'ai', sym: 'GS1_128_CCA' },
  { symId: 'C1', mode: 'ai', sym: 'GS1_128_CCC' },
  { symId: 'E0', mode: 'plain', sym: 'EAN13' },
  { symId: 'E0', mode: 'ai', sym: 'EAN13' },
  { symId: 'E0', mode: 'plain', sym: 'UPCA' },
  { symId: 'E0', mode: 'ai', sym: 'UPCA' },
  { symId: 'E0', mode: 'plain', sym: 'UPCE' },
  { symId: 'E0', mode: 'ai', sym: 'UPCE' },
  { symId: 'E4', mode: 'plain', sym: 'EAN8' },
  { symId: 'E4', mode: 'ai', sym: 'EAN8' },
  { symId: 'e0', mode: 'ai', sym: 'DataBarExpanded' },
  { symId: 'e0', mode: 'ai', sym: 'DataBarOmni' },
  { symId: 'e0', mode: 'plain', sym: 'DataBarOmni' },
  { symId: 'e0', mode: 'ai', sym: 'DataBarTruncated' },
  { symId: 'e0', mode: 'plain', sym: 'DataBarTruncated' },
  { symId: 'e0', mode: 'ai', sym: 'DataBarStacked' },
  { symId: 'e0', mode: 'plain', sym: 'DataBarStacked' },
  { symId: 'e0', mode: 'ai', sym: 'DataBarStackedOmni' },
  { symId: 'e0', mode: 'plain', sym: 'DataBarStackedOmni' },
  { symId: 'e0', mode: 'ai', sym: 'DataBarLimited' },
  { symId: 'e0', mode: 'plain', sym: 'DataBarLimited' },
  { symId: 'd1', mode: 'plain', sym: 'DM' },
  { symId: 'd2', mode: 'ai', sym: 'DM' },
  { symId: 'Q1', mode: 'plain', sym: 'QR' },
  { symId: 'Q3', mode: 'ai', sym: 'QR' },
  { symId: 'J0', mode: 'plain', sym: 'DotCode' },
  { symId: 'J1', mode: 'ai', sym: 'DotCode' },
];

/** Identifier carried by a composite component */
export const CC_SYM_ID = ']e0';

/** Identifier for a symbology carrying data in the given mode */
export function symIdFor(sym: Symbology, mode: DataMode): string | undefined {
  return SYM_ID_TABLE.find((e) => e.sym === sym && e.mode === mode)?.symId;
}

/** Default symbology and mode for a two-character identifier */
export function lookupSymId(symId: string): { sym: Symbology; mode: DataMode } | undefined {
  const entry = SYM_ID_TABLE.find((e) => e.symId === symId);
  return entry ? { sym: entry.sym, mode: entry.mode } : undefined;
}
