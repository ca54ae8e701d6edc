import regionRows from './data/regions.json';
import interactionRows from './data/interactionCodes.json';

/**
 * ACLED code tables.
 *
 * Region and interaction codes accepted by the `region`, `inter1`, `inter2`
 * and `interaction` filters. Labels are the names ACLED publishes.
 */

interface CodeEntry {
  name: string;
  code: number;
}

export type CodeLookup = Readonly<Record<string, number>>;

export interface RegionTableRow {
  region_name: string;
  region_code: number;
}

export interface InterCodeTableRow {
  inter_name: string;
  inter_code: number;
}

function toLookup(entries: readonly CodeEntry[]): CodeLookup {
  return Object.freeze(Object.fromEntries(entries.map(({ name, code }) => [name, code])));
}

function toReverseLookup(entries: readonly CodeEntry[]): ReadonlyMap<number, string> {
  return new Map(entries.map(({ name, code }) => [code, name]));
}

const REGION_CODES = toLookup(regionRows);
const REGION_NAMES = toReverseLookup(regionRows);
const INTER_CODES = toLookup(interactionRows);
const INTER_NAMES = toReverseLookup(interactionRows);

// ============================================================================
// Regions
// ============================================================================

/**
 * Region label to region code, e.g. `getAcledRegionCodes()['Western Africa'] === 1`.
 */
export function getAcledRegionCodes(): CodeLookup {
  return REGION_CODES;
}

export function getAcledRegionTable(): RegionTableRow[] {
  return regionRows.map(({ name, code }) => ({ region_name: name, region_code: code }));
}

export function getAcledRegionName(code: number): string | undefined {
  return REGION_NAMES.get(code);
}

// ============================================================================
// Interactions
// ============================================================================

/**
 * Interaction label to code. Single-actor events end in `0` ("Rioters only" = 50);
 * dyadic codes combine both actor types ("Rioters-Civilians" = 57).
 */
export function getAcledInterCodes(): CodeLookup {
  return INTER_CODES;
}

export function getAcledInterCodesTable(): InterCodeTableRow[] {
  return interactionRows.map(({ name, code }) => ({ inter_name: name, inter_code: code }));
}

export function getAcledInterName(code: number): string | undefined {
  return INTER_NAMES.get(code);
}
