/**
 * State / province abbreviation tables
 *
 * Tables are keyed by country code (`US`, `CA`) and map the postal
 * abbreviation to the full region name. The data lives in
 * `data/region-abbreviations.json`; this module validates it once at load time
 * and builds the reverse (full name -> abbreviation) maps.
 */

import { z } from 'zod';
import regionData from '../data/region-abbreviations.json' with { type: 'json' };

const RegionTablesSchema = z.record(z.string(), z.record(z.string(), z.string()));

type RegionTable = Readonly<Record<string, string>>;

const REGION_TABLES: Readonly<Record<string, RegionTable>> = RegionTablesSchema.parse(regionData);

/**
 * Lowercase full name -> abbreviation, per country
 */
const REVERSE_REGION_TABLES: ReadonlyMap<string, ReadonlyMap<string, string>> = new Map(
  Object.entries(REGION_TABLES).map(([country, table]) => [
    country,
    new Map(Object.entries(table).map(([abbrev, name]) => [name.toLowerCase(), abbrev])),
  ])
);

/**
 * Country spellings that select a region table, after uppercasing and
 * dropping periods/commas
 */
const REGION_TABLE_ALIASES: Readonly<Record<string, string>> = {
  US: 'US',
  USA: 'US',
  'UNITED STATES': 'US',
  'UNITED STATES OF AMERICA': 'US',
  CA: 'CA',
  CAN: 'CA',
  CANADA: 'CA',
};

/**
 * Resolve a claimed country (code or long form) to a region table key
 *
 * @returns `US`, `CA`, or undefined when no table covers the country
 */
export function resolveRegionTable(country: string | null | undefined): string | undefined {
  if (!country) {
    return undefined;
  }

  const key = country.trim().toUpperCase().replace(/[.,]/g, '').replace(/\s+/g, ' ');
  const alias = REGION_TABLE_ALIASES[key];
  if (alias !== undefined) {
    return alias;
  }
  return key in REGION_TABLES ? key : undefined;
}

/**
 * Expand a state/province abbreviation (`IL` -> `Illinois` under `US`)
 */
export function expandRegionAbbreviation(
  abbreviation: string,
  country: string | null | undefined
): string | undefined {
  const tableKey = resolveRegionTable(country);
  if (tableKey === undefined) {
    return undefined;
  }
  return REGION_TABLES[tableKey]?.[abbreviation.trim().toUpperCase()];
}

/**
 * Reverse lookup: full region name to its abbreviation (`Quebec` -> `QC` under `CA`)
 */
export function abbreviateRegion(
  fullName: string,
  country: string | null | undefined
): string | undefined {
  const tableKey = resolveRegionTable(country);
  if (tableKey === undefined) {
    return undefined;
  }
  return REVERSE_REGION_TABLES.get(tableKey)?.get(fullName.trim().toLowerCase());
}

