import categoriesJson from './data/categories.json';
import zonesJson from './data/zones.json';
import partyAliasesJson from './data/party-aliases.json';
import vendorPartiesJson from './data/vendor-parties.json';
import regionalSplitsJson from './data/regional-splits.json';
import partyCorrectionsJson from './data/party-corrections.json';
import {
  CategoryRule,
  GazetteerTables,
  MARKET_LOAD_PARTY,
  PartyCorrection,
  RegionalSplit,
  ZoneTag,
  isCategoryTag,
  isZoneTag,
} from './gazetteer.types';

/**
 * Injection token for the classifier's lookup tables
 */
export const GAZETTEER_TABLES = 'GAZETTEER_TABLES';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

function toStringMap(raw: unknown, source: string): Map<string, string> {
  if (!isRecord(raw)) {
    throw new Error(`Gazetteer table ${source} must be an object of strings`);
  }

  const map = new Map<string, string>();
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value !== 'string') {
      throw new Error(`Gazetteer table ${source}: value for "${key}" is not a string`);
    }
    map.set(key.trim(), value);
  }
  return map;
}

function parseCategoryRules(raw: unknown): CategoryRule[] {
  if (!Array.isArray(raw)) {
    throw new Error('Gazetteer table categories must be an array');
  }

  return raw.map((entry: unknown, index) => {
    if (!isRecord(entry)) {
      throw new Error(`Category rule #${index} is not an object`);
    }
    const { tag, keywords } = entry;
    if (!isCategoryTag(tag) || !isStringArray(keywords) || keywords.length === 0) {
      throw new Error(`Category rule #${index} has an unknown tag or no keywords`);
    }
    return { tag, keywords: keywords.map((k) => k.toUpperCase()) };
  });
}

function parseZones(raw: unknown): Record<ZoneTag, string[]> {
  if (!isRecord(raw)) {
    throw new Error('Gazetteer table zones must be an object');
  }

  const unknownZones = Object.keys(raw).filter((key) => !isZoneTag(key));
  if (unknownZones.length > 0) {
    throw new Error(`Unknown zone lists: ${unknownZones.join(', ')}`);
  }

  const readList = (zone: ZoneTag): string[] => {
    const list = raw[zone] ?? [];
    if (!isStringArray(list)) {
      throw new Error(`Zone list ${zone} must be an array of strings`);
    }
    return list.map((c) => c.trim().toUpperCase()).filter((c) => c !== '');
  };

  return {
    North: readList('North'),
    East: readList('East'),
    West: readList('West'),
    South: readList('South'),
    Other: readList('Other'),
  };
}

function parseRegionalSplits(raw: unknown): RegionalSplit[] {
  if (!Array.isArray(raw)) {
    throw new Error('Gazetteer table regional-splits must be an array');
  }

  return raw.map((entry: unknown, index) => {
    if (!isRecord(entry)) {
      throw new Error(`Regional split #${index} is not an object`);
    }
    const { party, regions } = entry;
    if (typeof party !== 'string' || !Array.isArray(regions)) {
      throw new Error(`Regional split #${index} needs a party and regions`);
    }
    return {
      party,
      regions: regions.map((region: unknown) => {
        if (!isRecord(region)) {
          throw new Error(`Regional split for ${party} has an invalid region`);
        }
        const { origin_keyword, name } = region;
        if (typeof origin_keyword !== 'string' || typeof name !== 'string') {
          throw new Error(`Regional split for ${party} has an invalid region`);
        }
        return { origin_keyword: origin_keyword.toUpperCase(), name };
      }),
    };
  });
}

function parsePartyCorrections(raw: unknown): PartyCorrection[] {
  if (!Array.isArray(raw)) {
    throw new Error('Gazetteer table party-corrections must be an array');
  }

  return raw.map((entry: unknown, index) => {
    const primary_name = isRecord(entry) ? entry.primary_name : undefined;
    if (typeof primary_name !== 'string' || primary_name.trim() === '') {
      throw new Error(`Party correction #${index} needs a primary_name`);
    }
    return { primary_name: primary_name.trim().toUpperCase() };
  });
}

/**
 * Own trips are named through the alias table and vendor notes through
 * the allow-list; both must give a counterparty the same name or the
 * ledger splits it in two. Alias targets must also be final, so no
 * canonical name is renamed a second time.
 */
function checkPartyNames(
  partyAliases: ReadonlyMap<string, string>,
  vendorParties: ReadonlyMap<string, string>,
  regionalSplits: ReadonlyArray<RegionalSplit>,
): void {
  const ownName = (name: string): string => partyAliases.get(name) ?? name;

  for (const [raw, canonical] of vendorParties) {
    if (ownName(raw) !== canonical) {
      throw new Error(
        `Vendor party "${raw}" resolves to "${canonical}" but party-aliases names it "${ownName(raw)}"`,
      );
    }
  }

  const canonicalNames = [
    ...partyAliases.values(),
    ...vendorParties.values(),
    ...regionalSplits.flatMap((split) => split.regions.map((region) => region.name)),
    MARKET_LOAD_PARTY,
  ];
  for (const name of canonicalNames) {
    if (ownName(name) !== name) {
      throw new Error(`Canonical party "${name}" is renamed again to "${ownName(name)}" by party-aliases`);
    }
  }
}

export interface RawGazetteerTables {
  categories: unknown;
  zones: unknown;
  partyAliases: unknown;
  vendorParties: unknown;
  regionalSplits?: unknown;
  partyCorrections?: unknown;
}

/**
 * Validate raw table data and freeze it into GazetteerTables.
 * Throws on malformed input so a broken table fails at startup.
 */
export function buildGazetteerTables(raw: RawGazetteerTables): GazetteerTables {
  const partyAliases = toStringMap(raw.partyAliases, 'party-aliases');
  const vendorParties = toStringMap(raw.vendorParties, 'vendor-parties');
  const regionalSplits = parseRegionalSplits(raw.regionalSplits ?? []);
  checkPartyNames(partyAliases, vendorParties, regionalSplits);

  return Object.freeze({
    categoryRules: Object.freeze(parseCategoryRules(raw.categories)),
    zones: Object.freeze(parseZones(raw.zones)),
    partyAliases,
    vendorParties,
    regionalSplits: Object.freeze(regionalSplits),
    partyCorrections: Object.freeze(parsePartyCorrections(raw.partyCorrections ?? [])),
  });
}

let defaultTables: GazetteerTables | null = null;

/**
 * Tables shipped with the service, parsed once per process
 */
export function loadDefaultGazetteerTables(): GazetteerTables {
  if (!defaultTables) {
    defaultTables = buildGazetteerTables({
      categories: categoriesJson,
      zones: zonesJson,
      partyAliases: partyAliasesJson,
      vendorParties: vendorPartiesJson,
      regionalSplits: regionalSplitsJson,
      partyCorrections: partyCorrectionsJson,
    });
  }
  return defaultTables;
}
