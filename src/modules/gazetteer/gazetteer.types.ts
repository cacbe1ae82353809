/**
 * Fixed category enumeration. Order here is the reporting order.
 */
export const CATEGORY_TAGS = [
  'Honda',
  'M&M',
  'Toyota',
  'Skoda',
  'Glovis',
  'Tata',
  'JohnDeere',
  'Spinny',
  'JSW_MG',
  'R.sai',
  'MohanLogistics',
  'SAIAuto',
  'Kwick',
  'MarketLoad',
  'Other',
] as const;

export type CategoryTag = (typeof CATEGORY_TAGS)[number];

/**
 * Canonical bucket for vendor billing parties missing from the allow-list
 */
export const MARKET_LOAD_PARTY = 'Market Load';

/**
 * Zone lists in evaluation priority. A city matching two lists resolves
 * to the earlier one.
 */
export const ZONE_TAGS = ['North', 'East', 'West', 'South', 'Other'] as const;

export type ZoneTag = (typeof ZONE_TAGS)[number];

export interface CategoryRule {
  tag: CategoryTag;
  keywords: string[];
}

export interface RegionalSplit {
  /** Canonical vendor party that gets split */
  party: string;
  regions: Array<{ origin_keyword: string; name: string }>;
}

export interface PartyCorrection {
  /** Uppercased primary party name known to be mis-mapped upstream */
  primary_name: string;
}

/**
 * Immutable lookup tables driving every classification decision.
 */
export interface GazetteerTables {
  readonly categoryRules: ReadonlyArray<CategoryRule>;
  readonly zones: Readonly<Record<ZoneTag, ReadonlyArray<string>>>;
  readonly partyAliases: ReadonlyMap<string, string>;
  readonly vendorParties: ReadonlyMap<string, string>;
  readonly regionalSplits: ReadonlyArray<RegionalSplit>;
  readonly partyCorrections: ReadonlyArray<PartyCorrection>;
}

export interface CanonicalParty {
  name: string;
  category: CategoryTag;
}

export interface ZoneMatch {
  zone: ZoneTag;
  /** false when no gazetteer entry matched and the zone is a fallback */
  matched: boolean;
}

const CATEGORY_TAG_SET: ReadonlySet<string> = new Set(CATEGORY_TAGS);
const ZONE_TAG_SET: ReadonlySet<string> = new Set(ZONE_TAGS);

export function isCategoryTag(value: unknown): value is CategoryTag {
  return typeof value === 'string' && CATEGORY_TAG_SET.has(value);
}

export function isZoneTag(value: unknown): value is ZoneTag {
  return typeof value === 'string' && ZONE_TAG_SET.has(value);
}
