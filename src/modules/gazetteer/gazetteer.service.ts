import { Inject, Injectable } from '@nestjs/common';
import { GAZETTEER_TABLES } from './gazetteer.tables';
import {
  CategoryTag,
  GazetteerTables,
  MARKET_LOAD_PARTY,
  ZONE_TAGS,
  ZoneMatch,
  ZoneTag,
} from './gazetteer.types';

/**
 * GazetteerService - fixed-table classification of free text
 *
 * NO DATABASE LOOKUPS. Every decision is a scan over the injected
 * GazetteerTables, so the same input always gives the same answer.
 */
@Injectable()
export class GazetteerService {
  constructor(
    @Inject(GAZETTEER_TABLES)
    private readonly tables: GazetteerTables,
  ) {}

  /**
   * Counterparty name to category. First rule with a keyword contained in
   * the name wins; Other when nothing matches.
   */
  classifyCategory(name: string | null | undefined): CategoryTag {
    const normalized = normalizeToken(name);
    if (normalized === '') {
      return 'Other';
    }

    for (const rule of this.tables.categoryRules) {
      if (rule.keywords.some((keyword) => normalized.includes(keyword))) {
        return rule.tag;
      }
    }

    return 'Other';
  }

  /**
   * City to zone, with a flag telling whether any gazetteer entry matched.
   *
   * A city matches an entry when either string contains the other. Lists
   * are scanned North, East, West, South, Other; a token present in two
   * lists resolves to the earlier one. Overlapping entries are a known
   * limitation of the curated lists, not a rule.
   */
  matchZone(city: string | null | undefined): ZoneMatch {
    const token = normalizeToken(city);
    if (token === '') {
      return { zone: 'Other', matched: false };
    }

    for (const zone of ZONE_TAGS) {
      const hit = this.tables.zones[zone].some(
        (entry) => token.includes(entry) || entry.includes(token),
      );
      if (hit) {
        return { zone, matched: true };
      }
    }

    return { zone: 'Other', matched: false };
  }

  classifyZone(city: string | null | undefined): ZoneTag {
    return this.matchZone(city).zone;
  }

  /**
   * Exact-match alias lookup; returns the trimmed name when no alias exists
   */
  normalizePartyAlias(name: string | null | undefined): string {
    const trimmed = (name ?? '').trim();
    return this.tables.partyAliases.get(trimmed) ?? trimmed;
  }

  /**
   * Canonical vendor name for a billing party. Unlisted parties fall into
   * the Market Load bucket, then the origin-conditional split applies.
   */
  resolveVendorParty(billingParty: string | null | undefined, origin: string | null | undefined): string {
    const trimmed = (billingParty ?? '').trim();
    const canonical = this.tables.vendorParties.get(trimmed) ?? MARKET_LOAD_PARTY;
    return this.splitByOrigin(canonical, origin);
  }

  /**
   * Regional name for a split party when the origin names one of its
   * regions; the un-split name otherwise.
   */
  splitByOrigin(canonical: string, origin: string | null | undefined): string {
    const split = this.tables.regionalSplits.find((s) => s.party === canonical);
    if (!split) {
      return canonical;
    }

    const originToken = normalizeToken(origin);
    const region = split.regions.find((r) => originToken.includes(r.origin_keyword));
    return region ? region.name : canonical;
  }

  /**
   * True when upstream is known to stamp this primary party name on trips
   * belonging to other customers.
   */
  isCorrectionTarget(primaryName: string | null | undefined): boolean {
    const token = normalizeToken(primaryName);
    return this.tables.partyCorrections.some((c) => c.primary_name === token);
  }
}

export function normalizeToken(value: string | null | undefined): string {
  return (value ?? '').toString().trim().toUpperCase();
}
