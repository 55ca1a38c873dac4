/**
 * Gap detection.
 * Turns an under-covered request into a RepairRequest: normalized query,
 * rule-extracted entities, research search terms and a priority.
 * Deterministic for a given request, coverage and existing gap state.
 */

import type { GapConfig } from '../config.js';
import type { EntityExtractor, ExtractedEntities } from '../text/entities.js';
import type { VendorEntry } from '../text/catalog.js';
import type {
  Coverage,
  GapRecord,
  MatchedItem,
  RepairRequest,
  ResearchSource,
  RouterRequest,
} from '../types/models.js';
import type { GapStore } from './GapStore.js';
import { computeFingerprint } from '../text/fingerprint.js';
import { combinedText } from '../text/normalize.js';

const MAX_ENTITY_TERMS = 3;
const MIN_SEARCH_TERMS = 4;
const MAX_SEARCH_TERMS = 8;
const PADDING_SUFFIXES = ['troubleshooting guide', 'specifications', 'wiring diagram'];

interface VendorHint {
  key: string;
  entry: VendorEntry | null;
}

export class GapDetector {
  constructor(
    private readonly extractor: EntityExtractor,
    private readonly gapStore: GapStore,
    private readonly config: GapConfig
  ) {}

  async detect(request: RouterRequest, coverage: Coverage): Promise<RepairRequest> {
    const normalizedQuery = combinedText(request.text, request.attachments);
    const entities = this.extractor.extract(normalizedQuery);

    const equipmentHint = entities.modelNumbers[0] ?? entities.equipmentType?.key ?? null;
    const symptomHint = entities.symptom ?? entities.faultCodes[0] ?? null;

    // Identity only uses what the text itself names.
    const fingerprint = computeFingerprint(request.text, {
      vendor: entities.vendor?.key ?? null,
      equipment: equipmentHint,
    });

    const vendor = this.resolveVendor(entities, coverage.matchedItems);
    const existing = await this.gapStore.findByFingerprint(fingerprint);
    const priority = this.priority(entities, existing);

    return {
      requestId: request.id,
      userId: request.userId,
      queryText: request.text,
      normalizedQuery,
      fingerprint,
      vendorHint: vendor?.key ?? null,
      equipmentHint,
      symptomHint,
      entities: [...entities.modelNumbers, ...entities.faultCodes],
      searchTerms: buildSearchTerms(normalizedQuery, entities, vendor),
      sources: researchSources(priority, entities.equipmentType?.key ?? null, this.config.highPriority),
      priority,
      coverageLevel: coverage.level,
    };
  }

  /** Base, plus fault-code bonus, plus a capped bonus per prior occurrence. */
  priority(entities: ExtractedEntities, existing: GapRecord | null): number {
    const { basePriority, faultCodeBonus, frequencyBonusPerHit, maxFrequencyBonus } = this.config;

    let priority = basePriority;
    if (entities.faultCodes.length > 0) priority += faultCodeBonus;
    if (existing) {
      priority += Math.min(frequencyBonusPerHit * existing.frequency, maxFrequencyBonus);
    }
    return Math.min(100, priority);
  }

  private resolveVendor(entities: ExtractedEntities, matches: readonly MatchedItem[]): VendorHint | null {
    if (entities.vendor) return { key: entities.vendor.key, entry: entities.vendor };

    const label = dominantVendor(matches);
    if (!label) return null;
    const entry = this.extractor.findVendor(label);
    return { key: entry?.key ?? label, entry };
  }
}

/**
 * Entity templates first, then vendor templates, then the normalized query,
 * padded to four with anchor templates. A request with neither entities nor
 * vendor searches for its own text only.
 */
export function buildSearchTerms(
  normalizedQuery: string,
  entities: ExtractedEntities,
  vendor: VendorHint | null
): string[] {
  const tokens = [...entities.modelNumbers, ...entities.faultCodes].slice(0, MAX_ENTITY_TERMS);
  if (tokens.length === 0 && !vendor) return [normalizedQuery];

  const vendorName = vendor?.entry?.name ?? vendor?.key ?? null;
  const anchor =
    tokens[0] ??
    ([vendorName, entities.equipmentType?.label].filter(Boolean).join(' ') || normalizedQuery);

  const terms: string[] = [];
  const add = (term: string) => {
    const t = term.replace(/\s+/g, ' ').trim();
    if (t && !terms.includes(t) && terms.length < MAX_SEARCH_TERMS) terms.push(t);
  };

  for (const token of tokens) {
    add(`${token} manual`);
    add(`${token} fault code`);
  }

  if (vendor) {
    if (vendor.entry) add(`site:${vendor.entry.domain} ${anchor}`);
    add(`${vendorName ?? ''} ${entities.equipmentType?.label ?? ''} manual`);
  }

  // Keep a slot for the query itself.
  if (terms.length >= MAX_SEARCH_TERMS) terms.length = MAX_SEARCH_TERMS - 1;
  add(normalizedQuery);

  for (const suffix of PADDING_SUFFIXES) {
    if (terms.length >= MIN_SEARCH_TERMS) break;
    add(`${anchor} ${suffix}`);
  }

  return terms;
}

/**
 * Manufacturer site and manual archives always; service bulletins for
 * high-priority gaps, forums otherwise; standards for safety equipment.
 */
export function researchSources(
  priority: number,
  equipmentType: string | null,
  highPriority: number
): ResearchSource[] {
  const sources: ResearchSource[] = ['manufacturer_website', 'manualslib'];
  const high = priority >= highPriority;

  if (high) sources.push('service_bulletins');
  if (equipmentType === 'safety') sources.push('technical_standards');
  if (!high) sources.push('industry_forums');

  return sources;
}

/** Vendor with the highest summed relevance among matched items. */
export function dominantVendor(matches: readonly MatchedItem[]): string | null {
  return dominantTag(matches, (m) => m.vendor);
}

export function dominantEquipmentType(matches: readonly MatchedItem[]): string | null {
  return dominantTag(matches, (m) => m.equipmentType);
}

/** Ties go to the tag seen first. */
function dominantTag(
  matches: readonly MatchedItem[],
  tagOf: (item: MatchedItem) => string | null
): string | null {
  const weights = new Map<string, number>();
  for (const item of matches) {
    const tag = tagOf(item)?.trim().toLowerCase();
    if (!tag) continue;
    weights.set(tag, (weights.get(tag) ?? 0) + Math.max(0, item.relevance));
  }

  let best: string | null = null;
  let bestWeight = -1;
  for (const [tag, weight] of weights) {
    if (weight > bestWeight) {
      best = tag;
      bestWeight = weight;
    }
  }
  return best;
}
