/**
 * Rule-based entity extraction for maintenance queries.
 * Pattern rules find model numbers and fault codes; catalog lookups find
 * vendors, equipment types and symptoms. Output is fully deterministic.
 */

import type { Catalog, EquipmentTypeEntry, VendorEntry } from './catalog.js';
import { escapeRegExp, normalizeText } from './normalize.js';

export interface ExtractedEntities {
  /** Model / part numbers in order of appearance, uppercased. */
  modelNumbers: string[];
  /** Fault / error / alarm codes in order of appearance, uppercased. */
  faultCodes: string[];
  vendor: VendorEntry | null;
  equipmentType: EquipmentTypeEntry | null;
  symptom: string | null;
}

// Matched against uppercased text.
const TOKEN_PATTERNS: RegExp[] = [
  /\b[A-Z]{1,3}\d{0,2}-?\d{3,6}[A-Z]{0,2}\b/g, // S7-1200, G120C, P0210
  /\b\d{4}-[A-Z0-9]{2,6}\b/g, // 1756-L83E
  /\b(?:[FEA]\d{2,5}|0X[0-9A-F]{2,8})\b/g, // F3002, E123, 0x1F40
];

const FAULT_CODE_SHAPE = /^(?:[FEA]\d{2,5}|0X[0-9A-F]{2,8})$/;

const MAX_TOKENS = 5;

export function isFaultCode(token: string): boolean {
  return FAULT_CODE_SHAPE.test(token.toUpperCase());
}

export class EntityExtractor {
  private readonly vendorMatchers: Array<{ vendor: VendorEntry; pattern: RegExp }>;
  private readonly equipmentMatchers: Array<{ type: EquipmentTypeEntry; pattern: RegExp }>;
  private readonly symptomMatchers: Array<{ symptom: string; pattern: RegExp }>;

  constructor(private readonly catalog: Catalog) {
    this.vendorMatchers = catalog.vendors.map((vendor) => ({
      vendor,
      pattern: phrasePattern(vendor.aliases),
    }));
    this.equipmentMatchers = catalog.equipmentTypes.map((type) => ({
      type,
      pattern: phrasePattern(type.keywords),
    }));
    this.symptomMatchers = catalog.symptoms.map((symptom) => ({
      symptom,
      pattern: phrasePattern([symptom]),
    }));
  }

  extract(text: string): ExtractedEntities {
    const normalized = normalizeText(text);
    const tokens = this.extractTokens(text);

    return {
      modelNumbers: tokens.filter((t) => !isFaultCode(t)),
      faultCodes: tokens.filter((t) => isFaultCode(t)),
      vendor: this.vendorMatchers.find((m) => m.pattern.test(normalized))?.vendor ?? null,
      equipmentType:
        this.equipmentMatchers.find((m) => m.pattern.test(normalized))?.type ?? null,
      symptom: this.symptomMatchers.find((m) => m.pattern.test(normalized))?.symptom ?? null,
    };
  }

  /** Catalog vendor by key, name or alias, case-insensitive. */
  findVendor(label: string): VendorEntry | null {
    const key = this.vendorKeyFor(label);
    return this.catalog.vendors.find((v) => v.key === key) ?? null;
  }

  /**
   * Catalog key for a vendor label as it appears on knowledge items
   * ("Allen-Bradley" → "rockwell"). Unknown labels come back trimmed and
   * lowercased.
   */
  vendorKeyFor(label: string): string {
    const normalized = normalizeText(label);
    const vendor = this.catalog.vendors.find(
      (v) =>
        v.key === normalized ||
        normalizeText(v.name) === normalized ||
        v.aliases.some((alias) => normalizeText(alias) === normalized)
    );
    return vendor?.key ?? normalized;
  }

  /**
   * Identifier-shaped tokens in order of first appearance, deduplicated on
   * their form without spaces and dashes.
   */
  private extractTokens(text: string): string[] {
    const upper = text.toUpperCase();
    const found: Array<{ index: number; token: string }> = [];

    for (const pattern of TOKEN_PATTERNS) {
      for (const match of upper.matchAll(pattern)) {
        found.push({ index: match.index ?? 0, token: match[0] });
      }
    }

    found.sort((a, b) => a.index - b.index);

    const seen = new Set<string>();
    const tokens: string[] = [];
    for (const { token } of found) {
      const canonical = token.replace(/[\s-]/g, '');
      if (seen.has(canonical)) continue;
      seen.add(canonical);
      tokens.push(token);
    }

    return tokens.slice(0, MAX_TOKENS);
  }
}

/** Whole-phrase, case-insensitive match for any of the given phrases. */
function phrasePattern(phrases: string[]): RegExp {
  const alternatives = phrases.map((p) => escapeRegExp(normalizeText(p))).join('|');
  return new RegExp(`(?<![\\w-])(?:${alternatives})(?![\\w-])`);
}
