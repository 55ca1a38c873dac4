/**
 * Equipment catalog: vendors, equipment types and symptom phrases used by
 * the rule-based entity extractor. Lives in data/catalog.json.
 */

import catalogData from '../../data/catalog.json' with { type: 'json' };

export interface VendorEntry {
  key: string;
  name: string;
  /** Documentation domain used for site: searches. */
  domain: string;
  aliases: string[];
}

export interface EquipmentTypeEntry {
  key: string;
  label: string;
  keywords: string[];
}

export interface Catalog {
  vendors: VendorEntry[];
  equipmentTypes: EquipmentTypeEntry[];
  symptoms: string[];
}

let cached: Catalog | null = null;

/** The bundled catalog, validated once and cached. */
export function loadCatalog(): Catalog {
  if (!cached) {
    const raw: unknown = catalogData;
    cached = parseCatalog(raw);
  }
  return cached;
}

export function parseCatalog(raw: unknown): Catalog {
  if (!isRecord(raw)) throw new Error('Catalog must be a JSON object');

  const vendors = arrayField(raw, 'vendors').map((v, i) => {
    if (!isRecord(v)) throw new Error(`vendors[${i}] must be an object`);
    return {
      key: stringField(v, 'key', `vendors[${i}]`),
      name: stringField(v, 'name', `vendors[${i}]`),
      domain: stringField(v, 'domain', `vendors[${i}]`),
      aliases: stringArray(v, 'aliases', `vendors[${i}]`),
    };
  });

  const equipmentTypes = arrayField(raw, 'equipmentTypes').map((e, i) => {
    if (!isRecord(e)) throw new Error(`equipmentTypes[${i}] must be an object`);
    return {
      key: stringField(e, 'key', `equipmentTypes[${i}]`),
      label: stringField(e, 'label', `equipmentTypes[${i}]`),
      keywords: stringArray(e, 'keywords', `equipmentTypes[${i}]`),
    };
  });

  return { vendors, equipmentTypes, symptoms: stringArray(raw, 'symptoms', 'catalog') };
}

// ── Narrowing helpers ──

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function arrayField(obj: Record<string, unknown>, field: string): unknown[] {
  const value = obj[field];
  if (!Array.isArray(value)) throw new Error(`Catalog field ${field} must be an array`);
  return value;
}

function stringField(obj: Record<string, unknown>, field: string, where: string): string {
  const value = obj[field];
  if (typeof value !== 'string' || value.length === 0) {
    throw new Error(`${where}.${field} must be a non-empty string`);
  }
  return value;
}

function stringArray(obj: Record<string, unknown>, field: string, where: string): string[] {
  const value = obj[field];
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw new Error(`${where}.${field} must be an array of strings`);
  }
  return value;
}
