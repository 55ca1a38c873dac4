/**
 * Canonical form of free text: NFKC, lowercased, whitespace runs collapsed.
 * Everything that compares or hashes query text goes through here.
 */
export function normalizeText(text: string): string {
  return text.normalize('NFKC').toLowerCase().replace(/\s+/g, ' ').trim();
}

/** Request text plus any attachment text, in one normalized string. */
export function combinedText(text: string, attachments: ReadonlyArray<{ text: string }>): string {
  return normalizeText([text, ...attachments.map((a) => a.text)].join(' '));
}

/** Escape a literal for use inside a RegExp. */
export function escapeRegExp(literal: string): string {
  return literal.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
