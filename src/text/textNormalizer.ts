import { dedupConfig, type DedupConfig } from '../config.js';

export type NormalizerTables = Pick<
  DedupConfig,
  'titleNoisePrefixes' | 'titleNoiseSuffixes' | 'titleSynonyms' | 'companyAliases' | 'companySuffixes'
>;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// Built once per synonym table: one alternation so replacements never cascade
const synonymCache = new WeakMap<Record<string, string[]>, { pattern: RegExp; canonical: Map<string, string> }>();

function synonymMatcher(synonyms: Record<string, string[]>) {
  const cached = synonymCache.get(synonyms);
  if (cached) return cached;

  const canonical = new Map<string, string>();
  for (const [target, variants] of Object.entries(synonyms)) {
    for (const variant of variants) {
      canonical.set(variant.toLowerCase(), target);
    }
  }
  const alternation = [...canonical.keys()]
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp)
    .join('|');
  const pattern = new RegExp(`(?<![a-z0-9])(${alternation})(?![a-z0-9])`, 'g');

  const built = { pattern, canonical };
  synonymCache.set(synonyms, built);
  return built;
}

function stripNoise(title: string, tables: NormalizerTables): string {
  const prefixes = [...tables.titleNoisePrefixes].sort((a, b) => b.length - a.length);
  let current = title;
  let previous = '';

  while (current !== previous) {
    previous = current;
    for (const suffix of tables.titleNoiseSuffixes) {
      current = current.replace(suffix, '').trim();
    }
    for (const prefix of prefixes) {
      const prefixPattern = new RegExp(`^${escapeRegExp(prefix)}(?![a-z0-9])[\\s:!\\-–|]*`);
      current = current.replace(prefixPattern, '').trim();
    }
  }

  return current;
}

/**
 * Canonical form of a job title: lowercase, noise such as "urgent" or a
 * trailing "(remote)" removed, synonyms folded ("Sr. Front-End Developer"
 * becomes "senior frontend engineer").
 */
export function normalizeTitle(text: string, tables: NormalizerTables = dedupConfig): string {
  const lowered = text.toLowerCase().trim();
  if (!lowered) return '';

  const stripped = stripNoise(lowered, tables);
  const { pattern, canonical } = synonymMatcher(tables.titleSynonyms);
  const folded = stripped.replace(pattern, match => canonical.get(match) ?? match);

  return folded
    .replace(/[^a-z0-9+#\s]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Canonical form of a company name: corporate suffixes ("inc", "llc", ...)
 * dropped and legal-entity names folded to the brand ("Alphabet" -> "google").
 */
export function normalizeCompany(text: string, tables: NormalizerTables = dedupConfig): string {
  const cleaned = text
    .toLowerCase()
    .replace(/,/g, ' ')
    .replace(/\.+(\s|$)/g, '$1')
    .replace(/\s+/g, ' ')
    .trim();
  if (!cleaned) return '';

  const suffixes = new Set(tables.companySuffixes);
  const tokens = cleaned.split(' ');
  while (tokens.length > 1 && suffixes.has(tokens[tokens.length - 1])) {
    tokens.pop();
  }
  const stripped = tokens.join(' ');

  for (const [brand, aliases] of Object.entries(tables.companyAliases)) {
    if (stripped === brand || aliases.includes(stripped) || aliases.includes(cleaned)) {
      return brand;
    }
  }

  return stripped;
}
