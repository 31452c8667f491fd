/**
 * Filename Normalizer
 *
 * Turns release filenames such as `Bitter.Moon.1992.1080p.BluRay.x265.mp4`
 * into clean search titles (`Bitter Moon`) for metadata lookups.
 *
 * Noise tokens come from configuration and are split in two groups:
 * - single tokens (`1080p`, `BluRay`) are dropped as whole words
 * - compound tokens (`WEBRip-WORLD`, `Ac3 SNAKE`) are removed as whole phrases
 *
 * All matching is case-insensitive and never touches substrings of other words.
 */

import path from 'node:path';

// ============================================================================
// Types
// ============================================================================

export interface NoiseTokenSet {
  /** Lower-cased single-word tokens */
  singleTokens: ReadonlySet<string>;
  /** Tokens containing a space or hyphen, in configured order */
  compoundTokens: readonly string[];
}

// ============================================================================
// Patterns
// ============================================================================

/** Separators that become spaces before any token matching */
const SEPARATOR_PATTERN = /[._()[\]]/g;

/** Release years 1900-2099 */
const YEAR_PATTERN = /\b(19|20)\d{2}\b/g;

/** Escape regex metacharacters in a configured token */
function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Build a whole-phrase matcher for a compound token, or null when the token
 * is nothing but separators.
 * Separators in the token become spaces, as they do in the name, so
 * `DD5.1-GRP` matches `DD5 1-GRP`. The phrase may not be glued to a letter or
 * digit on either side, and any run of whitespace inside it matches any run of
 * whitespace in the name.
 */
function compoundTokenPattern(token: string): RegExp | null {
  const words = token.replace(SEPARATOR_PATTERN, ' ').trim();
  if (!words) return null;
  const body = words.split(/\s+/).map(escapeRegExp).join('\\s+');
  return new RegExp(`(?<![a-z0-9])${body}(?![a-z0-9])`, 'gi');
}

function isCompoundToken(token: string): boolean {
  return /[\s-]/.test(token);
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Split configured noise tokens into single and compound groups.
 */
export function buildNoiseTokenSet(tokens: readonly string[]): NoiseTokenSet {
  const singleTokens = new Set<string>();
  const compoundTokens: string[] = [];

  for (const raw of tokens) {
    const token = raw.trim();
    if (!token) continue;
    if (isCompoundToken(token)) {
      compoundTokens.push(token);
    } else {
      singleTokens.add(token.toLowerCase());
    }
  }

  return { singleTokens, compoundTokens };
}

/**
 * Normalize a file path into a search title.
 *
 * Steps run in order: strip the extension, turn separators into spaces, remove
 * years, remove compound tokens, turn hyphens into spaces, drop single tokens,
 * collapse whitespace. Compound tokens are removed before hyphens are split so
 * that `WEBRip-WORLD` disappears as a unit.
 *
 * Single tokens match regardless of case.
 *
 * @returns The cleaned title; empty when every word was noise
 */
export function normalizeFilename(
  filePath: string,
  compoundTokens: readonly string[] = [],
  singleTokens: ReadonlySet<string> = new Set()
): string {
  let name = path.parse(filePath).name;

  name = name.replace(SEPARATOR_PATTERN, ' ');
  name = name.replace(YEAR_PATTERN, '');

  for (const token of compoundTokens) {
    const pattern = compoundTokenPattern(token);
    if (pattern) {
      name = name.replace(pattern, ' ');
    }
  }

  name = name.replace(/-/g, ' ');

  const noise = new Set([...singleTokens].map((token) => token.toLowerCase()));
  return name
    .split(/\s+/)
    .filter((word) => word.length > 0 && !noise.has(word.toLowerCase()))
    .join(' ')
    .trim();
}

/**
 * Normalize a file path with a prepared token set.
 */
export function normalizeWithTokens(filePath: string, tokens: NoiseTokenSet): string {
  return normalizeFilename(filePath, tokens.compoundTokens, tokens.singleTokens);
}
