// Keyword extraction for symptom text
// Maps free text + checkbox selections onto canonical KB keywords

import { KnowledgeBase } from './knowledgeBase';

// Anything outside word chars, whitespace, hyphen and apostrophe is noise
const NOISE_PATTERN = /[^\p{L}\p{N}_\s'-]/gu;
const WORD_CHAR = '[\\p{L}\\p{N}_]';

// Matched synonym spans are overwritten with this so shorter synonyms cannot match inside them
const CONSUMED_SPAN = '|';

interface PhraseTables {
  synonymPhrases: string[];
  redFlagPhrases: string[];
  conditionPhrases: string[];
  conditionWords: Set<string>;
}

// KBs are frozen, so the derived tables can be cached per KB object
const tableCache = new WeakMap<KnowledgeBase, PhraseTables>();

function byLengthDescending(a: string, b: string): number {
  return b.length - a.length;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function buildPhraseTables(kb: KnowledgeBase): PhraseTables {
  const cached = tableCache.get(kb);
  if (cached) {
    return cached;
  }

  const conditionPhraseSet = new Set<string>();
  for (const condition of kb.conditions) {
    for (const phrase of [...condition.requiredSymptoms, ...condition.supportingSymptoms, ...condition.redFlags]) {
      conditionPhraseSet.add(phrase);
    }
  }

  const conditionWords = new Set<string>();
  for (const phrase of conditionPhraseSet) {
    phrase.split(' ').forEach((word) => conditionWords.add(word));
  }

  const tables: PhraseTables = {
    synonymPhrases: Object.keys(kb.synonyms).sort(byLengthDescending),
    redFlagPhrases: [...kb.redFlagKeywords].sort(byLengthDescending),
    conditionPhrases: [...conditionPhraseSet].sort(byLengthDescending),
    conditionWords,
  };
  tableCache.set(kb, tables);
  return tables;
}

/**
 * Lowercase, replace punctuation with spaces, collapse whitespace
 */
export function normalizeText(text: string | null | undefined): string {
  if (!text) {
    return '';
  }
  return text
    .toLowerCase()
    .replace(NOISE_PATTERN, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Whole-phrase pattern: the phrase may not be preceded or followed by a word char
 */
export function phrasePattern(phrase: string): RegExp {
  return new RegExp(`(?<!${WORD_CHAR})${escapeRegExp(phrase)}(?!${WORD_CHAR})`, 'gu');
}

/**
 * True when the phrase occurs in the text on word boundaries.
 * Both arguments are expected to be lowercase already.
 */
export function containsPhrase(text: string, phrase: string): boolean {
  if (!phrase) {
    return false;
  }
  return text.search(phrasePattern(phrase)) !== -1;
}

/**
 * Match synonym phrases longest-first against the text. Every occurrence of a
 * matched phrase is consumed so later, shorter synonyms only see the remaining text.
 */
function matchLongestFirst(text: string, phrases: string[], onMatch: (phrase: string) => void): void {
  let remaining = text;
  for (const phrase of phrases) {
    if (!phrase) continue;
    const pattern = phrasePattern(phrase);
    if (remaining.search(pattern) !== -1) {
      onMatch(phrase);
      remaining = remaining.replace(pattern, CONSUMED_SPAN);
    }
  }
}

/**
 * Extract the set of canonical symptom keywords from user input.
 *
 * Checkbox selections are taken as-is (lowercased). Synonyms are matched
 * longest phrase first and add their canonical keyword; a matched synonym hides
 * shorter synonyms inside it. Global red-flag phrases and condition phrases are
 * each matched independently against the whole text, so overlapping phrases all
 * count. Single tokens equal to a word of some condition phrase are added as a
 * fallback.
 */
export function extractKeywords(
  text: string | null | undefined,
  explicitSelections: readonly string[] | null | undefined,
  kb: KnowledgeBase
): Set<string> {
  const normalized = normalizeText(text);
  const found = new Set<string>();

  for (const selection of explicitSelections ?? []) {
    const value = selection.toLowerCase().trim();
    if (value) {
      found.add(value);
    }
  }

  if (!normalized) {
    return found;
  }

  const tables = buildPhraseTables(kb);

  matchLongestFirst(normalized, tables.synonymPhrases, (phrase) => {
    found.add(kb.synonyms[phrase]);
  });

  for (const phrase of [...tables.redFlagPhrases, ...tables.conditionPhrases]) {
    if (containsPhrase(normalized, phrase)) {
      found.add(phrase);
    }
  }

  for (const token of normalized.split(' ')) {
    if (tables.conditionWords.has(token)) {
      found.add(token);
    }
  }

  return found;
}
