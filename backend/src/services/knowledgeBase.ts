/**
 * Knowledge Base loading
 * Parses the conditions/synonyms document once at start-up and freezes it
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';

export const URGENCY_LEVELS = ['self_care', 'see_gp', 'urgent'] as const;

export type Urgency = (typeof URGENCY_LEVELS)[number];

export interface Condition {
  readonly name: string;
  readonly requiredSymptoms: readonly string[];
  readonly supportingSymptoms: readonly string[];
  readonly redFlags: readonly string[];
  readonly recommendedTests: readonly string[];
  readonly urgency: Urgency;
}

export interface KnowledgeBase {
  readonly synonyms: Readonly<Record<string, string>>;
  readonly redFlagKeywords: readonly string[];
  readonly conditions: readonly Condition[];
}

/**
 * Thrown when the KB document is missing or malformed. Fatal at start-up.
 */
export class KnowledgeBaseError extends Error {
  public issues: z.ZodIssue[];

  constructor(message: string, issues: z.ZodIssue[] = []) {
    super(message);
    this.name = 'KnowledgeBaseError';
    this.issues = issues;
  }
}

// ==================== Document Schema ====================

const phraseListSchema = z.array(z.string()).default([]);

const conditionSchema = z.object({
  name: z.string().trim().min(1, 'Condition name is required'),
  required_symptoms: phraseListSchema,
  supporting_symptoms: phraseListSchema,
  red_flags: phraseListSchema,
  recommended_tests: z.array(z.string()).default([]),
  urgency: z.enum(URGENCY_LEVELS).default('see_gp'),
});

export const knowledgeBaseDocumentSchema = z.object({
  synonyms: z.record(z.string()).default({}),
  red_flag_keywords: phraseListSchema,
  conditions: z.array(conditionSchema),
}).superRefine((doc, ctx) => {
  const seen = new Set<string>();
  doc.conditions.forEach((condition, index) => {
    if (seen.has(condition.name)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['conditions', index, 'name'],
        message: `Duplicate condition name "${condition.name}"`,
      });
    }
    seen.add(condition.name);
  });
});

export type KnowledgeBaseDocument = z.input<typeof knowledgeBaseDocumentSchema>;

// ==================== Canonicalization ====================

/**
 * Lowercase, trim and collapse internal whitespace of a KB phrase
 */
export function canonicalPhrase(phrase: string): string {
  return phrase.toLowerCase().replace(/\s+/g, ' ').trim();
}

function canonicalPhraseList(phrases: string[]): readonly string[] {
  const unique = new Set<string>();
  for (const phrase of phrases) {
    const canonical = canonicalPhrase(phrase);
    if (canonical) {
      unique.add(canonical);
    }
  }
  return Object.freeze([...unique]);
}

/**
 * Validate a parsed KB document and build the immutable KnowledgeBase
 */
export function parseKnowledgeBase(data: unknown): KnowledgeBase {
  const result = knowledgeBaseDocumentSchema.safeParse(data);
  if (!result.success) {
    const summary = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new KnowledgeBaseError(`Invalid knowledge base: ${summary}`, result.error.issues);
  }

  const doc = result.data;

  const synonyms: Record<string, string> = {};
  for (const [surface, canonical] of Object.entries(doc.synonyms)) {
    const key = canonicalPhrase(surface);
    const value = canonicalPhrase(canonical);
    if (key && value) {
      synonyms[key] = value;
    }
  }

  const conditions = doc.conditions.map((condition): Condition => Object.freeze({
    name: condition.name,
    requiredSymptoms: canonicalPhraseList(condition.required_symptoms),
    supportingSymptoms: canonicalPhraseList(condition.supporting_symptoms),
    redFlags: canonicalPhraseList(condition.red_flags),
    recommendedTests: Object.freeze([...condition.recommended_tests]),
    urgency: condition.urgency,
  }));

  return Object.freeze({
    synonyms: Object.freeze(synonyms),
    redFlagKeywords: canonicalPhraseList(doc.red_flag_keywords),
    conditions: Object.freeze(conditions),
  });
}

/**
 * Read and parse the KB JSON file. Relative paths resolve against cwd.
 */
export function loadKnowledgeBase(filePath: string): KnowledgeBase {
  const absolutePath = path.resolve(process.cwd(), filePath);

  let raw: string;
  try {
    raw = fs.readFileSync(absolutePath, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new KnowledgeBaseError(`Cannot read knowledge base at ${absolutePath}: ${reason}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new KnowledgeBaseError(`Knowledge base at ${absolutePath} is not valid JSON: ${reason}`);
  }

  return parseKnowledgeBase(data);
}

/**
 * Sorted union of required and supporting symptoms, offered as checkboxes
 */
export function listCommonSymptoms(kb: KnowledgeBase): string[] {
  const symptoms = new Set<string>();
  for (const condition of kb.conditions) {
    condition.requiredSymptoms.forEach((s) => symptoms.add(s));
    condition.supportingSymptoms.forEach((s) => symptoms.add(s));
  }
  return [...symptoms].sort();
}
