// Rule Engine for Condition Scoring and Urgency
// Weighted matching of extracted keywords against every KB condition

import { Condition, KnowledgeBase, Urgency } from './knowledgeBase';

export interface ScoringWeights {
  base: number;
  required: number;
  supporting: number;
  redFlag: number;
}

export interface UrgencyThresholds {
  urgent: number;
  seeGp: number;
}

export const DEFAULT_WEIGHTS: Readonly<ScoringWeights> = Object.freeze({
  base: 0.5,
  required: 1.5,
  supporting: 0.8,
  redFlag: 2.5,
});

export const DEFAULT_THRESHOLDS: Readonly<UrgencyThresholds> = Object.freeze({
  urgent: 0.35,
  seeGp: 0.25,
});

export const TOP_CONDITION_COUNT = 3;

export interface ConditionMatches {
  required: string[];
  supporting: string[];
  redFlags: string[];
}

export interface ScoredCondition {
  condition: string;
  rawScore: number;
  /** Full-precision normalized score in [0, 1] */
  normalizedScore: number;
  /** normalizedScore rounded to 3 decimals */
  score: number;
  matches: ConditionMatches;
  recommendedTests: string[];
  declaredUrgency: Urgency;
}

export interface RuleEngineOptions {
  weights?: Partial<ScoringWeights>;
  thresholds?: Partial<UrgencyThresholds>;
}

export interface RuleEngineResult {
  topConditions: ScoredCondition[];
  urgency: Urgency;
  rankedAll: ScoredCondition[];
}

function roundScore(value: number): number {
  return Math.round(value * 1000) / 1000;
}

function matchPhrases(phrases: readonly string[], keywords: ReadonlySet<string>): string[] {
  return phrases.filter((phrase) => keywords.has(phrase));
}

function rawScoreFor(
  condition: Condition,
  keywords: ReadonlySet<string>,
  weights: ScoringWeights
): Pick<ScoredCondition, 'rawScore' | 'matches'> {
  const matches: ConditionMatches = {
    required: matchPhrases(condition.requiredSymptoms, keywords),
    supporting: matchPhrases(condition.supportingSymptoms, keywords),
    redFlags: matchPhrases(condition.redFlags, keywords),
  };

  const rawScore = weights.base
    + matches.required.length * weights.required
    + matches.supporting.length * weights.supporting
    + matches.redFlags.length * weights.redFlag;

  return { rawScore, matches };
}

/**
 * Score every condition and min-max normalize across the request.
 * Returned in KB order; when all raw scores are equal every condition gets 0.
 */
export function scoreConditions(
  keywords: Iterable<string>,
  kb: KnowledgeBase,
  weights: Partial<ScoringWeights> = {}
): ScoredCondition[] {
  const effective: ScoringWeights = { ...DEFAULT_WEIGHTS, ...weights };
  const keywordSet = new Set<string>();
  for (const keyword of keywords) {
    keywordSet.add(keyword.toLowerCase());
  }

  const raw = kb.conditions.map((condition) => ({
    condition,
    ...rawScoreFor(condition, keywordSet, effective),
  }));

  if (raw.length === 0) {
    return [];
  }

  const values = raw.map((r) => r.rawScore);
  const maxRaw = Math.max(...values);
  const minRaw = Math.min(...values);
  const span = maxRaw !== minRaw ? maxRaw - minRaw : 1.0;

  return raw.map(({ condition, rawScore, matches }) => {
    const normalizedScore = (rawScore - minRaw) / span;
    return {
      condition: condition.name,
      rawScore,
      normalizedScore,
      score: roundScore(normalizedScore),
      matches,
      recommendedTests: [...condition.recommendedTests],
      declaredUrgency: condition.urgency,
    };
  });
}

/**
 * Sort by normalized score, highest first. Array.prototype.sort is stable,
 * so ties keep KB order.
 */
export function rankConditions(scored: readonly ScoredCondition[]): ScoredCondition[] {
  // Full-precision score, not the rounded one: conditions tied after rounding keep their exact order
  return [...scored].sort((a, b) => b.normalizedScore - a.normalizedScore);
}

/**
 * Urgency verdict for a ranked list:
 * - any matched red flag anywhere -> urgent
 * - top condition declared urgent and score >= urgent threshold -> urgent
 * - top condition declared see_gp and score >= see_gp threshold -> see_gp
 * - otherwise self_care
 */
export function decideUrgency(
  ranked: readonly ScoredCondition[],
  thresholds: Partial<UrgencyThresholds> = {}
): Urgency {
  const effective: UrgencyThresholds = { ...DEFAULT_THRESHOLDS, ...thresholds };

  if (ranked.some((r) => r.matches.redFlags.length > 0)) {
    return 'urgent';
  }

  const top = ranked[0];
  if (!top) {
    return 'self_care';
  }

  // Thresholds apply to the presented (rounded) score
  if (top.declaredUrgency === 'urgent' && top.score >= effective.urgent) {
    return 'urgent';
  }
  if (top.declaredUrgency === 'see_gp' && top.score >= effective.seeGp) {
    return 'see_gp';
  }
  return 'self_care';
}

/**
 * Score, rank and classify. Pure: same keywords and KB give the same result.
 */
export function runRuleEngine(
  keywords: Iterable<string>,
  kb: KnowledgeBase,
  options: RuleEngineOptions = {}
): RuleEngineResult {
  const rankedAll = rankConditions(scoreConditions(keywords, kb, options.weights));

  return {
    topConditions: rankedAll.slice(0, TOP_CONDITION_COUNT),
    urgency: decideUrgency(rankedAll, options.thresholds),
    rankedAll,
  };
}
