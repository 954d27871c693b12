// Assessment pipeline: extract keywords, run the rule engine, build the result record

import { randomUUID } from 'crypto';
import { KnowledgeBase, Urgency } from './knowledgeBase';
import { extractKeywords } from './keywordExtractor';
import { runRuleEngine, RuleEngineOptions, ScoredCondition } from './ruleEngine';
import { startLatencyTracking, endLatencyTracking } from '../utils/logger';
import { logPreview } from '../utils/piiRedaction';

export interface AssessmentInput {
  text: string;
  checked: string[];
  duration: string;
  severity: string;
  age: string;
  sex: string;
  /** Stored upload file name, if an image was accepted */
  image: string | null;
}

export interface AssessmentResult {
  sessionId: string;
  timestamp: string;
  input: AssessmentInput;
  parsedSymptoms: string[];
  topConditions: ScoredCondition[];
  finalUrgency: Urgency;
  rankedAll: ScoredCondition[];
}

export function newSessionId(): string {
  return randomUUID().replace(/-/g, '');
}

/**
 * Run one submission through the pipeline. Never throws for user input.
 */
export function assessSymptoms(
  input: AssessmentInput,
  kb: KnowledgeBase,
  options: RuleEngineOptions = {}
): AssessmentResult {
  const sessionId = newSessionId();
  const metrics = startLatencyTracking('assessment', {
    sessionId,
    textPreview: logPreview(input.text),
    checkedCount: input.checked.length,
  });

  const keywords = extractKeywords(input.text, input.checked, kb);
  const { topConditions, urgency, rankedAll } = runRuleEngine(keywords, kb, options);

  endLatencyTracking({
    ...metrics,
    metadata: {
      ...metrics.metadata,
      keywordCount: keywords.size,
      topCondition: topConditions[0]?.condition ?? null,
      urgency,
    },
  });

  return {
    sessionId,
    timestamp: new Date().toISOString(),
    input: { ...input, checked: [...input.checked] },
    parsedSymptoms: [...keywords].sort(),
    topConditions,
    finalUrgency: urgency,
    rankedAll,
  };
}
