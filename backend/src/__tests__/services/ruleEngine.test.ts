import {
  DEFAULT_WEIGHTS,
  ScoredCondition,
  decideUrgency,
  rankConditions,
  runRuleEngine,
  scoreConditions,
} from '../../services/ruleEngine';
import { Urgency } from '../../services/knowledgeBase';
import { buildKb, fluKb } from '../helpers/knowledgeBase';

function scored(condition: string, score: number, declaredUrgency: Urgency, redFlags: string[] = []): ScoredCondition {
  return {
    condition,
    rawScore: score,
    normalizedScore: score,
    score,
    matches: { required: [], supporting: [], redFlags },
    recommendedTests: [],
    declaredUrgency,
  };
}

const threeConditionKb = () =>
  buildKb({
    conditions: [
      { name: 'A', required_symptoms: ['x'], urgency: 'see_gp' },
      { name: 'B', required_symptoms: ['y'], supporting_symptoms: ['z'], urgency: 'see_gp' },
      { name: 'C', urgency: 'self_care' },
    ],
  });

describe('Rule Engine', () => {
  describe('scoreConditions', () => {
    it('should expose the default weights', () => {
      expect(DEFAULT_WEIGHTS).toEqual({ base: 0.5, required: 1.5, supporting: 0.8, redFlag: 2.5 });
    });

    it('should add weights per matched phrase and record the matches', () => {
      const [flu] = scoreConditions(['fever', 'cough', 'fatigue'], fluKb());
      expect(flu.rawScore).toBeCloseTo(4.3, 10);
      expect(flu.matches).toEqual({
        required: ['fever', 'cough'],
        supporting: ['fatigue'],
        redFlags: [],
      });
      expect(flu.recommendedTests).toEqual(['Rapid influenza test']);
      expect(flu.declaredUrgency).toBe('see_gp');
    });

    it('should min-max normalize and round to three decimals', () => {
      const result = scoreConditions(['x', 'y', 'z'], threeConditionKb());
      const byName = Object.fromEntries(result.map((r) => [r.condition, r]));
      expect(byName.A.rawScore).toBeCloseTo(2.0, 10);
      expect(byName.B.rawScore).toBeCloseTo(2.8, 10);
      expect(byName.C.rawScore).toBeCloseTo(0.5, 10);
      expect(byName.A.score).toBe(0.652);
      expect(byName.A.normalizedScore).toBeCloseTo(1.5 / 2.3, 10);
      expect(byName.B.score).toBe(1);
      expect(byName.C.score).toBe(0);
    });

    it('should keep every normalized score within [0, 1]', () => {
      const result = scoreConditions(['x', 'z'], threeConditionKb());
      for (const r of result) {
        expect(r.score).toBeGreaterThanOrEqual(0);
        expect(r.score).toBeLessThanOrEqual(1);
      }
    });

    it('should normalize everything to 0 when all raw scores tie', () => {
      const result = scoreConditions([], threeConditionKb());
      expect(result.map((r) => r.rawScore)).toEqual([0.5, 0.5, 0.5]);
      expect(result.map((r) => r.score)).toEqual([0, 0, 0]);
    });

    it('should match keywords case-insensitively', () => {
      const [flu] = scoreConditions(['FEVER'], fluKb());
      expect(flu.matches.required).toEqual(['fever']);
    });

    it('should accept weight overrides', () => {
      const [flu] = scoreConditions(['fever'], fluKb(), { base: 0, required: 2 });
      expect(flu.rawScore).toBe(2);
    });
  });

  describe('rankConditions', () => {
    it('should sort by score descending and keep KB order on ties', () => {
      const ranked = rankConditions([
        scored('first', 0.2, 'self_care'),
        scored('second', 0.9, 'self_care'),
        scored('third', 0.2, 'self_care'),
      ]);
      expect(ranked.map((r) => r.condition)).toEqual(['second', 'first', 'third']);
    });
  });

  describe('decideUrgency', () => {
    it('should be urgent when any condition matched a red flag', () => {
      const ranked = [scored('top', 1, 'self_care'), scored('low', 0, 'self_care', ['chest pain'])];
      expect(decideUrgency(ranked)).toBe('urgent');
    });

    it('should escalate a declared-urgent top condition at 0.35', () => {
      expect(decideUrgency([scored('top', 0.35, 'urgent')])).toBe('urgent');
      expect(decideUrgency([scored('top', 0.349, 'urgent')])).toBe('self_care');
    });

    it('should advise a GP visit for a declared see_gp top condition at 0.25', () => {
      expect(decideUrgency([scored('top', 0.25, 'see_gp')])).toBe('see_gp');
      expect(decideUrgency([scored('top', 0.249, 'see_gp')])).toBe('self_care');
    });

    it('should not downgrade an urgent condition below threshold to see_gp', () => {
      expect(decideUrgency([scored('top', 0.3, 'urgent')])).toBe('self_care');
    });

    it('should only look at the top condition for escalation', () => {
      const ranked = [scored('top', 1, 'self_care'), scored('second', 0.9, 'urgent')];
      expect(decideUrgency(ranked)).toBe('self_care');
    });

    it('should honour threshold overrides', () => {
      expect(decideUrgency([scored('top', 0.5, 'urgent')], { urgent: 0.9 })).toBe('self_care');
    });

    it('should default to self_care for an empty list', () => {
      expect(decideUrgency([])).toBe('self_care');
    });
  });

  describe('runRuleEngine', () => {
    it('should score the flu scenario as self care despite see_gp', () => {
      const result = runRuleEngine(new Set(['fever', 'cough', 'fatigue']), fluKb());
      expect(result.topConditions).toHaveLength(1);
      expect(result.topConditions[0].condition).toBe('Flu');
      expect(result.topConditions[0].rawScore).toBeCloseTo(4.3, 10);
      expect(result.topConditions[0].score).toBe(0);
      expect(result.urgency).toBe('self_care');
    });

    it('should be urgent when the red-flag phrase is present', () => {
      const result = runRuleEngine(['fever', 'difficulty breathing'], fluKb());
      expect(result.topConditions[0].matches.redFlags).toEqual(['difficulty breathing']);
      expect(result.urgency).toBe('urgent');
    });

    it('should escalate on a red flag from a lower-ranked condition', () => {
      const kb = buildKb({
        conditions: [
          { name: 'Other', urgency: 'self_care' },
          { name: 'Small', red_flags: ['r'], urgency: 'self_care' },
          { name: 'Big', required_symptoms: ['a', 'b'], urgency: 'self_care' },
        ],
      });
      const result = runRuleEngine(['a', 'b', 'r'], kb);
      expect(result.rankedAll.map((r) => r.condition)).toEqual(['Big', 'Small', 'Other']);
      expect(result.rankedAll[1].score).toBe(0.833);
      expect(result.urgency).toBe('urgent');
    });

    it('should stay self care on baseline-only scores', () => {
      const result = runRuleEngine([], threeConditionKb());
      expect(result.rankedAll.every((r) => r.rawScore === 0.5)).toBe(true);
      expect(result.urgency).toBe('self_care');
    });

    it('should return at most three top conditions and the full ranking', () => {
      const kb = buildKb({
        conditions: ['one', 'two', 'three', 'four', 'five'].map((name) => ({ name })),
      });
      const result = runRuleEngine([], kb);
      expect(result.topConditions.map((r) => r.condition)).toEqual(['one', 'two', 'three']);
      expect(result.rankedAll).toHaveLength(5);
    });

    it('should return a shorter top list for a small KB', () => {
      const result = runRuleEngine([], buildKb({ conditions: [{ name: 'one' }, { name: 'two' }] }));
      expect(result.topConditions).toHaveLength(2);
    });

    it('should handle an empty knowledge base', () => {
      const result = runRuleEngine(['fever'], buildKb({}));
      expect(result).toEqual({ topConditions: [], urgency: 'self_care', rankedAll: [] });
    });

    it('should give identical results for identical input', () => {
      const kb = threeConditionKb();
      expect(runRuleEngine(['x', 'z'], kb)).toEqual(runRuleEngine(['x', 'z'], kb));
    });
  });
});
