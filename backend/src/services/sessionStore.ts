import { AssessmentResult } from './assessmentService';

/**
 * Where assessment results live between submission and display/export.
 * Results are self-contained JSON, so any backing store can hold them.
 */
export interface SessionStore {
  save(result: AssessmentResult): Promise<void>;
  get(sessionId: string): Promise<AssessmentResult | undefined>;
  size(): Promise<number>;
}

/**
 * Process-local store; contents are lost on restart.
 * Holds at most `maxSessions` results, dropping the oldest first.
 */
export class InMemorySessionStore implements SessionStore {
  private sessions = new Map<string, AssessmentResult>();

  constructor(private readonly maxSessions = 1000) {}

  async save(result: AssessmentResult): Promise<void> {
    this.sessions.delete(result.sessionId);
    this.sessions.set(result.sessionId, result);

    // Map iterates in insertion order, so the first key is the oldest
    while (this.sessions.size > this.maxSessions) {
      const oldest = this.sessions.keys().next();
      if (oldest.done) break;
      this.sessions.delete(oldest.value);
    }
  }

  async get(sessionId: string): Promise<AssessmentResult | undefined> {
    return this.sessions.get(sessionId);
  }

  async size(): Promise<number> {
    return this.sessions.size;
  }
}
