import { Inject, Injectable, Logger } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { TUTOR_CONFIG, TutorConfig } from '../../utils/config';
import { ConversationTurn } from '../../utils/types';
import { ConversationStore } from './types';

type Session = {
  turns: ConversationTurn[];
  lastActiveAt: number;
};

@Injectable()
export class ChatMemoryService implements ConversationStore {
  private readonly logger = new Logger(ChatMemoryService.name);
  private readonly sessions = new Map<string, Session>();

  constructor(@Inject(TUTOR_CONFIG) private readonly config: TutorConfig) {}

  async getRecentHistoryAsc(sessionId: string, limit = this.config.maxHistoryTurns): Promise<ConversationTurn[]> {
    const session = this.sessions.get(sessionId);
    if (!session || limit <= 0) return [];
    return session.turns.slice(-limit);
  }

  async append(sessionId: string, turns: ConversationTurn[]): Promise<void> {
    const session = this.sessions.get(sessionId) ?? { turns: [], lastActiveAt: 0 };
    const all = [...session.turns, ...turns];
    // oldest turns go first
    session.turns = all.slice(Math.max(0, all.length - this.config.maxHistoryTurns));
    session.lastActiveAt = Date.now();
    this.sessions.set(sessionId, session);
  }

  async clear(sessionId: string): Promise<boolean> {
    return this.sessions.delete(sessionId);
  }

  get sessionCount(): number {
    return this.sessions.size;
  }

  @Cron(CronExpression.EVERY_10_MINUTES)
  pruneIdleSessions(now = Date.now()): number {
    let pruned = 0;
    for (const [sessionId, session] of this.sessions) {
      if (now - session.lastActiveAt > this.config.sessionIdleTtlMs) {
        this.sessions.delete(sessionId);
        pruned++;
      }
    }
    if (pruned > 0) this.logger.log(`Pruned ${pruned} idle session(s)`);
    return pruned;
  }
}
