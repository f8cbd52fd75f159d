import { ConversationTurn } from '../../utils/types';

export const CONVERSATION_STORE = Symbol('CONVERSATION_STORE');

/** Per-session turn history, bounded to the most recent turns. */
export interface ConversationStore {
  /** Chronological (oldest first) tail of at most `limit` turns. */
  getRecentHistoryAsc(sessionId: string, limit?: number): Promise<ConversationTurn[]>;
  append(sessionId: string, turns: ConversationTurn[]): Promise<void>;
  /** Returns false when the session was unknown. */
  clear(sessionId: string): Promise<boolean>;
}
