/**
 * Session Manager
 * Keeps a short, expiring conversation history per session
 */

import { env } from '../env.js';
import { TTLCache } from '../utils/ttl-cache.js';

export interface SessionMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface SessionManagerOptions {
  /** Exchanges (user + assistant pairs) kept per session. */
  maxHistory?: number;
  ttlMs?: number;
}

export class SessionManager {
  private sessions: TTLCache<string, SessionMessage[]>;
  private maxHistory: number;
  private sessionCounter = 0;

  constructor(options: SessionManagerOptions = {}) {
    this.maxHistory = options.maxHistory ?? env.MAX_HISTORY;
    this.sessions = new TTLCache(options.ttlMs ?? env.SESSION_TTL_MS);
  }

  createSession(): string {
    this.sessionCounter++;
    const sessionId = `session_${this.sessionCounter}`;
    this.sessions.set(sessionId, []);
    return sessionId;
  }

  hasSession(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  addMessage(sessionId: string, role: SessionMessage['role'], content: string): void {
    const messages = [...(this.sessions.get(sessionId) ?? []), { role, content }];
    const limit = this.maxHistory * 2;
    this.sessions.set(sessionId, messages.length > limit ? messages.slice(-limit) : messages);
  }

  addExchange(sessionId: string, userMessage: string, assistantMessage: string): void {
    this.addMessage(sessionId, 'user', userMessage);
    this.addMessage(sessionId, 'assistant', assistantMessage);
  }

  getConversationHistory(sessionId: string): string | null {
    const messages = this.sessions.get(sessionId);
    if (!messages || messages.length === 0) {
      return null;
    }

    return messages
      .map(m => `${m.role === 'user' ? 'User' : 'Assistant'}: ${m.content}`)
      .join('\n');
  }

  clearSession(sessionId: string): void {
    this.sessions.delete(sessionId);
  }

  close(): void {
    this.sessions.destroy();
  }
}
