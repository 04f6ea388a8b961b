import { Inject, Injectable } from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import { ConfigurationError } from '../config/config.errors.js';
import type { ChatConfig } from '../config/configuration.js';
import { CHAT_CONFIG } from './chat.constants.js';

export interface ConversationTurn {
  user: string;
  assistant: string;
}

/**
 * In-memory conversation history. Each session keeps at most `maxHistory`
 * exchanges, oldest dropped first.
 */
@Injectable()
export class SessionService {
  private readonly sessions = new Map<string, ConversationTurn[]>();
  private readonly maxHistory: number;

  constructor(@Inject(CHAT_CONFIG) options: Pick<ChatConfig, 'maxHistory'>) {
    if (!Number.isInteger(options.maxHistory) || options.maxHistory < 0) {
      throw new ConfigurationError(
        `MAX_HISTORY must be a non-negative integer, received ${options.maxHistory}`,
      );
    }
    this.maxHistory = options.maxHistory;
  }

  createSession(): string {
    const id = randomUUID();
    this.sessions.set(id, []);
    return id;
  }

  addExchange(sessionId: string, user: string, assistant: string): void {
    const turns = this.sessions.get(sessionId) ?? [];
    turns.push({ user, assistant });
    if (turns.length > this.maxHistory) {
      turns.splice(0, turns.length - this.maxHistory);
    }
    this.sessions.set(sessionId, turns);
  }

  getHistory(sessionId: string): ConversationTurn[] {
    const turns = this.sessions.get(sessionId) ?? [];
    return turns.map((turn) => ({ ...turn }));
  }
}
