import { v7 as uuidv7 } from "uuid";
import type { SessionId } from "@wayfarer/types";

export interface ChatState {
  readonly sessionId: SessionId;
  /** When on, messages are answered from stored results instead of a new search. */
  readonly followup: boolean;
}

/**
 * Maps Telegram chats to travel sessions. Each chat has one active
 * session and a follow-up toggle, off for every new or loaded session.
 */
export class ChatSessions {
  private readonly chats = new Map<number, ChatState>();

  constructor(private readonly newId: () => SessionId = uuidv7) {}

  current(chatId: number): ChatState {
    return this.chats.get(chatId) ?? this.startNew(chatId);
  }

  startNew(chatId: number): ChatState {
    return this.set(chatId, { sessionId: this.newId(), followup: false });
  }

  load(chatId: number, sessionId: SessionId): ChatState {
    return this.set(chatId, { sessionId, followup: false });
  }

  toggleFollowup(chatId: number): ChatState {
    const state = this.current(chatId);
    return this.set(chatId, { ...state, followup: !state.followup });
  }

  forget(chatId: number): void {
    this.chats.delete(chatId);
  }

  private set(chatId: number, state: ChatState): ChatState {
    this.chats.set(chatId, state);
    return state;
  }
}
