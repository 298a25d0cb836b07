import { randomUUID } from 'node:crypto';
import { DuplicateSessionError, UnknownSessionError } from './errors';
import { Session, Turn } from './types';

export interface SessionStoreOptions {
  clock?: () => Date;
  userIdFactory?: () => string;
}

interface SessionState {
  sessionId: string;
  userId: string;
  startTime: string;
  transcript: Turn[];
}

/**
 * In-memory store of the sessions that currently have a live connection.
 * A closed session leaves the store, so its id may be opened again later.
 */
export class SessionStore {
  private readonly sessions = new Map<string, SessionState>();
  private readonly clock: () => Date;
  private readonly userIdFactory: () => string;

  constructor(options: SessionStoreOptions = {}) {
    this.clock = options.clock ?? (() => new Date());
    this.userIdFactory = options.userIdFactory ?? randomUUID;
  }

  get size(): number {
    return this.sessions.size;
  }

  open(sessionId: string): Session {
    if (this.sessions.has(sessionId)) {
      throw new DuplicateSessionError(sessionId);
    }

    const state: SessionState = {
      sessionId,
      userId: this.userIdFactory(),
      startTime: this.clock().toISOString(),
      transcript: [],
    };

    this.sessions.set(sessionId, state);
    return snapshot(state);
  }

  close(sessionId: string): Session | undefined {
    const state = this.sessions.get(sessionId);
    if (!state) {
      return undefined;
    }

    this.sessions.delete(sessionId);
    return { ...snapshot(state), endTime: this.clock().toISOString() };
  }

  get(sessionId: string): Session | undefined {
    const state = this.sessions.get(sessionId);
    return state ? snapshot(state) : undefined;
  }

  appendTurn(sessionId: string, turn: Turn): void {
    this.require(sessionId).transcript.push(turn);
  }

  readTranscript(sessionId: string): readonly Turn[] {
    return [...this.require(sessionId).transcript];
  }

  private require(sessionId: string): SessionState {
    const state = this.sessions.get(sessionId);
    if (!state) {
      throw new UnknownSessionError(sessionId);
    }
    return state;
  }
}

function snapshot(state: SessionState): Session {
  return {
    sessionId: state.sessionId,
    userId: state.userId,
    startTime: state.startTime,
    transcript: [...state.transcript],
  };
}
