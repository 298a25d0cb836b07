/**
 * Connection lifecycle for the relay, independent of the socket library.
 *
 * connect    -> open session, attach channel, persist session record, say hello
 * receive    -> rate limit, parse, then queue (audit, run, audit outcome) behind
 *               earlier messages of the same session
 * disconnect -> detach channel, let queued messages settle, close everywhere
 */

import { describeParseError, parseInboundFrame } from '../core/frames';
import { logger } from '../core/logger';
import { ConversationOrchestrator, RunOutcome } from '../core/orchestrator';
import { SlidingWindowRateLimiter } from '../core/rateLimiter';
import { KeyedMutex } from '../core/sessionLock';
import { SessionStore } from '../core/sessionStore';
import { AuditEventType, AuditLog, Session } from '../core/types';
import { FrameChannel, SocketNotificationSink } from './socketSink';

export interface RelayConfig {
  maxFrameBytes: number;
  rateLimitPerMinute: number;
}

export interface RelayDependencies {
  sessions: SessionStore;
  orchestrator: ConversationOrchestrator;
  sink: SocketNotificationSink;
  auditLog?: AuditLog;
  clock?: () => Date;
}

export class ConversationRelay {
  private readonly sessions: SessionStore;
  private readonly orchestrator: ConversationOrchestrator;
  private readonly sink: SocketNotificationSink;
  private readonly auditLog: AuditLog | undefined;
  private readonly clock: () => Date;
  private readonly limiters = new Map<string, SlidingWindowRateLimiter>();
  private readonly inbound = new KeyedMutex();

  constructor(deps: RelayDependencies, private readonly config: RelayConfig) {
    this.sessions = deps.sessions;
    this.orchestrator = deps.orchestrator;
    this.sink = deps.sink;
    this.auditLog = deps.auditLog;
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Registers a new connection. Throws DuplicateSessionError, leaving the
   * active session untouched, when the id is already connected.
   */
  async connect(sessionId: string, channel: FrameChannel): Promise<Session> {
    const session = this.sessions.open(sessionId);
    this.sink.attach(sessionId, channel);
    this.limiters.set(sessionId, new SlidingWindowRateLimiter(this.config.rateLimitPerMinute, 60_000));

    logger.info('Session opened', { sessionId, userId: session.userId });

    try {
      await this.auditLog?.createSessionRecord({
        sessionId,
        userId: session.userId,
        startTime: session.startTime,
        status: 'active',
      });
    } catch (err) {
      this.sink.detach(sessionId);
      this.limiters.delete(sessionId);
      this.sessions.close(sessionId);
      throw err;
    }

    this.sink.notify(sessionId, { type: 'connected', userId: session.userId });
    return session;
  }

  /**
   * Handles one raw inbound frame. Resolves with the run outcome, or
   * undefined when the frame never reached the orchestrator. A valid frame is
   * queued before this returns, so frames of one session run in arrival order.
   */
  async receive(sessionId: string, raw: string): Promise<RunOutcome | undefined> {
    const limiter = this.limiters.get(sessionId);
    if (limiter && !limiter.tryAcquire()) {
      logger.warn('Rate limit hit', { sessionId }, { retryAfterMs: limiter.retryAfterMs() });
      this.sink.notify(sessionId, {
        type: 'error',
        message: 'Too many messages for this session in the last minute.',
      });
      return undefined;
    }

    const parsed = parseInboundFrame(raw, this.config.maxFrameBytes);
    if (!parsed.ok) {
      logger.warn('Rejected inbound frame', { sessionId }, { error: parsed.error });
      this.sink.notify(sessionId, { type: 'error', message: describeParseError(parsed.error) });
      return undefined;
    }

    const text = parsed.frame.message;
    return this.inbound.runExclusive(sessionId, () => this.process(sessionId, text));
  }

  /** Idempotent; safe to call for a session that was never connected. */
  async disconnect(sessionId: string): Promise<void> {
    this.sink.detach(sessionId);
    this.limiters.delete(sessionId);

    if (this.orchestrator.isBusy(sessionId)) {
      logger.info('Disconnected mid-run, waiting for the run to settle', { sessionId });
    }
    await this.inbound.runExclusive(sessionId, () => this.orchestrator.settle(sessionId));

    const closed = this.sessions.close(sessionId);
    if (!closed?.endTime) {
      return;
    }

    logger.info('Session closed', { sessionId, userId: closed.userId }, {
      turns: closed.transcript.length,
    });
    await this.auditLog?.closeSessionRecord(sessionId, closed.endTime);
  }

  private async process(sessionId: string, text: string): Promise<RunOutcome> {
    await this.audit(sessionId, 'user_message', { content: text });

    const outcome = await this.orchestrator.handleUserMessage(sessionId, text);

    if (outcome.status === 'done') {
      await this.audit(sessionId, 'ai_response', { content: outcome.text });
    } else {
      await this.audit(sessionId, 'error', { code: outcome.error.code, message: outcome.error.message });
    }
    return outcome;
  }

  private async audit(
    sessionId: string,
    eventType: AuditEventType,
    payload: Record<string, unknown>,
  ): Promise<void> {
    await this.auditLog?.record(sessionId, eventType, this.clock().toISOString(), payload);
  }
}
