/**
 * Binds one accepted WebSocket to the relay.
 *
 * Listeners go on before the session is opened. Frames and the close event
 * that arrive while `connect` is still pending are handled once it settles,
 * in arrival order.
 */

import { RawData, WebSocket } from 'ws';
import { describeError, DuplicateSessionError } from '../core/errors';
import { toFrame } from '../core/frames';
import { logger } from '../core/logger';
import { ConversationRelay } from './relay';
import { FrameChannel } from './socketSink';

export const DUPLICATE_SESSION_CLOSE_CODE = 4409;

/** The part of a `ws` socket the relay uses. */
export interface RelaySocket {
  readonly readyState: number;
  send(data: string, cb?: (err?: Error) => void): void;
  close(code?: number, reason?: string): void;
  on(event: 'message', listener: (data: RawData) => void): this;
  on(event: 'close', listener: () => void): this;
  on(event: 'error', listener: (error: Error) => void): this;
}

export interface ConnectionHandle {
  /** true once the session is open, false if the connection was refused. */
  readonly accepted: Promise<boolean>;
  /** Resolves when everything received so far has been handled. */
  idle(): Promise<void>;
}

export function bindConnection(
  socket: RelaySocket,
  relay: ConversationRelay,
  sessionId: string,
  remoteAddress: string,
): ConnectionHandle {
  const log = logger.with({ sessionId, remoteAddress });
  const pending = new Set<Promise<void>>();

  const channel: FrameChannel = {
    get isOpen() {
      return socket.readyState === WebSocket.OPEN;
    },
    send(data) {
      socket.send(data, (error) => {
        if (error) {
          log.warn(`failed to send websocket frame: ${error.message}`);
        }
      });
    },
  };

  const accepted = relay.connect(sessionId, channel).then(
    () => {
      log.info('client connected');
      return true;
    },
    (error: unknown) => {
      if (error instanceof DuplicateSessionError) {
        log.warn('Rejected duplicate session');
        channel.send(JSON.stringify(toFrame(sessionId, { type: 'error', message: error.message })));
        socket.close(DUPLICATE_SESSION_CLOSE_CODE, 'duplicate_session');
      } else {
        log.error(`connection setup failed: ${describeError(error)}`);
        socket.close(1011, 'internal_error');
      }
      return false;
    },
  );

  const afterConnect = (label: string, work: () => Promise<unknown>): void => {
    const task: Promise<void> = accepted
      .then((ok) => (ok ? work() : undefined))
      .then(
        () => undefined,
        (error: unknown) => {
          log.error(`${label} failed: ${describeError(error)}`);
        },
      )
      .finally(() => {
        pending.delete(task);
      });
    pending.add(task);
  };

  socket.on('message', (raw) => {
    const text = rawToText(raw);
    afterConnect('message handling', () => relay.receive(sessionId, text));
  });

  socket.on('close', () => {
    log.info('client disconnected');
    afterConnect('disconnect handling', () => relay.disconnect(sessionId));
  });

  socket.on('error', (error) => {
    log.warn(`socket error: ${error.message}`);
  });

  return {
    accepted,
    idle: async () => {
      await Promise.all([...pending]);
    },
  };
}

function rawToText(raw: RawData): string {
  if (Array.isArray(raw)) {
    return Buffer.concat(raw).toString('utf8');
  }
  if (Buffer.isBuffer(raw)) {
    return raw.toString('utf8');
  }
  return Buffer.from(raw).toString('utf8');
}
