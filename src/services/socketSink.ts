/**
 * NotificationSink backed by live client connections.
 *
 * Each session has at most one attached channel. Events for a session with no
 * channel, or whose channel is no longer open, are dropped.
 */

import { toFrame } from '../core/frames';
import { SinkDeliveryError } from '../core/errors';
import { logger } from '../core/logger';
import { NotificationEvent, NotificationSink } from '../core/types';

/** The part of a socket the sink needs. */
export interface FrameChannel {
  readonly isOpen: boolean;
  send(data: string): void;
}

export class SocketNotificationSink implements NotificationSink {
  private readonly channels = new Map<string, FrameChannel>();

  attach(sessionId: string, channel: FrameChannel): void {
    this.channels.set(sessionId, channel);
  }

  detach(sessionId: string): void {
    this.channels.delete(sessionId);
  }

  isAttached(sessionId: string): boolean {
    return this.channels.has(sessionId);
  }

  notify(sessionId: string, event: NotificationEvent): void {
    const channel = this.channels.get(sessionId);
    if (!channel || !channel.isOpen) {
      logger.debug('Dropping notification, no live connection', { sessionId }, { eventType: event.type });
      return;
    }

    try {
      channel.send(JSON.stringify(toFrame(sessionId, event)));
    } catch (err) {
      const failure = new SinkDeliveryError(sessionId, err);
      logger.warn(failure.message, { sessionId }, { eventType: event.type });
    }
  }
}
