/**
 * DynamoDB-backed audit log: session records and per-session event logs.
 *
 * Nothing here may fail a conversation. Every write is guarded; a failure is
 * logged as an AuditLogError and the call resolves normally.
 */

import { randomUUID } from 'node:crypto';
import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient, PutCommand, UpdateCommand } from '@aws-sdk/lib-dynamodb';
import { AuditLogError } from '../core/errors';
import { logger } from '../core/logger';
import { AuditEventType, AuditLog, SessionRecord } from '../core/types';

// ─── Table items ────────────────────────────────────────────────────────────

export type SessionItem = {
  sessionId: string;
  userId: string;
  startTime: string;
  status: SessionRecord['status'];
  endTime?: string;
  updatedAt: string;
};

export type EventLogItem = {
  sessionId: string;
  eventId: string;
  eventType: AuditEventType;
  timestamp: string;
  data: string;
};

export interface AuditTables {
  sessions: string;
  eventLogs: string;
}

// ─── Client ─────────────────────────────────────────────────────────────────

export function createDocumentClient(region: string): DynamoDBDocumentClient {
  return DynamoDBDocumentClient.from(new DynamoDBClient({ region }), {
    marshallOptions: { removeUndefinedValues: true },
  });
}

// ─── Audit log ──────────────────────────────────────────────────────────────

export class DynamoAuditLog implements AuditLog {
  constructor(
    private readonly docClient: DynamoDBDocumentClient,
    private readonly tables: AuditTables,
    private readonly eventIdFactory: () => string = randomUUID,
  ) {}

  async createSessionRecord(record: SessionRecord): Promise<void> {
    const item: SessionItem = { ...record, updatedAt: record.startTime };

    await this.guard('createSessionRecord', record.sessionId, async () => {
      await this.docClient.send(new PutCommand({
        TableName: this.tables.sessions,
        Item: item,
      }));
    });
  }

  async closeSessionRecord(sessionId: string, endTime: string): Promise<void> {
    await this.guard('closeSessionRecord', sessionId, async () => {
      await this.docClient.send(new UpdateCommand({
        TableName: this.tables.sessions,
        Key: { sessionId },
        UpdateExpression: 'SET endTime = :end, #status = :status, updatedAt = :end',
        ExpressionAttributeNames: { '#status': 'status' },
        ExpressionAttributeValues: {
          ':end': endTime,
          ':status': 'completed',
        },
      }));
    });
  }

  async record(
    sessionId: string,
    eventType: AuditEventType,
    timestamp: string,
    payload: Record<string, unknown>,
  ): Promise<void> {
    await this.guard('record', sessionId, async () => {
      const item: EventLogItem = {
        sessionId,
        eventId: this.eventIdFactory(),
        eventType,
        timestamp,
        data: JSON.stringify(payload),
      };

      await this.docClient.send(new PutCommand({
        TableName: this.tables.eventLogs,
        Item: item,
      }));
    });
  }

  private async guard(operation: string, sessionId: string, write: () => Promise<void>): Promise<void> {
    try {
      await write();
      logger.debug(`Audit ${operation} ok`, { sessionId });
    } catch (err) {
      const failure = new AuditLogError(operation, err);
      logger.warn(failure.message, { sessionId }, { code: failure.code });
    }
  }
}
