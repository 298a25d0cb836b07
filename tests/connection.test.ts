/**
 * Tests for the socket -> relay wiring: listeners are live before the session
 * is opened, and early frames and closes are handled once connect settles.
 */

import { EventEmitter } from 'node:events';
import { WebSocket } from 'ws';
import { ConversationOrchestrator } from '../src/core/orchestrator';
import { SessionStore } from '../src/core/sessionStore';
import { ToolRegistry } from '../src/core/toolRegistry';
import { bindConnection, DUPLICATE_SESSION_CLOSE_CODE, RelaySocket } from '../src/services/connection';
import { ConversationRelay } from '../src/services/relay';
import { SocketNotificationSink } from '../src/services/socketSink';
import { accountTools } from '../src/tools/accountTools';
import { final, GatedAuditLog, RecordingAuditLog, ScriptedModelClient, ScriptStep, text } from './fakes';

class FakeSocket extends EventEmitter implements RelaySocket {
  readyState: number = WebSocket.OPEN;
  readonly sent: string[] = [];
  closedWith: { code?: number; reason?: string } | undefined;

  send(data: string): void {
    this.sent.push(data);
  }

  close(code?: number, reason?: string): void {
    this.closedWith = { code, reason };
    this.readyState = WebSocket.CLOSED;
  }

  frames(): unknown[] {
    return this.sent.map((data) => JSON.parse(data));
  }
}

function setup(steps: ScriptStep[] = [], auditLog: RecordingAuditLog = new RecordingAuditLog()) {
  const sessions = new SessionStore({ userIdFactory: () => 'user-1' });
  const sink = new SocketNotificationSink();
  const orchestrator = new ConversationOrchestrator(
    { sessions, tools: new ToolRegistry(accountTools), model: new ScriptedModelClient(steps), sink },
    { systemPrompt: 'test prompt', maxRoundTrips: 4 },
  );
  const relay = new ConversationRelay(
    { sessions, orchestrator, sink, auditLog },
    { maxFrameBytes: 1024, rateLimitPerMinute: 30 },
  );
  return { relay, sessions, sink, auditLog };
}

beforeEach(() => {
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  jest.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(() => {
  jest.restoreAllMocks();
});

// ─── Before connect settles ─────────────────────────────────────────────────

describe('while the session record is being written', () => {
  test('frames are held and handled in order once connected', async () => {
    const auditLog = new GatedAuditLog('createSessionRecord');
    const { relay, sessions } = setup([final(text('hi there'))], auditLog);
    const socket = new FakeSocket();

    const handle = bindConnection(socket, relay, 'sess-1', '127.0.0.1');
    socket.emit('message', Buffer.from('{"message":"early"}'));

    expect(sessions.readTranscript('sess-1')).toEqual([]);

    auditLog.gate.resolve();
    await expect(handle.accepted).resolves.toBe(true);
    await handle.idle();

    expect(socket.frames()).toEqual([
      { type: 'connection', status: 'connected', session_id: 'sess-1', user_id: 'user-1' },
      { type: 'response', content: 'hi there' },
    ]);
    expect(sessions.readTranscript('sess-1')).toEqual([
      { role: 'user', content: 'early' },
      { role: 'assistant', content: 'hi there' },
    ]);
  });

  test('a close still closes the session and frees its id', async () => {
    const auditLog = new GatedAuditLog('createSessionRecord');
    const { relay, sessions } = setup([], auditLog);
    const socket = new FakeSocket();

    const handle = bindConnection(socket, relay, 'sess-1', '127.0.0.1');
    socket.readyState = WebSocket.CLOSED;
    socket.emit('close');

    auditLog.gate.resolve();
    await handle.accepted;
    await handle.idle();

    expect(sessions.size).toBe(0);
    expect(auditLog.entries.map((entry) => entry.kind)).toEqual(['create', 'close']);

    const again = bindConnection(new FakeSocket(), relay, 'sess-1', '127.0.0.1');
    await expect(again.accepted).resolves.toBe(true);
  });

  test('a socket error is logged rather than thrown', () => {
    const auditLog = new GatedAuditLog('createSessionRecord');
    const { relay } = setup([], auditLog);
    const socket = new FakeSocket();

    bindConnection(socket, relay, 'sess-1', '127.0.0.1');

    expect(() => socket.emit('error', new Error('Max payload size exceeded'))).not.toThrow();
    expect(console.warn).toHaveBeenCalledTimes(1);
    auditLog.gate.resolve();
  });
});

// ─── Duplicates ─────────────────────────────────────────────────────────────

describe('duplicate session id', () => {
  test('refuses the second socket and leaves the first session open', async () => {
    const { relay, sessions, sink } = setup();
    const first = new FakeSocket();
    const second = new FakeSocket();

    await bindConnection(first, relay, 'sess-1', '10.0.0.1').accepted;
    const refused = bindConnection(second, relay, 'sess-1', '10.0.0.2');

    await expect(refused.accepted).resolves.toBe(false);
    expect(second.frames()).toEqual([{ type: 'error', content: 'Session sess-1 is already active' }]);
    expect(second.closedWith).toEqual({ code: DUPLICATE_SESSION_CLOSE_CODE, reason: 'duplicate_session' });

    second.emit('close');
    await refused.idle();

    expect(sessions.get('sess-1')).toBeDefined();
    expect(sink.isAttached('sess-1')).toBe(true);
  });
});

// ─── Frame decoding ─────────────────────────────────────────────────────────

describe('frame decoding', () => {
  test('joins fragmented binary frames', async () => {
    const { relay, sessions } = setup([final(text('ok'))]);
    const socket = new FakeSocket();
    const handle = bindConnection(socket, relay, 'sess-1', '127.0.0.1');

    socket.emit('message', [Buffer.from('{"message":'), Buffer.from('"split"}')]);
    await handle.idle();

    expect(sessions.readTranscript('sess-1')).toEqual([
      { role: 'user', content: 'split' },
      { role: 'assistant', content: 'ok' },
    ]);
  });
});
