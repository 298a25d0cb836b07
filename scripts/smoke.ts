import crypto from 'node:crypto';
import { WebSocket } from 'ws';

const baseURL = process.env.SMOKE_WS_URL ?? 'ws://localhost:8000/ws/session';
const sessionId = process.env.SMOKE_SESSION_ID ?? `smoke-${crypto.randomUUID()}`;
const message = process.env.SMOKE_TEXT ?? 'What is my account status?';

const url = `${baseURL}/${encodeURIComponent(sessionId)}`;
const socket = new WebSocket(url);

socket.on('open', () => {
  console.log(`connected to ${url}`);
  socket.send(JSON.stringify({ message }));
});

socket.on('message', (raw) => {
  const text = Buffer.isBuffer(raw) ? raw.toString('utf8') : String(raw);

  let frame: unknown;
  try {
    frame = JSON.parse(text);
  } catch {
    console.log(`(non-JSON) ${text}`);
    return;
  }

  console.log(text);
  if (typeof frame === 'object' && frame !== null && 'type' in frame) {
    if (frame.type === 'response' || frame.type === 'error') {
      socket.close();
    }
  }
});

socket.on('close', (code) => {
  console.log(`socket closed (${code})`);
  process.exit(0);
});

socket.on('error', (error) => {
  console.error(`socket error: ${error.message}`);
  process.exit(1);
});

setTimeout(() => {
  socket.close();
}, Number(process.env.SMOKE_DURATION_MS ?? 30000));
