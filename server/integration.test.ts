import { createServer, type Server } from 'node:http';
import { describe, it, expect } from 'vitest';
import { createColonyConfig, worldSize } from '../src/config.ts';
import { createLogger } from '../src/logger.ts';
import { PROTOCOL_VERSION, type WelcomeMsg } from './protocol.ts';
import { startServerWithGuard, TestClient } from './test/harness.ts';
import { WsHub } from './wsHub.ts';

function testWelcome(): WelcomeMsg {
  const config = createColonyConfig({ seed: 3 });
  return {
    type: 'welcome',
    sessionId: 'test-session',
    protocolVersion: PROTOCOL_VERSION,
    seed: config.seed,
    cfgHash: '00000000',
    world: worldSize(config),
    config
  };
}

/** Listens on an ephemeral port; null when the sandbox forbids binding. */
async function listenOrNull(server: Server): Promise<number | null> {
  return new Promise((resolve, reject) => {
    server.once('error', (err) => {
      if ('code' in err && err.code === 'EPERM') resolve(null);
      else reject(err);
    });
    server.listen({ port: 0, host: '127.0.0.1' }, () => {
      const address = server.address();
      resolve(typeof address === 'object' && address ? address.port : null);
    });
  });
}

async function greet(url: string): Promise<TestClient> {
  const client = new TestClient(url);
  await client.opened();
  client.send({ type: 'hello', version: 1 });
  await client.nextOfType('welcome');
  return client;
}

describe('integration: websocket protocol', () => {
  it('answers ping with pong after the handshake', async () => {
    const server = await startServerWithGuard();
    if (!server) return;
    const client = new TestClient(server.wsUrl);
    try {
      await client.opened();
      client.send({ type: 'hello', version: 1 });
      await client.nextOfType('welcome');
      client.send({ type: 'ping', t: 42 });
      expect(await client.nextOfType('pong')).toEqual({ type: 'pong', t: 42 });
    } finally {
      client.close();
      await server.close();
    }
  });

  it('closes with 1008 on a ping before hello', async () => {
    const server = await startServerWithGuard();
    if (!server) return;
    const client = new TestClient(server.wsUrl);
    try {
      await client.opened();
      client.send({ type: 'ping' });
      expect(await client.nextOfType('error')).toEqual({
        type: 'error',
        message: 'hello required before ping'
      });
      expect(await client.closed()).toBe(1008);
    } finally {
      client.close();
      await server.close();
    }
  });

  it('rejects malformed JSON', async () => {
    const server = await startServerWithGuard();
    if (!server) return;
    const client = new TestClient(server.wsUrl);
    try {
      await client.opened();
      client.socket.send('{not json');
      expect(await client.nextOfType('error')).toEqual({ type: 'error', message: 'invalid JSON' });
      expect(await client.closed()).toBe(1008);
    } finally {
      client.close();
      await server.close();
    }
  });

  it('rejects a second hello', async () => {
    const server = await startServerWithGuard();
    if (!server) return;
    const client = new TestClient(server.wsUrl);
    try {
      await client.opened();
      client.send({ type: 'hello', version: 1 });
      await client.nextOfType('welcome');
      client.send({ type: 'hello', version: 1 });
      expect(await client.nextOfType('error')).toEqual({ type: 'error', message: 'duplicate hello' });
      expect(await client.closed()).toBe(1008);
    } finally {
      client.close();
      await server.close();
    }
  });

  it('rejects binary frames', async () => {
    const server = await startServerWithGuard();
    if (!server) return;
    const client = new TestClient(server.wsUrl);
    try {
      await client.opened();
      client.socket.send(Buffer.from([1, 2, 3]));
      expect(await client.nextOfType('error')).toEqual({
        type: 'error',
        message: 'binary messages are not supported'
      });
      expect(await client.closed()).toBe(1008);
    } finally {
      client.close();
      await server.close();
    }
  });

  it('answers an oversized text frame with a protocol error and keeps serving', async () => {
    const server = await startServerWithGuard();
    if (!server) return;
    const client = await greet(server.wsUrl);
    let next: TestClient | null = null;
    try {
      client.socket.send('x'.repeat(20000));
      expect(await client.nextOfType('error')).toEqual({ type: 'error', message: 'message too large' });
      expect(await client.closed()).toBe(1008);

      next = await greet(server.wsUrl);
      next.send({ type: 'ping', t: 1 });
      expect(await next.nextOfType('pong')).toEqual({ type: 'pong', t: 1 });
      const health = await fetch(`${server.httpUrl}/health`);
      expect(health.status).toBe(200);
    } finally {
      client.close();
      next?.close();
      await server.close();
    }
  });

  it('logs and drops a client whose frame exceeds the hard limit', async () => {
    const lines: string[] = [];
    const httpServer = createServer();
    const hub = new WsHub(httpServer, testWelcome(), {
      maxMessageBytes: 1024,
      logger: createLogger('warn', (line) => lines.push(line))
    });
    const port = await listenOrNull(httpServer);
    if (port === null) return;
    const url = `ws://127.0.0.1:${port}`;
    const client = await greet(url);
    let next: TestClient | null = null;
    try {
      client.socket.send('x'.repeat(5000));
      expect(await client.closed()).toBe(1009);
      expect(lines).toHaveLength(1);
      expect(lines[0]).toContain(' | warn | ws | client 1 dropped: Max payload size exceeded');

      next = await greet(url);
      expect(hub.getClientCount()).toBe(1);
    } finally {
      client.close();
      next?.close();
      hub.closeAll();
      await new Promise<void>((resolve) => httpServer.close(() => resolve()));
    }
  });
});
