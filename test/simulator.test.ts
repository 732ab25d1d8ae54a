import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import supertest from 'supertest';
import WebSocket from 'ws';
import { DeviceSimulator, defaultDeviceInfo } from '../src/simulator/device-simulator.js';
import { decodeMessage, encodeMessage } from '../src/protocol/codec.js';
import type { Message } from '../src/protocol/messages.js';

function nextMessage(socket: WebSocket): Promise<Message> {
  return new Promise((resolve, reject) => {
    socket.once('message', (data) => {
      const decoded = decodeMessage(data.toString());
      if (decoded.ok) {
        resolve(decoded.message);
      } else {
        reject(new Error(`Undecodable frame: ${decoded.reason}`));
      }
    });
  });
}

function openClient(url: string): Promise<WebSocket> {
  return new Promise((resolve, reject) => {
    const socket = new WebSocket(url);
    socket.once('open', () => resolve(socket));
    socket.once('error', reject);
  });
}

describe('DeviceSimulator', () => {
  describe('HTTP routes', () => {
    it('should serve device info', async () => {
      const simulator = new DeviceSimulator({ name: 'bench-pi' });

      const res = await supertest(simulator.createApp()).get('/system/info');

      assert.strictEqual(res.status, 200);
      assert.deepStrictEqual(res.body, defaultDeviceInfo('bench-pi'));
    });

    it('should serve an error body for a failing status endpoint', async () => {
      const simulator = new DeviceSimulator({ infoStatus: 503 });

      const res = await supertest(simulator.createApp()).get('/system/info');

      assert.strictEqual(res.status, 503);
      assert.deepStrictEqual(res.body, { error: 'Status unavailable' });
    });

    it('should serve custom info verbatim', async () => {
      const simulator = new DeviceSimulator({ info: { name: 'bare', version: '0.1' } });

      const res = await supertest(simulator.createApp()).get('/system/info');

      assert.deepStrictEqual(res.body, { name: 'bare', version: '0.1' });
    });

    it('should report health and 404 unknown routes', async () => {
      const app = new DeviceSimulator().createApp();

      const health = await supertest(app).get('/health');
      assert.deepStrictEqual(health.body, { status: 'ok', connections: 0 });

      const missing = await supertest(app).get('/nope');
      assert.strictEqual(missing.status, 404);
      assert.deepStrictEqual(missing.body, { error: 'Not found' });
    });
  });

  describe('audio stream', () => {
    let simulator: DeviceSimulator;
    let socket: WebSocket | null = null;

    beforeEach(async () => {
      simulator = new DeviceSimulator({ resultEveryBytes: 100 });
      await simulator.start();
    });

    afterEach(async () => {
      socket?.terminate();
      socket = null;
      await simulator.stop();
    });

    it('should not report a port before it starts', () => {
      assert.throws(() => new DeviceSimulator().port, { message: 'Simulator is not listening' });
    });

    it('should count connected clients in the status payload', async () => {
      socket = await openClient(`ws://127.0.0.1:${simulator.port}/ws/audio`);

      const res = await fetch(`http://127.0.0.1:${simulator.port}/system/info`);
      const body: unknown = await res.json();

      const expected = defaultDeviceInfo();
      expected.status = {
        cpu_usage: 12.5,
        memory_usage: 40.1,
        temperature: 48.3,
        disk_usage: 22,
        uptime: 3600,
        is_recording: false,
        active_connections: 1,
      };
      assert.strictEqual(simulator.connectionCount, 1);
      assert.deepStrictEqual(body, expected);
    });

    it('should answer ping with pong', async () => {
      socket = await openClient(`ws://127.0.0.1:${simulator.port}/ws/audio`);
      const reply = nextMessage(socket);

      socket.send(encodeMessage('ping'));

      assert.strictEqual((await reply).type, 'pong');
    });

    it('should stay quiet when ping answering is off', async () => {
      simulator.setRespondToPing(false);
      socket = await openClient(`ws://127.0.0.1:${simulator.port}/ws/audio`);
      let replies = 0;
      socket.on('message', () => replies++);
      const seen = new Promise<void>((resolve) => simulator.once('message', () => resolve()));

      socket.send(encodeMessage('ping'));
      await seen;
      await new Promise((resolve) => setTimeout(resolve, 50));

      assert.strictEqual(replies, 0);
    });

    it('should report malformed frames', async () => {
      socket = await openClient(`ws://127.0.0.1:${simulator.port}/ws/audio`);
      const reply = nextMessage(socket);

      socket.send('not json');

      const message = await reply;
      assert.strictEqual(message.type, 'error');
      assert.deepStrictEqual(message.data, { message: 'Malformed message: invalid_json' });
    });

    it('should send a recognition result per block of audio', async () => {
      socket = await openClient(`ws://127.0.0.1:${simulator.port}/ws/audio`);
      const reply = nextMessage(socket);

      socket.send(Buffer.alloc(60));
      socket.send(Buffer.alloc(60));

      const message = await reply;
      assert.strictEqual(message.type, 'recognition_result');
      assert.ok(typeof message.data === 'object' && message.data !== null);
      assert.strictEqual('speaker_id' in message.data && message.data.speaker_id, 'spk-1');
      assert.strictEqual('audio_duration' in message.data && message.data.audio_duration, 120 / 32_000);
    });

    it('should refuse other upgrade paths', async () => {
      await assert.rejects(openClient(`ws://127.0.0.1:${simulator.port}/ws/video`));
    });
  });
});
