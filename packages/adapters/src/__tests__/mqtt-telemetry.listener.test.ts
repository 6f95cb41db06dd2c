/**
 * MqttTelemetryListener Tests
 *
 * An EventEmitter stands in for the mqtt client; tests emit broker events
 * on it and observe subscriptions and handler ordering.
 */

import { EventEmitter } from 'events';
import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import type { IClientOptions, MqttClient } from 'mqtt';
import { MqttTelemetryListener } from '../mqtt/mqtt-telemetry.listener.js';
import type { MessageHandler } from '../mqtt/mqtt-telemetry.listener.js';

class FakeMqttClient extends EventEmitter {
  connected = false;
  readonly subscriptions: Array<{ topic: string; qos: number }> = [];
  ended = false;
  subscribeError: Error | null = null;

  subscribe(topic: string, opts: { qos: number }, cb: (err: Error | null) => void): this {
    this.subscriptions.push({ topic, qos: opts.qos });
    cb(this.subscribeError);
    return this;
  }

  async endAsync(): Promise<void> {
    this.ended = true;
    this.connected = false;
  }
}

const OPTIONS = { host: 'broker.test', port: 1883, topic: 'pool/data', clientId: 'test-client' };

function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

let fake: FakeMqttClient;
let connectCalls: Array<{ url: string; opts: IClientOptions }>;

function makeListener(handler: MessageHandler): MqttTelemetryListener {
  return new MqttTelemetryListener(OPTIONS, handler, (url, opts) => {
    connectCalls.push({ url, opts });
    return fake as unknown as MqttClient;
  });
}

beforeEach(() => {
  fake = new FakeMqttClient();
  connectCalls = [];
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  jest.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe('start()', () => {
  it('connects once to the configured broker', () => {
    const listener = makeListener(async () => undefined);
    listener.start();
    listener.start();

    expect(connectCalls).toHaveLength(1);
    expect(connectCalls[0]?.url).toBe('mqtt://broker.test:1883');
    expect(connectCalls[0]?.opts.clientId).toBe('test-client');
    expect(connectCalls[0]?.opts.reconnectPeriod).toBe(5_000);
  });

  it('subscribes on every connect acknowledgment', () => {
    const listener = makeListener(async () => undefined);
    listener.start();

    fake.emit('connect');
    fake.emit('connect');

    expect(fake.subscriptions).toEqual([
      { topic: 'pool/data', qos: 0 },
      { topic: 'pool/data', qos: 0 },
    ]);
  });

  it('logs a failed subscription without throwing', () => {
    const listener = makeListener(async () => undefined);
    listener.start();
    fake.subscribeError = new Error('not authorized');

    expect(() => fake.emit('connect')).not.toThrow();
    expect(console.error).toHaveBeenCalledWith('[mqtt] subscribe to pool/data failed:', 'not authorized');
  });

  it('reports connection state from the client', () => {
    const listener = makeListener(async () => undefined);
    expect(listener.isConnected()).toBe(false);
    listener.start();
    fake.connected = true;
    expect(listener.isConnected()).toBe(true);
  });
});

describe('message handling', () => {
  it('handles messages one at a time in arrival order', async () => {
    const events: string[] = [];
    let releaseFirst: () => void = () => undefined;
    const listener = makeListener(async (payload) => {
      const text = payload.toString('utf8');
      events.push(`start:${text}`);
      if (text === 'first') {
        await new Promise<void>((resolve) => {
          releaseFirst = resolve;
        });
      }
      events.push(`end:${text}`);
    });
    listener.start();

    fake.emit('message', 'pool/data', Buffer.from('first'));
    fake.emit('message', 'pool/data', Buffer.from('second'));
    await flush();

    expect(events).toEqual(['start:first']);

    releaseFirst();
    await listener.drain();

    expect(events).toEqual(['start:first', 'end:first', 'start:second', 'end:second']);
  });

  it('keeps handling after a handler rejects', async () => {
    const seen: string[] = [];
    const listener = makeListener(async (payload) => {
      const text = payload.toString('utf8');
      if (text === 'boom') throw new Error('handler exploded');
      seen.push(text);
    });
    listener.start();

    fake.emit('message', 'pool/data', Buffer.from('boom'));
    fake.emit('message', 'pool/data', Buffer.from('{"ph":7.4}'));
    await listener.drain();

    expect(seen).toEqual(['{"ph":7.4}']);
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  it('passes the topic through to the handler', async () => {
    const topics: string[] = [];
    const listener = makeListener(async (_payload, topic) => {
      topics.push(topic);
    });
    listener.start();

    fake.emit('message', 'pool/data', Buffer.from('{}'));
    await listener.drain();

    expect(topics).toEqual(['pool/data']);
  });
});

describe('stop()', () => {
  it('ends the client once', async () => {
    const listener = makeListener(async () => undefined);
    listener.start();

    await listener.stop();
    await listener.stop();

    expect(fake.ended).toBe(true);
    expect(listener.isConnected()).toBe(false);
  });

  it('is a no-op before start', async () => {
    const listener = makeListener(async () => undefined);
    await expect(listener.stop()).resolves.toBeUndefined();
    expect(connectCalls).toHaveLength(0);
  });
});
