import { connect } from 'mqtt';
import type { IClientOptions, MqttClient } from 'mqtt';

export type MessageHandler = (payload: Buffer, topic: string) => Promise<unknown>;
export type MqttConnectFn = (brokerUrl: string, opts: IClientOptions) => MqttClient;

export interface MqttListenerOptions {
  host: string;
  port: number;
  topic: string;
  clientId: string;
  /** Delay between reconnect attempts; the client handles reconnection itself. */
  reconnectPeriodMs?: number;
}

/**
 * Subscribes to the telemetry topic and feeds each message to a handler.
 * Messages are handled one at a time, in arrival order.
 */
export class MqttTelemetryListener {
  private client: MqttClient | null = null;
  private queue: Promise<void> = Promise.resolve();

  constructor(
    private readonly options: MqttListenerOptions,
    private readonly handler: MessageHandler,
    private readonly connectFn: MqttConnectFn = connect,
  ) {}

  get brokerUrl(): string {
    return `mqtt://${this.options.host}:${this.options.port}`;
  }

  isConnected(): boolean {
    return this.client?.connected ?? false;
  }

  start(): void {
    if (this.client) return;

    const client = this.connectFn(this.brokerUrl, {
      clientId: this.options.clientId,
      keepalive: 60,
      reconnectPeriod: this.options.reconnectPeriodMs ?? 5_000,
    });

    // Fires on the first connect and again after every reconnect
    client.on('connect', () => {
      console.log(`[mqtt] connected to ${this.brokerUrl}`);
      this.subscribe(client);
    });
    client.on('message', (topic, payload) => this.enqueue(topic, payload));
    client.on('reconnect', () => console.log(`[mqtt] reconnecting to ${this.brokerUrl}`));
    client.on('offline', () => console.warn('[mqtt] client offline'));
    client.on('error', (err) => console.error('[mqtt] client error:', err.message));

    this.client = client;
  }

  /** Resolves once every message received so far has been handled. */
  drain(): Promise<void> {
    return this.queue;
  }

  async stop(): Promise<void> {
    const client = this.client;
    if (!client) return;
    this.client = null;
    await client.endAsync();
    await this.queue;
    console.log('[mqtt] disconnected');
  }

  private subscribe(client: MqttClient): void {
    const { topic } = this.options;
    client.subscribe(topic, { qos: 0 }, (err) => {
      if (err) {
        console.error(`[mqtt] subscribe to ${topic} failed:`, err.message);
        return;
      }
      console.log(`[mqtt] subscribed to topic: ${topic}`);
    });
  }

  private enqueue(topic: string, payload: Buffer): void {
    this.queue = this.queue.then(async () => {
      try {
        await this.handler(payload, topic);
      } catch (err) {
        console.error(`[mqtt] handler failed for message on ${topic}`, err);
      }
    });
  }
}
