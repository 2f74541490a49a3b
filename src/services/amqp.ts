import { connect, Channel, ConsumeMessage } from 'amqplib';
import { z } from 'zod';
import type { Config } from '../config';
import { toControllerError } from '../lib/errors';
import logger from '../lib/logger';

const log = logger.child('amqp');

type AmqpConnection = Awaited<ReturnType<typeof connect>>;

const wait = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export const taskMessageSchema = z.object({
  taskId: z.string().min(1),
  action: z.string().min(1),
  data: z.record(z.unknown()).default({}),
  deadlineMs: z.number().int().positive().optional(),
});

export type TaskMessage = z.input<typeof taskMessageSchema>;

export type TaskResult = {
  taskId: string;
  agentId: string;
  ok: boolean;
  result?: unknown;
  error?: string;
  code?: string;
  finishedAt: string;
};

export type Heartbeat = {
  agentId: string;
  version: string;
  capabilities: string[];
  host: string;
  ts: string;
};

export type TaskHandler = (task: TaskMessage) => Promise<TaskResult>;

/** How a delivery is settled on the channel it arrived on. */
export type DeliverySettlement = {
  deliveryTag: number;
  ack(): void;
  /** Drop without requeue. */
  reject(): void;
};

/**
 * Task queue consumer and result/heartbeat publisher. Reconnects on its own
 * after the broker drops the connection.
 */
export class AmqpService {
  private conn?: AmqpConnection;
  private ch?: Channel;
  private consumer?: TaskHandler;
  private connectPromise?: Promise<void>;
  private reconnectTimer?: NodeJS.Timeout;
  private shuttingDown = false;

  constructor(private readonly settings: Config['broker']) {}

  private get queue(): string {
    return this.settings.task.queue || `agent.${this.settings.service.agentId}.tasks`;
  }

  async init(): Promise<void> {
    await this.ensureConnected();
  }

  async consumeTasks(onTask: TaskHandler): Promise<void> {
    this.consumer = onTask;
    if (!this.ch) {
      await this.ensureConnected();
    }
    await this.startConsumer(onTask);
  }

  publishResult(action: string, result: TaskResult): void {
    const ch = this.getChannel();
    if (!ch) {
      log.warn('dropping result publish, channel unavailable', { action, taskId: result.taskId });
      return;
    }
    log.debug('publishing result', { action, result });
    ch.publish(this.settings.results.exchange, `task.${action}`, Buffer.from(JSON.stringify(result)), {
      contentType: 'application/json',
      deliveryMode: 2,
      correlationId: result.taskId,
    });
  }

  publishHeartbeat(payload: Heartbeat): void {
    const ch = this.getChannel();
    if (!ch) {
      log.warn('dropping heartbeat, channel unavailable', { agentId: payload.agentId });
      return;
    }
    const routingKey = `heartbeat.${payload.agentId}`;
    log.debug('publishing heartbeat', { routingKey, payload });
    ch.publish(this.settings.telemetry.exchange, routingKey, Buffer.from(JSON.stringify(payload)), {
      contentType: 'application/json',
      deliveryMode: 2,
    });
  }

  async close(): Promise<void> {
    this.shuttingDown = true;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = undefined;
    }
    await this.ch?.close();
    await this.conn?.close();
  }

  private async ensureConnected(): Promise<void> {
    if (!this.connectPromise) {
      this.connectPromise = this.connectWithRetry();
    }
    await this.connectPromise;
  }

  private async connectWithRetry(): Promise<void> {
    const delayMs = this.settings.reconnectDelayMs;
    while (!this.shuttingDown) {
      try {
        await this.createConnection();
        return;
      } catch (err) {
        log.error('failed to connect to AMQP, retrying', { err, delayMs });
        await wait(delayMs);
      }
    }
  }

  private async createConnection(): Promise<void> {
    log.info('connecting to AMQP', { url: this.settings.url.replace(/\/\/[^@/]*@/, '//***@') });
    const conn = await connect(this.settings.url);
    this.conn = conn;
    conn.on('error', (err: unknown) => {
      if (this.shuttingDown) return;
      log.error('AMQP connection error', { err });
    });
    conn.on('close', () => {
      if (this.shuttingDown) return;
      log.warn('AMQP connection closed, scheduling reconnect', { delayMs: this.settings.reconnectDelayMs });
      this.cleanupConnection();
      this.connectPromise = undefined;
      this.scheduleReconnect();
    });

    const ch = await conn.createChannel();
    this.ch = ch;

    await this.setupTopology(ch);

    if (this.consumer) {
      await this.startConsumer(this.consumer);
    }

    log.info('AMQP ready', {
      exchanges: {
        jobs: this.settings.task.exchange,
        telemetry: this.settings.telemetry.exchange,
        results: this.settings.results.exchange,
      },
      queue: this.queue,
      prefetch: this.settings.prefetchCount,
    });
  }

  private async setupTopology(ch: Channel): Promise<void> {
    await ch.prefetch(this.settings.prefetchCount);
    await ch.assertExchange(this.settings.task.exchange, 'direct', { durable: true });
    await ch.assertExchange(this.settings.telemetry.exchange, 'topic', { durable: true });
    await ch.assertExchange(this.settings.results.exchange, 'topic', { durable: true });
  }

  private async startConsumer(onTask: TaskHandler): Promise<void> {
    const ch = this.getChannel();
    if (!ch) {
      throw new Error('Channel not initialized');
    }
    await ch.assertQueue(this.queue, { durable: true });
    await ch.bindQueue(this.queue, this.settings.task.exchange, this.settings.service.agentId);

    await ch.consume(this.queue, (msg: ConsumeMessage | null) => {
      if (!msg) return;
      const settlement: DeliverySettlement = {
        deliveryTag: msg.fields.deliveryTag,
        ack: () => ch.ack(msg),
        reject: () => ch.nack(msg, false, false),
      };
      this.deliver(msg.content, onTask, settlement).catch((err: unknown) => {
        log.error('task delivery failed', { err, deliveryTag: msg.fields.deliveryTag });
      });
    });
  }

  /**
   * Run one task message through `onTask`, publish its result and settle it.
   * Resolves once settled; a channel that closed meanwhile only gets logged.
   */
  async deliver(content: Buffer, onTask: TaskHandler, settlement: DeliverySettlement): Promise<void> {
    const { deliveryTag } = settlement;
    let task: TaskMessage;
    try {
      task = taskMessageSchema.parse(JSON.parse(content.toString()));
    } catch (err) {
      log.error('dropping malformed task message', { err, deliveryTag });
      this.settle('reject', settlement.reject, deliveryTag);
      return;
    }

    let result: TaskResult;
    try {
      result = await onTask(task);
    } catch (err) {
      const error = toControllerError(err);
      result = {
        taskId: task.taskId,
        agentId: this.settings.service.agentId,
        ok: false,
        error: error.message,
        code: error.code,
        finishedAt: new Date().toISOString(),
      };
    }

    try {
      this.publishResult(task.action, result);
    } catch (err) {
      log.error('failed to publish task result', { err, taskId: task.taskId, action: task.action });
    }
    this.settle('ack', settlement.ack, deliveryTag);
  }

  private settle(kind: 'ack' | 'reject', fn: () => void, deliveryTag: number): void {
    try {
      fn();
    } catch (err) {
      log.error(`failed to ${kind} task message`, { err, deliveryTag });
    }
  }

  private scheduleReconnect(): void {
    if (this.reconnectTimer || this.shuttingDown) return;
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = undefined;
      this.ensureConnected().catch((err: unknown) => {
        log.error('AMQP reconnect failed', { err });
      });
    }, this.settings.reconnectDelayMs);
  }

  private cleanupConnection(): void {
    this.ch = undefined;
    this.conn = undefined;
  }

  private getChannel(): Channel | undefined {
    if (this.ch) return this.ch;
    this.scheduleReconnect();
    return undefined;
  }
}
