import amqp from 'amqplib';
import type { ConfirmChannel } from 'amqplib';
import type { Logger } from 'pino';
import type { BrokerMessage, MessageBroker } from '../../application/index.js';
import { TransientBrokerError } from '../../domain/index.js';

type AmqpConnection = Awaited<ReturnType<typeof amqp.connect>>;

export interface AmqpBrokerOptions {
  url: string;
  heartbeatSec: number;
  /** Topic exchange every event is published to; asserted on connect. */
  exchange: string;
  log: Logger;
}

/**
 * amqplib adapter: one connection and one confirm channel per process.
 *
 * Both are opened lazily on the first publish. Any error or close drops
 * them, closing the connection if it is still open, and the next publish
 * reconnects. A publish resolves only once the broker has confirmed the
 * message.
 */
export class AmqpBroker implements MessageBroker {
  private connection: AmqpConnection | null = null;
  private channel: ConfirmChannel | null = null;
  private connecting: Promise<ConfirmChannel> | null = null;
  private closed = false;

  constructor(private readonly options: AmqpBrokerOptions) {}

  async publish(message: BrokerMessage): Promise<void> {
    if (this.closed) {
      throw new TransientBrokerError('Broker client is closed');
    }

    let channel: ConfirmChannel;
    try {
      channel = await this.getChannel();
    } catch (err: unknown) {
      throw new TransientBrokerError(`Broker connection failed: ${describe(err)}`, { cause: err });
    }

    const content = Buffer.from(JSON.stringify(message.body));

    await new Promise<void>((resolve, reject) => {
      try {
        channel.publish(
          message.exchange,
          message.routingKey,
          content,
          {
            persistent: true,
            contentType: 'application/json',
            messageId: message.messageId,
            timestamp: Math.floor(message.timestamp.getTime() / 1000),
            headers: message.headers,
          },
          (err) => {
            if (err) {
              reject(new TransientBrokerError(`Broker rejected message: ${describe(err)}`, { cause: err }));
            } else {
              resolve();
            }
          },
        );
      } catch (err: unknown) {
        this.discard(this.connection);
        reject(new TransientBrokerError(`Broker publish failed: ${describe(err)}`, { cause: err }));
      }
    });
  }

  async close(): Promise<void> {
    this.closed = true;

    // A connect still in flight sees `closed` and closes what it opened.
    const pending = this.connecting;
    if (pending !== null) {
      await pending.catch((err: unknown) => {
        this.options.log.debug({ err }, 'Pending broker connect abandoned on close');
      });
    }

    const { connection, channel } = this;
    this.reset();

    try {
      if (channel !== null) await channel.close();
    } catch (err: unknown) {
      this.options.log.warn({ err }, 'Error closing broker channel');
    }
    try {
      if (connection !== null) await connection.close();
    } catch (err: unknown) {
      this.options.log.warn({ err }, 'Error closing broker connection');
    }
  }

  private getChannel(): Promise<ConfirmChannel> {
    if (this.channel !== null) return Promise.resolve(this.channel);
    if (this.connecting === null) {
      this.connecting = this.connect().finally(() => {
        this.connecting = null;
      });
    }
    return this.connecting;
  }

  private async connect(): Promise<ConfirmChannel> {
    const { url, heartbeatSec, exchange, log } = this.options;

    const connection = await amqp.connect(url, { heartbeat: heartbeatSec });
    connection.on('error', (err: unknown) => {
      log.error({ err }, 'Broker connection error');
      this.forget(connection);
    });
    connection.on('close', () => {
      log.warn('Broker connection closed');
      this.forget(connection);
    });

    let channel: ConfirmChannel;
    try {
      channel = await connection.createConfirmChannel();
      channel.on('error', (err: unknown) => {
        log.error({ err }, 'Broker channel error');
        this.discard(connection);
      });
      channel.on('close', () => {
        this.discard(connection);
      });

      await channel.assertExchange(exchange, 'topic', { durable: true });
    } catch (err: unknown) {
      await closeQuietly(connection, log);
      throw err;
    }

    if (this.closed) {
      await closeQuietly(connection, log);
      throw new Error('Broker client is closed');
    }

    this.connection = connection;
    this.channel = channel;
    log.info({ exchange }, 'Broker connected');
    return channel;
  }

  /** The connection went away by itself; only drop the references. */
  private forget(connection: AmqpConnection): void {
    if (this.connection === connection) this.reset();
  }

  /**
   * The channel is gone but the connection may still be open: drop both and
   * close the connection, so the next publish starts from a fresh one.
   */
  private discard(connection: AmqpConnection | null): void {
    if (connection === null || this.connection !== connection) return;
    this.reset();
    void closeQuietly(connection, this.options.log);
  }

  private reset(): void {
    this.connection = null;
    this.channel = null;
  }
}

async function closeQuietly(connection: AmqpConnection, log: Logger): Promise<void> {
  try {
    await connection.close();
  } catch (err: unknown) {
    log.warn({ err }, 'Error closing broker connection');
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
