import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import Redis from 'ioredis';
import {
  REDIS_DB,
  REDIS_HOST,
  REDIS_KEY_PREFIX,
  REDIS_PASSWORD,
  REDIS_PORT,
} from '../../env';

@Injectable()
export class RedisService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(RedisService.name);
  private client: Redis | null = null;
  public ready = false;
  private readonly prefix = REDIS_KEY_PREFIX;

  /**
   * Aplica el prefijo a una key o canal
   */
  private prefixed(name: string): string {
    return `${this.prefix}${name}`;
  }

  async onModuleInit() {
    this.client = this.createClient();
  }

  async onModuleDestroy() {
    if (this.client) {
      this.client.disconnect();
      this.client = null;
    }
    this.ready = false;
  }

  private createClient(): Redis {
    const client = new Redis({
      host: REDIS_HOST,
      port: REDIS_PORT,
      db: REDIS_DB,
      password: REDIS_PASSWORD,
      retryStrategy: (times) => {
        const delay = Math.min(times * 1000, 30000);
        this.logger.log(`Reconnecting to Redis in ${delay / 1000}s...`);
        return delay;
      },
    });

    client.on('ready', () => {
      this.logger.log(
        `Redis connected ${REDIS_HOST}:${REDIS_PORT} db ${REDIS_DB} prefix "${this.prefix}"`,
      );
      this.ready = true;
    });

    client.on('error', (err: Error) => {
      this.logger.error(`Redis error: ${err.message}`);
      this.ready = false;
    });

    client.on('close', () => {
      this.logger.warn('Redis connection closed');
      this.ready = false;
    });

    return client;
  }

  private async waitForConnection(): Promise<Redis> {
    const client = this.client;
    if (!client) {
      throw new Error('Redis client not initialized');
    }
    if (this.ready) return client;

    return new Promise((resolve, reject) => {
      const timeout = setTimeout(() => {
        clearInterval(poll);
        reject(new Error('Redis connection timeout'));
      }, 10000);

      const poll = setInterval(() => {
        if (this.ready) {
          clearTimeout(timeout);
          clearInterval(poll);
          resolve(client);
        }
      }, 100);
    });
  }

  async set(key: string, value: unknown, ttlInSeconds?: number): Promise<'OK'> {
    const client = await this.waitForConnection();
    const stringValue = typeof value === 'string' ? value : JSON.stringify(value);
    if (ttlInSeconds) {
      return client.set(this.prefixed(key), stringValue, 'EX', ttlInSeconds);
    }
    return client.set(this.prefixed(key), stringValue);
  }

  async get(key: string): Promise<string | null> {
    const client = await this.waitForConnection();
    return client.get(this.prefixed(key));
  }

  async del(key: string): Promise<number> {
    const client = await this.waitForConnection();
    return client.del(this.prefixed(key));
  }

  async publish(channel: string, message: unknown): Promise<number> {
    const client = await this.waitForConnection();
    const stringMessage =
      typeof message === 'string' ? message : JSON.stringify(message);
    return client.publish(this.prefixed(channel), stringMessage);
  }
}
