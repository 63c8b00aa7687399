import Redis from 'ioredis';
import type { RunStatus, RunTotals } from '@/types';

// Run lifecycle events broadcast to other processes
export type EventType = 'run:started' | 'run:completed' | 'run:error';

export interface AppEvent<T = unknown> {
  type: EventType;
  data: T;
  timestamp: number;
}

export interface RunEvent {
  runId: string;
  regions?: string[];
  previewMode?: boolean;
  status?: RunStatus;
  totals?: RunTotals;
  error?: string;
}

export const CHANNEL = 'app:events';

/**
 * Publishes on the `app:events` channel. Without a Redis URL every publish
 * is skipped; a Redis outage never blocks or fails a run.
 */
export class EventPublisher {
  private readonly redisUrl?: string;
  private client: Redis | null = null;
  private ready: Promise<Redis | null> | null = null;

  constructor(redisUrl?: string) {
    this.redisUrl = redisUrl;
  }

  get enabled(): boolean {
    return Boolean(this.redisUrl);
  }

  // Get or create the client - waits for the connection to be ready
  private getPublisher(): Promise<Redis | null> {
    if (!this.redisUrl) return Promise.resolve(null);

    if (this.client && this.client.status === 'ready') {
      return Promise.resolve(this.client);
    }
    if (this.ready) return this.ready;

    const client = this.client ?? this.connect(this.redisUrl);

    this.ready = new Promise<Redis | null>((resolve) => {
      if (client.status === 'ready') {
        resolve(client);
        return;
      }

      // Wait for ready event with timeout
      const timeout = setTimeout(() => {
        console.log('[Events] Publisher connection timeout after 3s');
        resolve(null);
      }, 3000);

      client.once('ready', () => {
        clearTimeout(timeout);
        console.log('[Events] Publisher Redis connected');
        resolve(client);
      });
      client.once('error', () => {
        clearTimeout(timeout);
        resolve(null);
      });
    });

    return this.ready;
  }

  private connect(redisUrl: string): Redis {
    const client = new Redis(redisUrl, {
      maxRetriesPerRequest: 3,
      connectTimeout: 5000,
      lazyConnect: false,
      enableOfflineQueue: true,
      retryStrategy: (times) => {
        if (times > 5) return null;
        return Math.min(times * 1000, 5000);
      },
    });

    client.on('error', (err) => {
      console.error('[Events] Publisher Redis error:', err.message);
    });

    client.on('close', () => {
      console.log('[Events] Publisher Redis disconnected');
      this.ready = null;
    });

    client.on('end', () => {
      console.log('[Events] Publisher Redis connection ended');
      this.client = null;
      this.ready = null;
    });

    this.client = client;
    return client;
  }

  // Publish an event (fire and forget - don't block if Redis is down)
  async publish<T>(type: EventType, data: T): Promise<void> {
    const event: AppEvent<T> = {
      type,
      data,
      timestamp: Date.now(),
    };

    try {
      const publisher = await this.getPublisher();
      if (!publisher) {
        console.log(`[Events] No publisher available, skipping event: ${type}`);
        return;
      }
      if (publisher.status !== 'ready') {
        console.log(`[Events] Redis not ready (status: ${publisher.status}), skipping event: ${type}`);
        return;
      }

      let timer: NodeJS.Timeout | undefined;
      await Promise.race([
        publisher.publish(CHANNEL, JSON.stringify(event)),
        new Promise((_, reject) => {
          timer = setTimeout(() => reject(new Error('Timeout')), 2000);
        }),
      ]).finally(() => clearTimeout(timer));
      console.log(`[Events] Published event: ${type}`);
    } catch (err) {
      // Log but don't throw - broadcasts are optional
      console.error(`[Events] Failed to publish event ${type}:`, err instanceof Error ? err.message : err);
    }
  }

  async close(): Promise<void> {
    const client = this.client;
    this.client = null;
    this.ready = null;
    if (!client) return;

    try {
      await client.quit();
    } catch (err) {
      console.error('[Events] Redis quit failed:', err instanceof Error ? err.message : err);
      client.disconnect();
    }
  }
}

// Helper functions for run lifecycle events
export function createRunEvents(publisher: EventPublisher) {
  return {
    runStarted: (event: RunEvent) => publisher.publish('run:started', event),
    runCompleted: (event: RunEvent) => publisher.publish('run:completed', event),
    runError: (event: RunEvent) => publisher.publish('run:error', event),
  };
}

export type RunEvents = ReturnType<typeof createRunEvents>;
