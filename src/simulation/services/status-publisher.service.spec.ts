import { Logger } from '@nestjs/common';
import { RedisService } from '../../auxiliares/redis/redis.service';
import { ISimulationSnapshot } from '../../interfaces';
import { SimulationState } from '../../models';
import { StatusPublisherService } from './status-publisher.service';

class RecordingRedis extends RedisService {
  readonly published: Array<{ channel: string; message: unknown }> = [];
  readonly stored = new Map<string, { value: unknown; ttl?: number }>();

  async publish(channel: string, message: unknown): Promise<number> {
    this.published.push({ channel, message });
    return 1;
  }

  async set(key: string, value: unknown, ttlInSeconds?: number): Promise<'OK'> {
    this.stored.set(key, { value, ttl: ttlInSeconds });
    return 'OK';
  }
}

function snapshotAt(currentIndex: number): ISimulationSnapshot {
  return {
    state: SimulationState.RUNNING,
    running: true,
    currentIndex,
    totalPoints: 10,
    progress: currentIndex / 9,
    loop: false,
    loops: 0,
    currentLat: 1,
    currentLon: 2,
    pacing: null,
    route: null,
    devices: {},
    error: null,
    startedAt: '2024-05-01T10:00:00.000Z',
    updatedAt: '2024-05-01T10:00:01.000Z',
  };
}

describe('StatusPublisherService', () => {
  let redis: RecordingRedis;
  let publisher: StatusPublisherService;

  beforeAll(() => {
    Logger.overrideLogger(false);
  });

  beforeEach(() => {
    redis = new RecordingRedis();
    redis.ready = true;
    publisher = new StatusPublisherService(redis);
  });

  it('publishes the snapshot and stores it as the last one', async () => {
    await publisher.publish(snapshotAt(3));

    const message = JSON.stringify(snapshotAt(3));
    expect(redis.published).toEqual([{ channel: 'simulation:status', message }]);
    expect(redis.stored.get('simulation:status:last')).toEqual({
      value: message,
      ttl: 3600,
    });
  });

  it('only sends the latest snapshot queued behind a publication', async () => {
    await Promise.all([
      publisher.publish(snapshotAt(1)),
      publisher.publish(snapshotAt(2)),
      publisher.publish(snapshotAt(3)),
    ]);

    const indexes = redis.published.map(({ message }) =>
      typeof message === 'string' ? JSON.parse(message).currentIndex : null,
    );
    expect(indexes).toEqual([1, 3]);
  });

  it('skips publication while Redis is not ready', async () => {
    redis.ready = false;

    await publisher.publish(snapshotAt(1));

    expect(redis.published).toEqual([]);
  });
});
