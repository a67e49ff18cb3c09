import { Injectable } from '@nestjs/common';
import { RedisService } from '../auxiliares/redis/redis.service';
import { REDIS_KEYS } from '../auxiliares/redis/redis.constants';
import { HttpService } from '../auxiliares/http/http.service';
import { DeviceRegistryService } from '../devices/device-registry.service';
import { describeError } from '../errors';
import { SimulationSessionService } from '../simulation/services';

type CheckResult = PromiseSettledResult<Record<string, unknown>>;

function toServiceStatus(check: CheckResult) {
  return {
    status: check.status === 'fulfilled' ? 'up' : 'down',
    details:
      check.status === 'fulfilled'
        ? check.value
        : { error: describeError(check.reason).message },
  };
}

@Injectable()
export class HealthService {
  constructor(
    private redis: RedisService,
    private http: HttpService,
    private registry: DeviceRegistryService,
    private session: SimulationSessionService,
  ) {}

  async check() {
    const [redisCheck, bridgeCheck] = await Promise.allSettled([
      this.checkRedis(),
      this.checkDeviceBridge(),
    ]);

    const snapshot = this.session.snapshot();

    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      services: {
        redis: toServiceStatus(redisCheck),
        deviceBridge: toServiceStatus(bridgeCheck),
      },
      simulation: {
        state: snapshot.state,
        currentIndex: snapshot.currentIndex,
        totalPoints: snapshot.totalPoints,
        devices: Object.keys(snapshot.devices).length,
        error: snapshot.error,
      },
    };
  }

  ready() {
    const redisReady = this.redis.ready;
    return {
      status: redisReady ? 'ready' : 'not ready',
      redis: redisReady,
      devicesLastRefresh: this.registry.getLastRefresh()?.toISOString() ?? null,
    };
  }

  private async checkRedis(): Promise<Record<string, unknown>> {
    const testValue = Date.now().toString();

    await this.redis.set(REDIS_KEYS.HEALTH_CHECK, testValue, 5);
    const retrieved = await this.redis.get(REDIS_KEYS.HEALTH_CHECK);

    if (retrieved !== testValue) {
      throw new Error('Redis read/write check failed');
    }

    await this.redis.del(REDIS_KEYS.HEALTH_CHECK);

    return { message: 'Redis is healthy' };
  }

  private async checkDeviceBridge(): Promise<Record<string, unknown>> {
    try {
      await this.http.get<unknown>('/health');
      return {
        message: 'Device bridge is reachable',
        registeredDevices: this.registry.list().length,
      };
    } catch (error) {
      throw new Error(`Device bridge check failed: ${describeError(error).message}`);
    }
  }
}
