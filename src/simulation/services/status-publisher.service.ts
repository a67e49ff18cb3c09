import { Injectable, Logger } from '@nestjs/common';
import { RedisService } from '../../auxiliares/redis/redis.service';
import {
  REDIS_CHANNELS,
  REDIS_KEYS,
} from '../../auxiliares/redis/redis.constants';
import { STATUS_SNAPSHOT_TTL } from '../../env';
import { describeError } from '../../errors';
import { IStatusPublisher, ISimulationSnapshot } from '../../interfaces';

/**
 * Servicio para publicar snapshots de la sesión de simulación
 *
 * Publica en 'simulation:status' y guarda el último snapshot en
 * 'simulation:status:last'. Si llega un snapshot mientras otro se está
 * publicando, solo se publica el más reciente.
 */
@Injectable()
export class StatusPublisherService implements IStatusPublisher {
  private readonly logger = new Logger(StatusPublisherService.name);
  private pending: ISimulationSnapshot | null = null;
  private publishing = false;
  private skipped = 0;

  constructor(private readonly redis: RedisService) {}

  async publish(snapshot: ISimulationSnapshot): Promise<void> {
    if (!this.redis.ready) {
      this.skipped++;
      if (this.skipped % 100 === 1) {
        this.logger.warn(
          `Redis not ready, status snapshots not published (${this.skipped} skipped)`,
        );
      }
      return;
    }

    this.pending = snapshot;
    if (this.publishing) {
      return;
    }

    this.publishing = true;
    try {
      while (this.pending) {
        const next = this.pending;
        this.pending = null;
        await this.send(next);
      }
    } finally {
      this.publishing = false;
    }
  }

  private async send(snapshot: ISimulationSnapshot): Promise<void> {
    try {
      const message = JSON.stringify(snapshot);
      await this.redis.publish(REDIS_CHANNELS.SIMULATION_STATUS, message);
      await this.redis.set(
        REDIS_KEYS.SIMULATION_STATUS_LAST,
        message,
        STATUS_SNAPSHOT_TTL,
      );
      this.logger.debug(
        `Published ${REDIS_CHANNELS.SIMULATION_STATUS}: ${snapshot.state} ` +
          `${snapshot.currentIndex}/${snapshot.totalPoints}`,
      );
    } catch (error) {
      const { stack } = describeError(error);
      this.logger.error(`Error publishing ${REDIS_CHANNELS.SIMULATION_STATUS}`, stack);
    }
  }
}
