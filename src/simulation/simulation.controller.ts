import { Body, Controller, Get, HttpCode, HttpStatus, Logger, Post } from '@nestjs/common';
import { toHttpException } from '../errors';
import { RouteStoreService } from '../routes/services';
import { StartSimulationDto } from './dto';
import { SimulationSessionService } from './services';

/**
 * Controller de la sesión de simulación
 *
 * Endpoints:
 * - POST /simulation/start - Inicia la reproducción
 * - POST /simulation/pause - Pausa (conserva el índice)
 * - POST /simulation/stop - Alias de pause
 * - POST /simulation/resume - Reanuda desde el índice actual
 * - POST /simulation/reset - Vuelve a IDLE y libera los dispositivos
 * - GET /simulation/status - Snapshot de estado
 */
@Controller('simulation')
export class SimulationController {
  private readonly logger = new Logger(SimulationController.name);

  constructor(
    private readonly session: SimulationSessionService,
    private readonly routeStore: RouteStoreService,
  ) {}

  /**
   * POST /simulation/start
   *
   * Body:
   * {
   *   "filename": "vuelta-parque.gpx",
   *   "deviceIds": ["00008030-001A2B3C4D5E6F70"],
   *   "loop": true,
   *   "speed": 2
   * }
   */
  @Post('start')
  @HttpCode(HttpStatus.OK)
  async start(@Body() dto: StartSimulationDto) {
    try {
      const route = await this.routeStore.load(dto.filename);

      const result = this.session.start(route, dto.deviceIds, {
        loop: dto.loop,
        speedMultiplier: dto.speed,
        targetDurationSeconds: dto.targetDuration,
        jitterMeters: dto.jitterMeters,
        seed: dto.seed,
      });

      return {
        success: true,
        message: 'Simulation started',
        data: result,
      };
    } catch (error) {
      throw toHttpException(error, this.logger, 'Error starting simulation');
    }
  }

  @Post('pause')
  @HttpCode(HttpStatus.OK)
  pause() {
    try {
      this.session.pause();
      return { success: true, message: 'Simulation paused' };
    } catch (error) {
      throw toHttpException(error, this.logger, 'Error pausing simulation');
    }
  }

  @Post('stop')
  @HttpCode(HttpStatus.OK)
  stop() {
    try {
      this.session.stop();
      return { success: true, message: 'Simulation paused' };
    } catch (error) {
      throw toHttpException(error, this.logger, 'Error stopping simulation');
    }
  }

  @Post('resume')
  @HttpCode(HttpStatus.OK)
  resume() {
    try {
      this.session.resume();
      return { success: true, message: 'Simulation resumed' };
    } catch (error) {
      throw toHttpException(error, this.logger, 'Error resuming simulation');
    }
  }

  @Post('reset')
  @HttpCode(HttpStatus.OK)
  reset() {
    try {
      this.session.reset();
      return { success: true, message: 'Simulation reset and location cleared' };
    } catch (error) {
      throw toHttpException(error, this.logger, 'Error resetting simulation');
    }
  }

  @Get('status')
  status() {
    return {
      success: true,
      data: this.session.snapshot(),
    };
  }
}
