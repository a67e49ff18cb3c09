import { Controller, Get, Logger, Param } from '@nestjs/common';
import { toHttpException } from '../errors';
import { RouteStoreService } from './services';

/**
 * Controller de rutas GPX almacenadas
 *
 * Endpoints:
 * - GET /routes - Lista de archivos disponibles
 * - GET /routes/:filename - Detalle y puntos de una ruta
 */
@Controller('routes')
export class RoutesController {
  private readonly logger = new Logger(RoutesController.name);

  constructor(private readonly routeStore: RouteStoreService) {}

  @Get()
  async listRoutes() {
    try {
      const files = await this.routeStore.list();
      return {
        success: true,
        data: files,
        total: files.length,
      };
    } catch (error) {
      throw toHttpException(error, this.logger, 'Error listing routes');
    }
  }

  /**
   * GET /routes/:filename
   *
   * Devuelve estadísticas y puntos serializados (timestamps en ISO 8601)
   */
  @Get(':filename')
  async getRouteDetails(@Param('filename') filename: string) {
    try {
      const route = await this.routeStore.load(filename);

      return {
        success: true,
        data: {
          filename,
          name: route.name ?? null,
          totalDistance: route.totalDistance,
          totalDuration: route.totalDuration,
          pointCount: route.pointCount,
          timed: route.timed,
          points: route.waypoints.map((wp) => ({
            lat: wp.lat,
            lon: wp.lon,
            ele: wp.elevation ?? null,
            time:
              wp.timestamp !== undefined
                ? new Date(wp.timestamp).toISOString()
                : null,
          })),
        },
      };
    } catch (error) {
      throw toHttpException(error, this.logger, `Error loading route ${filename}`);
    }
  }
}
