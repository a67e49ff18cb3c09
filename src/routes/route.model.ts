import { EmptyRouteError } from '../errors';
import { IRoute, IRouteSummary, IWaypoint } from '../models';

/**
 * Radio de la Tierra en metros (WGS84 ecuatorial)
 */
export const EARTH_RADIUS_M = 6378137;

/**
 * Distancia Haversine entre dos coordenadas, en metros
 */
export function haversineDistance(
  lat1: number,
  lon1: number,
  lat2: number,
  lon2: number,
): number {
  const dLat = ((lat2 - lat1) * Math.PI) / 180;
  const dLon = ((lon2 - lon1) * Math.PI) / 180;

  const a =
    Math.sin(dLat / 2) * Math.sin(dLat / 2) +
    Math.cos((lat1 * Math.PI) / 180) *
      Math.cos((lat2 * Math.PI) / 180) *
      Math.sin(dLon / 2) *
      Math.sin(dLon / 2);

  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
  return EARTH_RADIUS_M * c;
}

/**
 * Construye una ruta inmutable y calcula sus estadísticas
 *
 * Si algún punto no tiene timestamp la ruta completa se considera sin tiempos
 * (duración 0): nunca se estiman tiempos faltantes.
 *
 * @throws EmptyRouteError si no hay puntos
 */
export function createRoute(
  waypoints: IWaypoint[],
  options: { name?: string; source?: string } = {},
): IRoute {
  if (waypoints.length === 0) {
    throw new EmptyRouteError(options.source ?? options.name ?? 'route');
  }

  const frozen = waypoints.map((wp) => Object.freeze({ ...wp }));

  let totalDistance = 0;
  for (let i = 1; i < frozen.length; i++) {
    totalDistance += haversineDistance(
      frozen[i - 1].lat,
      frozen[i - 1].lon,
      frozen[i].lat,
      frozen[i].lon,
    );
  }

  const first = frozen[0].timestamp;
  const last = frozen[frozen.length - 1].timestamp;
  const allTimed = frozen.every((wp) => wp.timestamp !== undefined);
  const totalDuration =
    allTimed && first !== undefined && last !== undefined
      ? Math.max(0, (last - first) / 1000)
      : 0;

  return Object.freeze({
    name: options.name,
    waypoints: Object.freeze(frozen),
    pointCount: frozen.length,
    totalDistance,
    totalDuration,
    timed: totalDuration > 0,
  });
}

export function summarizeRoute(route: IRoute): IRouteSummary {
  return {
    name: route.name,
    pointCount: route.pointCount,
    totalDistance: route.totalDistance,
    totalDuration: route.totalDuration,
    timed: route.timed,
  };
}
