/**
 * Punto de una ruta, inmutable una vez parseado
 */
export interface IWaypoint {
  readonly lat: number; // grados, -90..90
  readonly lon: number; // grados, -180..180
  readonly elevation?: number; // metros
  readonly timestamp?: number; // epoch ms
}

/**
 * Ruta parseada. El orden de waypoints es el orden de reproducción.
 */
export interface IRoute {
  readonly name?: string;
  readonly waypoints: readonly IWaypoint[];
  readonly pointCount: number;

  // Derivados, calculados una sola vez al construir la ruta
  readonly totalDistance: number; // metros (haversine, sin altitud)
  readonly totalDuration: number; // segundos, 0 = sin timestamps
  readonly timed: boolean; // true si totalDuration > 0
}

/**
 * Resumen de la ruta para respuestas y snapshots
 */
export interface IRouteSummary {
  name?: string;
  pointCount: number;
  totalDistance: number;
  totalDuration: number;
  timed: boolean;
}
