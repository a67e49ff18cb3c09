/**
 * Estados de la sesión de simulación
 */
export enum SimulationState {
  /**
   * Sin reproducción activa (inicial, tras reset o al terminar la ruta)
   */
  IDLE = 'IDLE',

  /**
   * Loop de ritmo activo, enviando coordenadas
   */
  RUNNING = 'RUNNING',

  /**
   * Sesión viva pero sin avanzar ni enviar coordenadas
   */
  PAUSED = 'PAUSED',
}

/**
 * Modo de ritmo de reproducción
 */
export enum PacingMode {
  /**
   * Usa los timestamps de la ruta, escalados por un multiplicador de velocidad
   */
  NATIVE = 'NATIVE',

  /**
   * Reparte los puntos uniformemente en una duración objetivo
   */
  TARGET_DURATION = 'TARGET_DURATION',
}
