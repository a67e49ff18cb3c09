/**
 * Keys de almacenamiento Redis (sin prefijo - se aplica en RedisService)
 */
export const REDIS_KEYS = {
  // StatusPublisherService
  SIMULATION_STATUS_LAST: 'simulation:status:last',

  // HealthService
  HEALTH_CHECK: 'health:check',
} as const;

/**
 * Canales Pub/Sub Redis (sin prefijo - se aplica en publish)
 */
export const REDIS_CHANNELS = {
  SIMULATION_STATUS: 'simulation:status',
} as const;
