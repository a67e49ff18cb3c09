/**
 * Token de inyección para el directorio de rutas almacenadas
 */
export const ROUTES_DIRECTORY = 'ROUTES_DIRECTORY';

export const ALLOWED_ROUTE_EXTENSIONS = ['.gpx'] as const;
