import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { mkdir, readdir, readFile } from 'fs/promises';
import * as path from 'path';
import { InvalidFileError, ResourceNotFoundError } from '../../errors';
import { IRoute } from '../../models';
import { ALLOWED_ROUTE_EXTENSIONS, ROUTES_DIRECTORY } from '../routes.constants';
import { RouteParserService } from './route-parser.service';

// Los errores de fs pueden venir de otro realm: sin instanceof
function isMissingFile(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}

/**
 * Acceso de solo lectura a las rutas GPX almacenadas en disco
 *
 * La subida y el borrado de archivos los gestiona otro componente;
 * este servicio solo lista y carga.
 */
@Injectable()
export class RouteStoreService implements OnModuleInit {
  private readonly logger = new Logger(RouteStoreService.name);

  constructor(
    private readonly parser: RouteParserService,
    @Inject(ROUTES_DIRECTORY) private readonly directory: string,
  ) {}

  async onModuleInit() {
    await mkdir(this.directory, { recursive: true });
    this.logger.log(`Routes directory: ${path.resolve(this.directory)}`);
  }

  /**
   * Lista los archivos de ruta disponibles, ordenados por nombre
   */
  async list(): Promise<string[]> {
    try {
      const entries = await readdir(this.directory);
      return entries.filter((name) => this.isAllowed(name)).sort();
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      throw error;
    }
  }

  /**
   * Lee y parsea una ruta almacenada
   *
   * Solo se usa el basename del nombre recibido (sin traversal de directorios).
   */
  async load(filename: string): Promise<IRoute> {
    const name = path.basename(filename);

    if (!this.isAllowed(name)) {
      throw new InvalidFileError('Only .gpx files are allowed', name);
    }

    let raw: Buffer;
    try {
      raw = await readFile(path.join(this.directory, name));
    } catch (error) {
      if (isMissingFile(error)) {
        throw new ResourceNotFoundError('GPX file', name);
      }
      throw error;
    }

    return this.parser.parse(raw, name);
  }

  private isAllowed(name: string): boolean {
    const extension = path.extname(name).toLowerCase();
    return ALLOWED_ROUTE_EXTENSIONS.some((allowed) => allowed === extension);
  }
}
