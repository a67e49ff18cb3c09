import { Injectable, Logger } from '@nestjs/common';
import { HttpService as NestHttpService } from '@nestjs/axios';
import { AxiosRequestConfig } from 'axios';
import { firstValueFrom } from 'rxjs';
import { DEVICE_BRIDGE_URL } from '../../env';
import { describeError } from '../../errors';

/**
 * Cliente HTTP hacia el device bridge
 *
 * El bridge es el proceso que habla USB / tunnel / ADB con los teléfonos.
 */
@Injectable()
export class HttpService {
  private readonly logger = new Logger(HttpService.name);

  constructor(private httpService: NestHttpService) {}

  async get<T>(path: string, config?: AxiosRequestConfig): Promise<T> {
    const url = `${DEVICE_BRIDGE_URL}${path}`;
    try {
      this.logger.debug(`GET ${url}`);
      const response = await firstValueFrom(this.httpService.get<T>(url, config));
      return response.data;
    } catch (error) {
      this.logger.error(`Error in GET ${path}: ${describeError(error).message}`);
      throw error;
    }
  }

  async post<T>(path: string, data: unknown, config?: AxiosRequestConfig): Promise<T> {
    const url = `${DEVICE_BRIDGE_URL}${path}`;
    try {
      this.logger.debug(`POST ${url}`);
      const response = await firstValueFrom(
        this.httpService.post<T>(url, data, config),
      );
      return response.data;
    } catch (error) {
      // Sin log de error: los envíos fallidos se cuentan por dispositivo
      this.logger.debug(`Error in POST ${path}: ${describeError(error).message}`);
      throw error;
    }
  }

  async delete<T>(path: string, config?: AxiosRequestConfig): Promise<T> {
    const url = `${DEVICE_BRIDGE_URL}${path}`;
    try {
      this.logger.debug(`DELETE ${url}`);
      const response = await firstValueFrom(this.httpService.delete<T>(url, config));
      return response.data;
    } catch (error) {
      this.logger.error(`Error in DELETE ${path}: ${describeError(error).message}`);
      throw error;
    }
  }
}
