import { HttpService as NestHttpService } from '@nestjs/axios';
import axios, { AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { HttpService } from '../auxiliares/http/http.service';

export interface IBridgeRequest {
  method: string;
  path: string;
  body: unknown;
}

export type BridgeHandler = (request: IBridgeRequest) => unknown;

/**
 * Device bridge en proceso: un adapter de axios que responde con `handler`
 * y guarda cada request recibido
 */
export class FakeBridge {
  readonly requests: IBridgeRequest[] = [];
  private handler: BridgeHandler = () => ({ ok: true });

  readonly http = new HttpService(
    new NestHttpService(
      axios.create({ adapter: (config) => this.handle(config) }),
    ),
  );

  respond(handler: BridgeHandler): void {
    this.handler = handler;
  }

  private async handle(config: InternalAxiosRequestConfig): Promise<AxiosResponse> {
    const url = new URL(config.url ?? '/', 'http://bridge.test');
    const body: unknown =
      typeof config.data === 'string' ? JSON.parse(config.data) : config.data;
    const request: IBridgeRequest = {
      method: (config.method ?? 'get').toUpperCase(),
      path: url.pathname,
      body,
    };
    this.requests.push(request);

    return {
      data: this.handler(request),
      status: 200,
      statusText: 'OK',
      headers: {},
      config,
    };
  }
}
