import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { HttpService } from '../auxiliares/http/http.service';
import { describeError } from '../errors';
import {
  DevicePlatform,
  IDeviceRegistry,
  IDeviceSink,
  IRegisteredDevice,
} from '../interfaces';
import { BridgeDeviceDto } from './dto';
import { AndroidBridgeSink, IosBridgeSink } from './sinks';

/**
 * Registro en memoria de los dispositivos disponibles
 *
 * El descubrimiento (usbmux, tunneld, ADB) lo hace el bridge; aquí solo se
 * toma su listado y se asocia cada dispositivo al sink de su plataforma.
 */
@Injectable()
export class DeviceRegistryService implements IDeviceRegistry, OnModuleInit {
  private readonly logger = new Logger(DeviceRegistryService.name);
  private devices: Map<string, IRegisteredDevice> = new Map();
  private readonly sinks: Record<DevicePlatform, IDeviceSink>;
  private lastRefresh: Date | null = null;

  constructor(private readonly http: HttpService) {
    this.sinks = {
      ios: new IosBridgeSink(http),
      android: new AndroidBridgeSink(http),
    };
  }

  async onModuleInit() {
    try {
      await this.refresh();
    } catch (error) {
      // El bridge puede arrancar después; GET /devices vuelve a intentar
      this.logger.warn(
        `Initial device refresh failed: ${describeError(error).message}`,
      );
    }
  }

  /**
   * Vuelve a pedir el listado al bridge y reconstruye el registro
   */
  async refresh(): Promise<IRegisteredDevice[]> {
    const payload = await this.http.get<unknown>('/devices');

    if (!Array.isArray(payload)) {
      throw new Error('Device bridge returned an invalid device list');
    }

    const devices = new Map<string, IRegisteredDevice>();
    for (const entry of payload) {
      const device = this.toRegisteredDevice(entry);
      if (device) {
        devices.set(device.id, device);
      }
    }

    this.devices = devices;
    this.lastRefresh = new Date();
    this.logger.log(`Device registry refreshed: ${devices.size} devices`);

    return this.list();
  }

  get(deviceId: string): IRegisteredDevice | undefined {
    return this.devices.get(deviceId);
  }

  list(): IRegisteredDevice[] {
    return Array.from(this.devices.values());
  }

  getLastRefresh(): Date | null {
    return this.lastRefresh;
  }

  private toRegisteredDevice(entry: unknown): IRegisteredDevice | null {
    if (typeof entry !== 'object' || entry === null) {
      this.logger.warn('Ignoring non-object device entry from bridge');
      return null;
    }

    const dto = plainToInstance(BridgeDeviceDto, entry);
    const errors = validateSync(dto);
    if (errors.length > 0) {
      const fields = errors.map((e) => e.property).join(', ');
      this.logger.warn(`Ignoring invalid device entry from bridge (${fields})`);
      return null;
    }

    const prefix = dto.platform === 'ios' ? 'iPhone' : 'Android';
    return {
      id: dto.id,
      name: dto.name || `${prefix} (${dto.id.slice(0, 8)}...)`,
      platform: dto.platform,
      connectionType: dto.connectionType || (dto.platform === 'android' ? 'adb' : 'unknown'),
      sink: this.sinks[dto.platform],
    };
  }
}
