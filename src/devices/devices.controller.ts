import { Controller, Get, Logger, Param } from '@nestjs/common';
import { DeviceNotFoundError, toHttpException } from '../errors';
import { IRegisteredDevice } from '../interfaces';
import { DeviceRegistryService } from './device-registry.service';

/**
 * Controller de dispositivos
 *
 * Endpoints:
 * - GET /devices - Refresca desde el bridge y lista
 * - GET /devices/:deviceId - Dispositivo registrado
 */
@Controller('devices')
export class DevicesController {
  private readonly logger = new Logger(DevicesController.name);

  constructor(private readonly registry: DeviceRegistryService) {}

  @Get()
  async listDevices() {
    try {
      const devices = await this.registry.refresh();
      return {
        success: true,
        data: devices.map((device) => this.serialize(device)),
        total: devices.length,
      };
    } catch (error) {
      throw toHttpException(error, this.logger, 'Error listing devices');
    }
  }

  @Get(':deviceId')
  getDevice(@Param('deviceId') deviceId: string) {
    try {
      const device = this.registry.get(deviceId);
      if (!device) {
        throw new DeviceNotFoundError(deviceId);
      }
      return {
        success: true,
        data: this.serialize(device),
      };
    } catch (error) {
      throw toHttpException(error, this.logger, `Error getting device ${deviceId}`);
    }
  }

  private serialize(device: IRegisteredDevice) {
    return {
      id: device.id,
      name: device.name,
      platform: device.platform,
      connectionType: device.connectionType,
    };
  }
}
