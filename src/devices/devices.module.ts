import { Module } from '@nestjs/common';
import { AuxiliaresModule } from '../auxiliares/auxiliares.module';
import { DEVICE_REGISTRY } from '../interfaces';
import { DeviceRegistryService } from './device-registry.service';
import { DevicesController } from './devices.controller';

@Module({
  imports: [AuxiliaresModule],
  controllers: [DevicesController],
  providers: [
    DeviceRegistryService,
    { provide: DEVICE_REGISTRY, useExisting: DeviceRegistryService },
  ],
  exports: [DeviceRegistryService, DEVICE_REGISTRY],
})
export class DevicesModule {}
