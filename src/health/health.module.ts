import { Module } from '@nestjs/common';
import { HealthController } from './health.controller';
import { HealthService } from './health.service';
import { AuxiliaresModule } from '../auxiliares/auxiliares.module';
import { DevicesModule } from '../devices/devices.module';
import { SimulationModule } from '../simulation/simulation.module';

@Module({
  imports: [AuxiliaresModule, DevicesModule, SimulationModule],
  controllers: [HealthController],
  providers: [HealthService],
})
export class HealthModule {}
