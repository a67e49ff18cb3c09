import { Module } from '@nestjs/common';
import { AuxiliaresModule } from '../auxiliares/auxiliares.module';
import { DevicesModule } from '../devices/devices.module';
import { STATUS_PUBLISHER } from '../interfaces';
import { RoutesModule } from '../routes/routes.module';
import { DEFAULT_SIMULATION_OPTIONS, SIMULATION_OPTIONS } from './models';
import {
  JitterService,
  PacingService,
  SimulationSessionService,
  StatusPublisherService,
} from './services';
import { SimulationController } from './simulation.controller';

@Module({
  imports: [AuxiliaresModule, DevicesModule, RoutesModule],
  controllers: [SimulationController],
  providers: [
    JitterService,
    PacingService,
    StatusPublisherService,
    SimulationSessionService,
    { provide: STATUS_PUBLISHER, useExisting: StatusPublisherService },
    { provide: SIMULATION_OPTIONS, useValue: DEFAULT_SIMULATION_OPTIONS },
  ],
  exports: [SimulationSessionService],
})
export class SimulationModule {}
