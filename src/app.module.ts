import { Module } from '@nestjs/common';
import { AuxiliaresModule } from './auxiliares/auxiliares.module';
import { HealthModule } from './health/health.module';
import { RoutesModule } from './routes/routes.module';
import { DevicesModule } from './devices/devices.module';
import { SimulationModule } from './simulation/simulation.module';

@Module({
  imports: [
    AuxiliaresModule,
    HealthModule,
    RoutesModule, // Rutas GPX almacenadas
    DevicesModule, // Registro de dispositivos vía device bridge
    SimulationModule, // Sesión de reproducción multi-dispositivo
  ],
})
export class AppModule {}
