import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { DEVICE_BRIDGE_TIMEOUT_MS } from '../env';
import { HttpService } from './http/http.service';
import { RedisService } from './redis/redis.service';

@Module({
  imports: [HttpModule.register({ timeout: DEVICE_BRIDGE_TIMEOUT_MS })],
  providers: [RedisService, HttpService],
  exports: [RedisService, HttpService],
})
export class AuxiliaresModule {}
