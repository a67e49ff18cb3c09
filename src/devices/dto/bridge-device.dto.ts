import { IsIn, IsNotEmpty, IsOptional, IsString } from 'class-validator';
import type { DevicePlatform } from '../../interfaces';

/**
 * Dispositivo tal como lo reporta GET /devices del bridge
 */
export class BridgeDeviceDto {
  @IsString()
  @IsNotEmpty()
  id!: string;

  @IsString()
  @IsOptional()
  name?: string;

  @IsIn(['ios', 'android'])
  platform!: DevicePlatform;

  /**
   * usb | wifi | adb
   */
  @IsString()
  @IsOptional()
  connectionType?: string;
}
