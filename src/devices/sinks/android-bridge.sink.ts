import { HttpService } from '../../auxiliares/http/http.service';
import { describeError, DeviceControlError } from '../../errors';
import { IDeviceSink } from '../../interfaces';

/**
 * Intent de la app Fake GPS (com.lexa.fakegps)
 */
export const FAKE_GPS_START_ACTION = 'com.lexa.fakegps.START';

/**
 * Comando shell que mueve la ubicación simulada. Usa --ed (double)
 * y notación fija para no enviar exponentes.
 */
export function buildFakeGpsCommand(lat: number, lon: number): string {
  return (
    `am startservice -a ${FAKE_GPS_START_ACTION} ` +
    `--ed lat ${lat.toFixed(7)} --ed long ${lon.toFixed(7)}`
  );
}

/**
 * Sink para Android vía ADB shell a través del bridge
 */
export class AndroidBridgeSink implements IDeviceSink {
  constructor(private readonly http: HttpService) {}

  async push(serial: string, lat: number, lon: number): Promise<void> {
    try {
      await this.http.post(`/adb/${encodeURIComponent(serial)}/shell`, {
        command: buildFakeGpsCommand(lat, lon),
      });
    } catch (error) {
      throw new DeviceControlError(serial, 'set location', describeError(error).message);
    }
  }

  /**
   * Fake GPS mantiene la última ubicación hasta que se cierra la app;
   * no hay nada que restaurar desde ADB.
   */
  async clear(): Promise<void> {
    return;
  }
}
