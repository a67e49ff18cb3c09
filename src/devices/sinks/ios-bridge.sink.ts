import { HttpService } from '../../auxiliares/http/http.service';
import { describeError, DeviceControlError } from '../../errors';
import { IDeviceSink } from '../../interfaces';

/**
 * Sink para iOS: el bridge usa DtSimulateLocation o, en iOS 17+,
 * LocationSimulation sobre DVT
 */
export class IosBridgeSink implements IDeviceSink {
  constructor(private readonly http: HttpService) {}

  async push(udid: string, lat: number, lon: number): Promise<void> {
    try {
      await this.http.post(`/ios/${encodeURIComponent(udid)}/location`, {
        lat,
        lon,
      });
    } catch (error) {
      throw new DeviceControlError(udid, 'set location', describeError(error).message);
    }
  }

  async clear(udid: string): Promise<void> {
    try {
      await this.http.delete(`/ios/${encodeURIComponent(udid)}/location`);
    } catch (error) {
      throw new DeviceControlError(udid, 'clear location', describeError(error).message);
    }
  }
}
