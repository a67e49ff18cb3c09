/**
 * Contrato entre el núcleo de simulación y el transporte de cada dispositivo
 *
 * El núcleo trata a todos los dispositivos igual; la lógica específica de
 * iOS / Android vive en los adapters que implementan esta interfaz.
 */
export interface IDeviceSink {
  /**
   * Envía una coordenada a un dispositivo. Rechaza con DeviceError si falla.
   * El llamador acota el tiempo de espera.
   */
  push(deviceId: string, lat: number, lon: number): Promise<void>;

  /**
   * Quita la ubicación simulada y devuelve el dispositivo a su GPS real
   */
  clear(deviceId: string): Promise<void>;
}

export type DevicePlatform = 'ios' | 'android';

/**
 * Dispositivo registrado y listo para recibir coordenadas
 */
export interface IRegisteredDevice {
  id: string; // UDID (iOS) o serial ADB (Android)
  name: string;
  platform: DevicePlatform;
  connectionType: string; // usb | wifi | adb | unknown
  sink: IDeviceSink;
}

/**
 * Registro consultado por la sesión para resolver ids a sinks
 */
export interface IDeviceRegistry {
  get(deviceId: string): IRegisteredDevice | undefined;
}

/**
 * Token de inyección del registro de dispositivos
 */
export const DEVICE_REGISTRY = 'DEVICE_REGISTRY';
