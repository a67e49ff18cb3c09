/**
 * Jerarquía de errores del simulador
 *
 * Distingue errores del usuario (4xx), de dispositivos y del sistema.
 * Los controllers convierten cualquier SimulatorError en un HttpException
 * usando statusCode y toJSON().
 */
export class SimulatorError extends Error {
  constructor(
    message: string,
    public code: string = 'UNKNOWN_ERROR',
    public statusCode: number = 500,
  ) {
    super(message);
    this.name = new.target.name;
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.code,
      message: this.message,
      status: this.statusCode,
    };
  }
}

// Errores de entrada (4xx)

export class ValidationError extends SimulatorError {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message, 'VALIDATION_ERROR', 400);
  }

  toJSON(): Record<string, unknown> {
    const result = super.toJSON();
    if (this.field) {
      result.field = this.field;
    }
    return result;
  }
}

export class ResourceNotFoundError extends SimulatorError {
  constructor(
    public readonly resourceType: string,
    public readonly resourceId: string,
  ) {
    super(`${resourceType} '${resourceId}' not found`, 'RESOURCE_NOT_FOUND', 404);
  }
}

export class InvalidFileError extends ValidationError {
  constructor(
    message: string,
    public readonly filename?: string,
  ) {
    super(message, 'file');
    this.code = 'INVALID_FILE';
  }

  toJSON(): Record<string, unknown> {
    const result = super.toJSON();
    if (this.filename) {
      result.filename = this.filename;
    }
    return result;
  }
}

// Errores de parseo de rutas

export class RouteParseError extends SimulatorError {
  constructor(
    public readonly filename: string,
    reason?: string,
  ) {
    super(
      reason
        ? `Failed to parse GPX file '${filename}': ${reason}`
        : `Failed to parse GPX file '${filename}'`,
      'GPX_PARSE_ERROR',
      400,
    );
  }
}

export class EmptyRouteError extends RouteParseError {
  constructor(filename: string) {
    super(filename, 'file contains no track points');
    this.code = 'GPX_EMPTY';
  }
}

// Errores de dispositivos

export class DeviceError extends SimulatorError {
  constructor(
    message: string,
    public readonly deviceId?: string,
    code = 'DEVICE_ERROR',
  ) {
    super(message, code, 500);
  }

  toJSON(): Record<string, unknown> {
    const result = super.toJSON();
    if (this.deviceId) {
      result.deviceId = this.deviceId;
    }
    return result;
  }
}

export class DeviceNotFoundError extends DeviceError {
  constructor(deviceId: string) {
    super(`Device ${deviceId} not found or disconnected`, deviceId, 'DEVICE_NOT_FOUND');
    this.statusCode = 404;
  }
}

export class DeviceControlError extends DeviceError {
  constructor(
    deviceId: string,
    public readonly action: string,
    reason?: string,
  ) {
    super(
      reason
        ? `Failed to ${action} on device ${deviceId}: ${reason}`
        : `Failed to ${action} on device ${deviceId}`,
      deviceId,
      'DEVICE_CONTROL_ERROR',
    );
  }
}

export class DeviceTimeoutError extends DeviceError {
  constructor(
    deviceId: string,
    public readonly timeoutMs: number,
  ) {
    super(
      `Device ${deviceId} did not answer within ${timeoutMs}ms`,
      deviceId,
      'DEVICE_TIMEOUT',
    );
  }
}

export class NoDevicesAvailableError extends DeviceError {
  constructor() {
    super(
      'No devices available for simulation. Please connect devices and try again.',
      undefined,
      'NO_DEVICES_AVAILABLE',
    );
  }
}

// Errores de simulación

export class SimulationError extends SimulatorError {
  constructor(message: string, code = 'SIMULATION_ERROR') {
    super(message, code, 500);
  }
}

export class SimulationAlreadyRunningError extends SimulationError {
  constructor() {
    super(
      'Simulation is already running. Reset it before starting a new one.',
      'SIMULATION_ALREADY_RUNNING',
    );
    this.statusCode = 409;
  }
}

export class SimulationNotRunningError extends SimulationError {
  constructor() {
    super('No simulation is currently running', 'SIMULATION_NOT_RUNNING');
    this.statusCode = 400;
  }
}

/**
 * Extrae mensaje y stack de un valor capturado en un catch
 */
export function describeError(error: unknown): { message: string; stack?: string } {
  if (error instanceof Error) {
    return { message: error.message, stack: error.stack };
  }
  return { message: String(error) };
}
