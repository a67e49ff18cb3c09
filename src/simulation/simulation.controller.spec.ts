import { HttpException, Logger } from '@nestjs/common';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import * as path from 'path';
import { PacingMode, SimulationState } from '../models';
import { RouteParserService, RouteStoreService } from '../routes/services';
import {
  FakePublisher,
  FakeRegistry,
  FakeSink,
  testOptions,
} from '../testing/fakes';
import { StartSimulationDto } from './dto';
import { JitterService, PacingService, SimulationSessionService } from './services';
import { SimulationController } from './simulation.controller';

const GPX = `<gpx><trk><trkseg>
  <trkpt lat="40.0" lon="-3.0"><time>2024-05-01T10:00:00Z</time></trkpt>
  <trkpt lat="40.001" lon="-3.001"><time>2024-05-01T10:00:10Z</time></trkpt>
</trkseg></trk></gpx>`;

async function httpError(pending: Promise<unknown>): Promise<HttpException> {
  const error = await pending.then(
    () => undefined,
    (reason: unknown) => reason,
  );
  if (!(error instanceof HttpException)) {
    throw new Error(`expected an HttpException, got ${String(error)}`);
  }
  return error;
}

function syncHttpError(action: () => unknown): HttpException {
  try {
    action();
  } catch (error) {
    if (error instanceof HttpException) {
      return error;
    }
    throw error;
  }
  throw new Error('expected an HttpException');
}

function startDto(values: Partial<StartSimulationDto>): StartSimulationDto {
  return Object.assign(new StartSimulationDto(), {
    filename: 'paseo.gpx',
    deviceIds: ['phone'],
    ...values,
  });
}

describe('SimulationController', () => {
  let directory: string;
  let phone: FakeSink;
  let session: SimulationSessionService;
  let controller: SimulationController;

  beforeAll(() => {
    Logger.overrideLogger(false);
  });

  beforeEach(() => {
    jest.useFakeTimers();
    directory = mkdtempSync(path.join(tmpdir(), 'simulation-'));
    writeFileSync(path.join(directory, 'paseo.gpx'), GPX);

    phone = new FakeSink();
    session = new SimulationSessionService(
      new FakeRegistry({ phone }),
      new FakePublisher(),
      new PacingService(),
      new JitterService(),
      testOptions(),
    );
    controller = new SimulationController(
      session,
      new RouteStoreService(new RouteParserService(), directory),
    );
  });

  afterEach(() => {
    session.reset();
    jest.useRealTimers();
    rmSync(directory, { recursive: true, force: true });
  });

  it('starts a stored route with the requested pacing', async () => {
    const response = await controller.start(startDto({ speed: 2, loop: true }));

    expect(response).toEqual({
      success: true,
      message: 'Simulation started',
      data: {
        deviceCount: 1,
        deviceIds: ['phone'],
        skippedDevices: [],
        pacing: { mode: PacingMode.NATIVE, speedMultiplier: 2 },
      },
    });
    expect(controller.status().data.state).toBe(SimulationState.RUNNING);
    expect(phone.pushes).toEqual([{ deviceId: 'phone', lat: 40, lon: -3 }]);
  });

  it('answers 404 for a route that is not stored', async () => {
    const error = await httpError(controller.start(startDto({ filename: 'nada.gpx' })));

    expect(error.getStatus()).toBe(404);
    expect(error.getResponse()).toEqual({
      error: 'RESOURCE_NOT_FOUND',
      message: "GPX file 'nada.gpx' not found",
      status: 404,
    });
  });

  it('answers 409 when a simulation is already running', async () => {
    await controller.start(startDto({}));

    const error = await httpError(controller.start(startDto({})));

    expect(error.getStatus()).toBe(409);
    expect(error.getResponse()).toMatchObject({ error: 'SIMULATION_ALREADY_RUNNING' });
  });

  it('answers 400 with the field for invalid pacing', async () => {
    const error = await httpError(controller.start(startDto({ targetDuration: -1 })));

    expect(error.getStatus()).toBe(400);
    expect(error.getResponse()).toEqual({
      error: 'VALIDATION_ERROR',
      message: 'target duration must be greater than 0',
      status: 400,
      field: 'targetDuration',
    });
  });

  it('answers 500 without details for unexpected failures', async () => {
    mkdirSync(path.join(directory, 'carpeta.gpx'));

    const error = await httpError(controller.start(startDto({ filename: 'carpeta.gpx' })));

    expect(error.getStatus()).toBe(500);
    expect(error.getResponse()).toEqual({
      statusCode: 500,
      message: 'An unexpected error occurred. Please try again later.',
      error: 'Internal Server Error',
    });
  });

  it('pauses, resumes and resets', async () => {
    await controller.start(startDto({}));

    expect(controller.pause()).toEqual({ success: true, message: 'Simulation paused' });
    expect(controller.status().data.state).toBe(SimulationState.PAUSED);

    expect(controller.resume()).toEqual({ success: true, message: 'Simulation resumed' });
    expect(controller.status().data.state).toBe(SimulationState.RUNNING);

    expect(controller.reset()).toEqual({
      success: true,
      message: 'Simulation reset and location cleared',
    });
    expect(controller.status().data.state).toBe(SimulationState.IDLE);
  });

  it('answers 400 when pausing without a simulation', () => {
    const error = syncHttpError(() => controller.pause());

    expect(error.getStatus()).toBe(400);
    expect(error.getResponse()).toMatchObject({ error: 'SIMULATION_NOT_RUNNING' });
  });

  it('answers 409 when resuming a running simulation', async () => {
    await controller.start(startDto({}));

    expect(syncHttpError(() => controller.resume()).getStatus()).toBe(409);
  });
});
