import { HttpException, HttpStatus, Logger } from '@nestjs/common';
import { describeError, SimulatorError } from './simulator.errors';

/**
 * Convierte un error capturado en un controller en HttpException
 *
 * - HttpException: se relanza tal cual
 * - SimulatorError: status y body del propio error
 * - Cualquier otro: se loguea con stack y responde 500 genérico
 */
export function toHttpException(
  error: unknown,
  logger: Logger,
  context: string,
): HttpException {
  if (error instanceof HttpException) {
    return error;
  }

  if (error instanceof SimulatorError) {
    logger.warn(`${context}: ${error.message} [${error.code}]`);
    return new HttpException(error.toJSON(), error.statusCode);
  }

  const { message, stack } = describeError(error);
  logger.error(`${context}: ${message}`, stack);
  return new HttpException(
    {
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      message: 'An unexpected error occurred. Please try again later.',
      error: 'Internal Server Error',
    },
    HttpStatus.INTERNAL_SERVER_ERROR,
  );
}
