import { HttpException, HttpStatus } from '@nestjs/common';
import {
  errorMessage,
  IntegrationNotFoundError,
  LocalPersistenceError,
  SyncInProgressError,
} from '../errors/sync.errors';

/** Maps a service failure to the HTTP status controllers answer with. */
export function toHttpException(error: unknown, fallback: string): HttpException {
  if (error instanceof HttpException) {
    return error;
  }
  if (error instanceof IntegrationNotFoundError) {
    return new HttpException(error.message, HttpStatus.NOT_FOUND);
  }
  if (error instanceof SyncInProgressError) {
    return new HttpException(error.message, HttpStatus.CONFLICT);
  }
  if (error instanceof LocalPersistenceError) {
    return new HttpException(error.message, HttpStatus.BAD_REQUEST);
  }
  return new HttpException(
    errorMessage(error) || fallback,
    HttpStatus.INTERNAL_SERVER_ERROR,
  );
}
