import { Error as MongooseError } from 'mongoose';
import { LocalPersistenceError } from '../errors/sync.errors';
import { isDuplicateKeyError } from './duplicate-key';

/** Runs a write and reports rejections by the model's own rules as LocalPersistenceError. */
export async function persist<T>(
  entity: string,
  operation: string,
  write: () => Promise<T>,
): Promise<T> {
  try {
    return await write();
  } catch (error) {
    if (
      error instanceof MongooseError.ValidationError ||
      error instanceof MongooseError.CastError ||
      isDuplicateKeyError(error)
    ) {
      throw new LocalPersistenceError(entity, operation, error);
    }
    throw error;
  }
}

export function notFound(entity: string, id: string): LocalPersistenceError {
  return new LocalPersistenceError(
    entity,
    'update',
    new Error(`${entity} ${id} not found`),
  );
}
