import { IntegrationConfig, PerEntity, SyncEntity } from './integration.types';

export interface IntegrationInput {
  name: string;
  url: string;
  database: string;
  username: string;
  apiKey: string;
  companyId?: number;
  version?: string;
  active?: boolean;
  enabled?: Partial<PerEntity<boolean>>;
  intervals?: Partial<PerEntity<number>>;
}

/**
 * Persistence port for integration configuration.
 * Synchronizers only read the configuration and advance watermarks.
 */
export abstract class IntegrationStore {
  /** @throws IntegrationNotFoundError */
  abstract findById(id: string): Promise<IntegrationConfig>;

  abstract findAll(filter?: { active?: boolean }): Promise<IntegrationConfig[]>;

  abstract create(input: IntegrationInput): Promise<IntegrationConfig>;

  abstract update(
    id: string,
    patch: Partial<IntegrationInput>,
  ): Promise<IntegrationConfig>;

  abstract remove(id: string): Promise<void>;

  /**
   * Moves the entity's watermark forward to `at`. A value earlier than the
   * stored one is ignored, so watermarks never move backwards.
   * Returns the watermark stored after the call.
   */
  abstract advanceWatermark(
    id: string,
    entity: SyncEntity,
    at: Date,
  ): Promise<Date | null>;
}
