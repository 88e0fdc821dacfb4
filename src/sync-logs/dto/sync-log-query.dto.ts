import { IsDateString, IsIn, IsOptional, IsString } from 'class-validator';
import {
  SYNC_DIRECTIONS,
  SYNC_ENTITIES,
  SyncDirection,
  SyncEntity,
} from '../../integrations/integration.types';
import { SYNC_STATUSES, SyncStatus } from '../sync-log.types';

export class SyncLogQueryDto {
  @IsOptional()
  @IsString()
  integration?: string;

  @IsOptional()
  @IsIn(SYNC_ENTITIES)
  entity?: SyncEntity;

  @IsOptional()
  @IsIn(SYNC_DIRECTIONS)
  direction?: SyncDirection;

  @IsOptional()
  @IsIn(SYNC_STATUSES)
  status?: SyncStatus;

  @IsOptional()
  @IsDateString()
  from?: string;

  @IsOptional()
  @IsDateString()
  to?: string;
}
