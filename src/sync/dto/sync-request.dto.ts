import { IsIn, IsOptional } from 'class-validator';
import {
  SYNC_DIRECTIONS,
  SyncDirection,
} from '../../integrations/integration.types';

export class SyncRequestDto {
  @IsOptional()
  @IsIn(SYNC_DIRECTIONS)
  direction?: SyncDirection;
}
