import { Type } from 'class-transformer';
import {
  IsBoolean,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  IsUrl,
  Min,
  ValidateNested,
} from 'class-validator';

export class EntityFlagsDto {
  @IsOptional()
  @IsBoolean()
  customer?: boolean;

  @IsOptional()
  @IsBoolean()
  product?: boolean;

  @IsOptional()
  @IsBoolean()
  order?: boolean;

  @IsOptional()
  @IsBoolean()
  invoice?: boolean;
}

export class EntityIntervalsDto {
  @IsOptional()
  @IsInt()
  @Min(1)
  customer?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  product?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  order?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  invoice?: number;
}

export class CreateIntegrationDto {
  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsUrl({ require_tld: false })
  url!: string;

  @IsString()
  @IsNotEmpty()
  database!: string;

  @IsString()
  @IsNotEmpty()
  username!: string;

  @IsString()
  @IsNotEmpty()
  apiKey!: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  companyId?: number;

  @IsOptional()
  @IsString()
  version?: string;

  @IsOptional()
  @IsBoolean()
  active?: boolean;

  @IsOptional()
  @ValidateNested()
  @Type(() => EntityFlagsDto)
  enabled?: EntityFlagsDto;

  @IsOptional()
  @ValidateNested()
  @Type(() => EntityIntervalsDto)
  intervals?: EntityIntervalsDto;
}
