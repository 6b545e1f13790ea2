import { Transform } from 'class-transformer';
import {
  IsBoolean,
  IsISO8601,
  IsInt,
  IsOptional,
  IsString,
  Matches,
  MaxLength,
  Max,
  Min,
} from 'class-validator';

import { ISO_DATE } from '../../inventory/dto/create-inventory.dto';

/** Up to 10 digits, 2 of them after the point. */
export const DECIMAL_10_2 = /^-?\d{1,8}(\.\d{1,2})?$/;

/** Bounds of a Postgres `integer` column. */
export const INT4_MIN = -2147483648;
export const INT4_MAX = 2147483647;

const INTEGER_STRING = /^\s*-?\d+\s*$/;

/** Digit strings become numbers; anything else is left for @IsInt to refuse. */
const toInteger = ({ value }: { value: unknown }): unknown =>
  typeof value === 'string' && INTEGER_STRING.test(value) ? Number(value) : value;

const toBoolean = ({ value }: { value: unknown }): unknown => {
  if (value === 'true' || value === '1') return true;
  if (value === 'false' || value === '0') return false;
  return value;
};

/**
 * Item payload. Field names follow the established wire format, which mixes
 * snake_case and camelCase.
 */
export class CreateInventoryItemDto {
  @Transform(toInteger)
  @IsInt()
  @Min(INT4_MIN)
  @Max(INT4_MAX)
  inventory!: number;

  @Transform(toInteger)
  @IsInt()
  @Min(INT4_MIN)
  @Max(INT4_MAX)
  department!: number;

  @Transform(toInteger)
  @IsInt()
  @Min(INT4_MIN)
  @Max(INT4_MAX)
  asset_group!: number;

  @IsString()
  @MaxLength(50)
  category!: string;

  @IsString()
  @MaxLength(50)
  inventory_number!: string;

  @Transform(toInteger)
  @IsInt()
  @Min(-Number.MAX_SAFE_INTEGER)
  @Max(Number.MAX_SAFE_INTEGER)
  asset_component!: number;

  @Transform(toInteger)
  @IsInt()
  @Min(INT4_MIN)
  @Max(INT4_MAX)
  sub_number!: number;

  @Matches(ISO_DATE, { message: 'acquisition_date must use the YYYY-MM-DD format' })
  @IsISO8601({ strict: true })
  acquisition_date!: string;

  @IsString()
  @MaxLength(255)
  asset_description!: string;

  @Transform(toInteger)
  @IsInt()
  @Min(INT4_MIN)
  @Max(INT4_MAX)
  quantity!: number;

  /** Numbers are accepted and kept as their decimal string. */
  @Transform(({ value }: { value: unknown }) => (typeof value === 'number' ? String(value) : value))
  @IsString()
  @Matches(DECIMAL_10_2, { message: 'initial_value must be a decimal with at most 10 digits and 2 decimal places' })
  initial_value!: string;

  @IsString()
  @MaxLength(50)
  lastInventoryRoom!: string;

  @IsOptional()
  @IsString()
  @MaxLength(50)
  currentRoom?: string | null;

  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  scanned?: boolean | null;
}
