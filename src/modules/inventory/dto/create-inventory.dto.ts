import { IsISO8601, IsNotEmpty, IsString, Matches, MaxLength } from 'class-validator';

export const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

/** Owner is never read from the payload; it is the caller. */
export class CreateInventoryDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  name!: string;

  @Matches(ISO_DATE, { message: 'date must use the YYYY-MM-DD format' })
  @IsISO8601({ strict: true })
  date!: string;
}
