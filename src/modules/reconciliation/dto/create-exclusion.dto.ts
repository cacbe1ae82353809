import { IsString, IsOptional, IsNotEmpty, MaxLength } from 'class-validator';
import { Transform } from 'class-transformer';

/**
 * DTO for marking a trip as not pending a consignment note
 */
export class CreateExclusionDto {
  @Transform(({ value }) => (typeof value === 'string' ? value.trim() : value))
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  trip_id!: string;

  @IsString()
  @IsOptional()
  @MaxLength(500)
  reason?: string;
}
