import { IsNumber, Min, Max } from 'class-validator';

/**
 * DTO for setting one party's target
 */
export class UpsertTargetDto {
  @IsNumber({ allowNaN: false, allowInfinity: false, maxDecimalPlaces: 2 })
  @Min(0)
  @Max(9_999_999_999.99)
  target!: number;
}
