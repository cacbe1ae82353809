import { IsOptional, IsString, Matches, MaxLength } from 'class-validator';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;
const ISO_MONTH = /^\d{4}-(0[1-9]|1[0-2])$/;

/**
 * Query for month-scoped views (summary, daily, local loads)
 */
export class MonthQueryDto {
  @Matches(ISO_MONTH, { message: 'month must be YYYY-MM' })
  month!: string;

  @IsString()
  @IsOptional()
  @MaxLength(255)
  party?: string;
}

/**
 * Query for the target-vs-actual table
 */
export class TargetVsActualQueryDto {
  @Matches(ISO_DATE, { message: 'from must be YYYY-MM-DD' })
  from!: string;

  @Matches(ISO_DATE, { message: 'to must be YYYY-MM-DD' })
  to!: string;

  @Matches(ISO_DATE, { message: 'compareFrom must be YYYY-MM-DD' })
  compareFrom!: string;

  @Matches(ISO_DATE, { message: 'compareTo must be YYYY-MM-DD' })
  compareTo!: string;
}

/**
 * Query for the flat export
 */
export class ExportQueryDto {
  @Matches(ISO_DATE, { message: 'from must be YYYY-MM-DD' })
  from!: string;

  @Matches(ISO_DATE, { message: 'to must be YYYY-MM-DD' })
  to!: string;

  @IsString()
  @IsOptional()
  @MaxLength(255)
  party?: string;
}
