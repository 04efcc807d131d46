import { Type } from 'class-transformer';
import {
  Equals,
  IsArray,
  IsNotEmpty,
  IsNumber,
  IsPositive,
  IsString,
  Matches,
  ValidateNested,
} from 'class-validator';

const UTC_SUFFIX = /Z$/;

export class SourceEntryDto {
  @IsString()
  @IsNotEmpty()
  api!: string;

  @IsNumber({ allowNaN: false, allowInfinity: false })
  @IsPositive()
  price!: number;

  @IsString()
  @Matches(UTC_SUFFIX, { message: '$property must be a UTC timestamp ending with "Z"' })
  timestamp!: string;
}

/**
 * Output schema of a submission, checked after the record is built.
 */
export class SubmissionRecordDto {
  @IsNumber({ allowNaN: false, allowInfinity: false })
  @IsPositive()
  median_price_usd!: number;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => SourceEntryDto)
  sources!: SourceEntryDto[];

  @Equals('median')
  calculation_method!: string;

  @IsString()
  @Matches(UTC_SUFFIX, { message: '$property must be a UTC timestamp ending with "Z"' })
  calculated_at!: string;

  @IsString()
  code_or_logs!: string;
}
