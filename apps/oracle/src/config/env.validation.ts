import { plainToInstance, Type } from 'class-transformer';
import {
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsPositive,
  IsString,
  Matches,
  Min,
  validateSync,
} from 'class-validator';

export const DEFAULT_LOG_PATH = 'artifacts/oracle_run.log';

/**
 * Environment consumed by the oracle. Property initializers are the defaults.
 */
export class EnvironmentVariables {
  @IsString()
  @IsNotEmpty()
  ORACLE_OUTPUT_PATH = 'artifacts/oracle_submission.json';

  @IsString()
  @IsNotEmpty()
  ORACLE_LOG_PATH = DEFAULT_LOG_PATH;

  @Type(() => Number)
  @IsNumber({ allowNaN: false, allowInfinity: false })
  @IsPositive()
  ORACLE_TIMEOUT_SECONDS = 12;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  ORACLE_MIN_SOURCES = 3;

  @IsString()
  ORACLE_CODE_OR_LOGS = `Code: apps/oracle/src/main.ts | Logs: ${DEFAULT_LOG_PATH}`;

  @IsString()
  @Matches(/^[A-Za-z0-9]+$/, { message: 'ORACLE_BASE_ASSET must be an alphanumeric ticker' })
  ORACLE_BASE_ASSET = 'NEAR';

  @IsString()
  @IsNotEmpty()
  ORACLE_COINGECKO_ID = 'near';

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  ORACLE_METRICS_PATH?: string;
}

/**
 * `validate` hook for ConfigModule.forRoot. Throws with every violated constraint.
 */
export function validate(config: Record<string, unknown>): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config);
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const messages = errors.flatMap((error) => Object.values(error.constraints ?? {}));
    throw new Error(`Invalid oracle configuration: ${messages.join('; ')}`);
  }
  return validated;
}
