#!/usr/bin/env node
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { OracleRunnerService } from './services/oracle-runner.service';
import { SubmissionRecord } from './interfaces/submission-record.interface';
import { describeError } from './utils/format.util';

async function bootstrap(): Promise<void> {
  const logger = new Logger('OracleBootstrap');
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ['log', 'warn', 'error'],
    abortOnError: false,
  });
  app.enableShutdownHooks();

  let record: SubmissionRecord | undefined;
  try {
    record = await app.get(OracleRunnerService).run();
  } catch (error) {
    logger.error(`Oracle run failed: ${describeError(error)}`);
  }

  // closing flushes the audit trail; a sink that failed makes the run fail
  try {
    await app.close();
  } catch (error) {
    logger.error(`Shutdown failed: ${describeError(error)}`);
    record = undefined;
  }

  if (record) {
    process.stdout.write(`${JSON.stringify(record, null, 2)}\n`);
    process.exitCode = 0;
  } else {
    process.exitCode = 1;
  }
}

bootstrap().catch((error: unknown) => {
  new Logger('OracleBootstrap').error(`Startup failed: ${describeError(error)}`);
  process.exitCode = 1;
});
