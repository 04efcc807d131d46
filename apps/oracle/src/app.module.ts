import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { HttpModule } from '@nestjs/axios';
import { EnvironmentVariables, validate } from './config/env.validation';
import { SOURCE_REGISTRY, createSourceRegistry } from './config/sources.config';
import { AUDIT_SINKS, ConsoleAuditSink, FileAuditSink } from './logging/audit-sink';
import { AuditLogService } from './logging/audit-log.service';
import { MetricsService } from './metrics/metrics.service';
import { MedianAggregator } from './strategies/aggregators/median.aggregator';
import { AggregationService } from './services/aggregation.service';
import { QuoteFetcherService } from './services/quote-fetcher.service';
import { PriceCollectorService } from './services/price-collector.service';
import { SubmissionValidatorService } from './services/submission-validator.service';
import { SubmissionWriterService } from './services/submission-writer.service';
import { OracleRunnerService } from './services/oracle-runner.service';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, envFilePath: '.env', validate }),
    HttpModule.register({
      headers: {
        'User-Agent': 'quorum-oracle/1.0',
        Accept: 'application/json',
      },
    }),
  ],
  providers: [
    {
      provide: SOURCE_REGISTRY,
      inject: [ConfigService],
      useFactory: (config: ConfigService<EnvironmentVariables, true>) =>
        createSourceRegistry({
          base: config.get('ORACLE_BASE_ASSET', { infer: true }),
          coingeckoId: config.get('ORACLE_COINGECKO_ID', { infer: true }),
        }),
    },
    {
      provide: AUDIT_SINKS,
      inject: [ConfigService],
      useFactory: (config: ConfigService<EnvironmentVariables, true>) => [
        new FileAuditSink(config.get('ORACLE_LOG_PATH', { infer: true })),
        new ConsoleAuditSink(),
      ],
    },
    AuditLogService,
    MetricsService,
    MedianAggregator,
    AggregationService,
    QuoteFetcherService,
    PriceCollectorService,
    SubmissionValidatorService,
    SubmissionWriterService,
    OracleRunnerService,
  ],
  exports: [OracleRunnerService],
})
export class AppModule {}
