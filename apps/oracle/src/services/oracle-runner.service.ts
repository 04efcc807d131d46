import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EnvironmentVariables } from '../config/env.validation';
import { SOURCE_REGISTRY } from '../config/sources.config';
import { Source } from '../interfaces/source.interface';
import { SubmissionRecord } from '../interfaces/submission-record.interface';
import { AuditLogService } from '../logging/audit-log.service';
import { MetricsService } from '../metrics/metrics.service';
import { describeError } from '../utils/format.util';
import { AggregationService } from './aggregation.service';
import { PriceCollectorService } from './price-collector.service';
import { SubmissionValidatorService } from './submission-validator.service';
import { SubmissionWriterService } from './submission-writer.service';

/**
 * Oracle Runner
 *
 * One complete run: collect from every registered source, aggregate, validate
 * and persist. Nothing is written when the quorum is missed or the record is
 * rejected.
 */
@Injectable()
export class OracleRunnerService {
  private readonly logger = new Logger(OracleRunnerService.name);

  constructor(
    private readonly configService: ConfigService<EnvironmentVariables, true>,
    @Inject(SOURCE_REGISTRY) private readonly sources: readonly Source[],
    private readonly priceCollector: PriceCollectorService,
    private readonly aggregationService: AggregationService,
    private readonly validator: SubmissionValidatorService,
    private readonly writer: SubmissionWriterService,
    private readonly auditLog: AuditLogService,
    private readonly metricsService: MetricsService,
  ) {}

  async run(): Promise<SubmissionRecord> {
    const timeoutSeconds = this.configService.get('ORACLE_TIMEOUT_SECONDS', { infer: true });
    const minSources = this.configService.get('ORACLE_MIN_SOURCES', { infer: true });
    const outputPath = this.configService.get('ORACLE_OUTPUT_PATH', { infer: true });

    this.auditLog.info('oracle_run_started', {
      source_count: this.sources.length,
      timeout: timeoutSeconds,
      min_sources: minSources,
    });

    try {
      const { successes, failures } = await this.priceCollector.collect(
        this.sources,
        timeoutSeconds * 1000,
      );
      this.auditLog.info('oracle_collection_finished', {
        success: successes.length,
        failed: failures.length,
      });

      const record = this.aggregationService.buildSubmission(
        successes,
        this.configService.get('ORACLE_CODE_OR_LOGS', { infer: true }),
        minSources,
      );
      this.validator.validate(record, minSources);
      await this.writer.write(record, outputPath);

      this.auditLog.info('oracle_submission_written', {
        output: outputPath,
        median_price_usd: record.median_price_usd,
        successful_sources: record.sources.length,
      });
      this.metricsService.recordRun('success', record.median_price_usd);
      return record;
    } catch (error) {
      this.auditLog.error('oracle_run_failed', { error: describeError(error) });
      this.metricsService.recordRun('failure');
      throw error;
    } finally {
      await this.exportMetrics();
    }
  }

  private async exportMetrics(): Promise<void> {
    const metricsPath = this.configService.get('ORACLE_METRICS_PATH', { infer: true });
    if (!metricsPath) {
      return;
    }
    try {
      await this.metricsService.writeTextfile(metricsPath);
    } catch (error) {
      this.logger.warn(`Metrics export to ${metricsPath} failed: ${describeError(error)}`);
      this.auditLog.warn('metrics_export_failed', { path: metricsPath, error: describeError(error) });
    }
  }
}
