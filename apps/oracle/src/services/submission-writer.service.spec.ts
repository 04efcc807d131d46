import { Test, TestingModule } from '@nestjs/testing';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { SubmissionWriterService, serializeSubmission } from './submission-writer.service';
import { SubmissionRecord } from '../interfaces/submission-record.interface';

describe('SubmissionWriterService', () => {
  let service: SubmissionWriterService;
  let tmpDir: string;

  const record: SubmissionRecord = {
    median_price_usd: 1.015,
    sources: [
      { api: 'coinbase', price: 1.015, timestamp: '2026-02-22T00:00:00Z' },
      { api: 'kraken', price: 1.012, timestamp: '2026-02-22T00:00:01Z' },
      { api: 'binance', price: 1.018, timestamp: '2026-02-22T00:00:01Z' },
    ],
    calculation_method: 'median',
    calculated_at: '2026-02-22T00:00:02Z',
    code_or_logs: 'Code: apps/oracle/src/main.ts | Logs: artifacts/oracle_run.log',
  };

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'oracle-writer-'));
    const module: TestingModule = await Test.createTestingModule({
      providers: [SubmissionWriterService],
    }).compile();

    service = module.get<SubmissionWriterService>(SubmissionWriterService);
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('should write pretty-printed JSON with a trailing newline', async () => {
    const target = path.join(tmpDir, 'submission.json');

    await expect(service.write(record, target)).resolves.toBe(target);

    const content = await fs.readFile(target, 'utf-8');
    expect(content).toBe(serializeSubmission(record));
    expect(content.startsWith('{\n  "median_price_usd": 1.015,\n  "sources": [\n')).toBe(true);
    expect(content.endsWith('}\n')).toBe(true);
    expect(JSON.parse(content)).toEqual(record);
  });

  it('should create missing parent directories', async () => {
    const target = path.join(tmpDir, 'nested', 'dir', 'submission.json');

    await service.write(record, target);

    await expect(fs.readFile(target, 'utf-8')).resolves.toContain('"calculation_method": "median"');
  });

  it('should overwrite an existing file', async () => {
    const target = path.join(tmpDir, 'submission.json');
    await fs.writeFile(target, 'stale content that is longer than nothing', 'utf-8');

    await service.write(record, target);

    expect(JSON.parse(await fs.readFile(target, 'utf-8'))).toEqual(record);
  });
});

describe('serializeSubmission', () => {
  it('should keep field order', () => {
    const keys = Object.keys(
      JSON.parse(
        serializeSubmission({
          median_price_usd: 2,
          sources: [],
          calculation_method: 'median',
          calculated_at: '2026-02-22T00:00:00Z',
          code_or_logs: '',
        }),
      ),
    );
    expect(keys).toEqual([
      'median_price_usd',
      'sources',
      'calculation_method',
      'calculated_at',
      'code_or_logs',
    ]);
  });
});
