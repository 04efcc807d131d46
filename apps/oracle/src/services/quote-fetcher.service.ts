import { Injectable } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { AxiosResponse, isAxiosError } from 'axios';
import { firstValueFrom, timeout, TimeoutError } from 'rxjs';
import { Source } from '../interfaces/source.interface';
import { FetchedQuote } from '../interfaces/fetched-quote.interface';
import { DataError, NetworkError } from '../exceptions';
import { describeError } from '../utils/format.util';

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

/**
 * Performs the single HTTP call a source gets per run.
 * Transport problems become NetworkError, an undecodable body DataError.
 */
@Injectable()
export class QuoteFetcherService {
  constructor(private readonly httpService: HttpService) {}

  async fetch(source: Source, timeoutMs: number): Promise<FetchedQuote> {
    const started = performance.now();

    let response: AxiosResponse<ArrayBuffer>;
    try {
      response = await firstValueFrom(
        this.httpService
          .get<ArrayBuffer>(source.url, { timeout: timeoutMs, responseType: 'arraybuffer' })
          .pipe(timeout(timeoutMs)),
      );
    } catch (error) {
      throw new NetworkError(source.name, describeTransportError(error, timeoutMs));
    }

    const raw = Buffer.from(response.data);
    return {
      body: decodeJson(source, raw),
      status: response.status,
      byteCount: raw.length,
      latencyMs: performance.now() - started,
    };
  }
}

function decodeJson(source: Source, raw: Buffer): unknown {
  try {
    const body: unknown = JSON.parse(raw.toString('utf-8'));
    return body;
  } catch (error) {
    throw new DataError(source.name, `Malformed JSON payload: ${describeError(error)}`);
  }
}

function describeTransportError(error: unknown, timeoutMs: number): string {
  if (error instanceof TimeoutError) {
    return `Timed out after ${timeoutMs}ms`;
  }
  if (isAxiosError(error)) {
    if (error.response) {
      return `HTTP ${error.response.status}`;
    }
    if (error.code && TIMEOUT_CODES.has(error.code)) {
      return `Timed out after ${timeoutMs}ms`;
    }
  }
  return describeError(error);
}
