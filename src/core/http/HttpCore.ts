// src/core/http/HttpCore.ts

import axios, { AxiosError } from 'axios';
import type { AxiosInstance, RawAxiosResponseHeaders, AxiosResponseHeaders } from 'axios';
import * as http from 'http';
import * as https from 'https';
import type { HttpConfig, HttpRequestConfig, HttpResponse } from './types';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import type { Logger } from '../../observability/Logger';
import {
  ApiClientError,
  ApiServerError,
  InvalidResponseError,
  NetworkTimeoutError,
  NetworkError,
} from '../../utils/errors';
import { withHttpSpan } from '../../observability/tracing';

export const DEFAULT_TIMEOUT_MS = 10000;

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) ' +
  'Chrome/120.0 Safari/537.36';

export class HttpCore {
  private axiosInstance: AxiosInstance;
  private metrics: MetricsCollector;
  private logger: Logger;

  constructor(
    private config: HttpConfig,
    metrics: MetricsCollector,
    logger: Logger
  ) {
    this.metrics = metrics;
    this.logger = logger;

    const keepAlive = config.keepAlive ?? true;
    this.axiosInstance = axios.create({
      timeout: config.timeout ?? DEFAULT_TIMEOUT_MS,
      httpAgent: new http.Agent({ keepAlive }),
      httpsAgent: new https.Agent({ keepAlive }),
      // Bodies are parsed here so a non-JSON body surfaces as InvalidResponseError
      responseType: 'text',
      transformResponse: [(data: unknown) => data],
      validateStatus: (status) => status < 400,
    });
  }

  /**
   * GET a URL and parse the body as JSON.
   *
   * @throws {ApiClientError} On 4xx responses
   * @throws {ApiServerError} On 5xx responses
   * @throws {NetworkTimeoutError} When the request times out
   * @throws {NetworkError} On any other transport failure
   * @throws {InvalidResponseError} When the body is not JSON
   */
  async getJson<T = unknown>(config: HttpRequestConfig): Promise<HttpResponse<T>> {
    const requestId = this.generateRequestId();

    const headers: Record<string, string> = {
      'X-Request-ID': requestId,
      'User-Agent': this.config.userAgent ?? DEFAULT_USER_AGENT,
      Accept: 'application/json',
      ...this.config.headers,
      ...config.headers,
    };

    this.logger.debug('HTTP request', {
      requestId,
      url: config.url,
      query: config.query,
      headers,
    });

    return withHttpSpan('GET', config.url, async () => {
      const startTime = Date.now();

      try {
        const response = await this.axiosInstance.request<string>({
          url: config.url,
          method: 'GET',
          headers,
          params: config.query,
          timeout: config.timeout,
        });

        this.metrics.incrementCounter('http_requests_total', {
          status: response.status.toString(),
        });
        this.metrics.recordLatency('http_request_duration', Date.now() - startTime, {
          status: response.status,
        });

        return {
          data: this.parseBody<T>(response.data, requestId),
          status: response.status,
          headers: this.toHeaderRecord(response.headers),
        };
      } catch (error: unknown) {
        if (error instanceof InvalidResponseError) throw error;

        const status = error instanceof AxiosError ? error.response?.status : undefined;
        this.metrics.incrementCounter('http_requests_total', {
          status: status?.toString() ?? 'error',
        });
        throw this.transformError(error, config.url);
      }
    });
  }

  private parseBody<T>(body: unknown, requestId: string): T {
    if (typeof body !== 'string') {
      throw new InvalidResponseError(undefined, { requestId });
    }
    try {
      return JSON.parse(body);
    } catch (error: unknown) {
      throw new InvalidResponseError(undefined, {
        requestId,
        cause: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private generateRequestId(): string {
    return `req_${Date.now()}_${Math.random().toString(36).substring(7)}`;
  }

  private toHeaderRecord(
    headers: RawAxiosResponseHeaders | AxiosResponseHeaders
  ): Record<string, string> {
    const record: Record<string, string> = {};
    for (const [key, value] of Object.entries(headers)) {
      if (typeof value === 'string') {
        record[key.toLowerCase()] = value;
      }
    }
    return record;
  }

  private transformError(error: unknown, url: string): Error {
    if (!(error instanceof AxiosError)) {
      return new NetworkError('Network error', {
        url,
        cause: error instanceof Error ? error.message : String(error),
      });
    }

    if (error.response) {
      const status = error.response.status;

      this.logger.debug('HTTP error response', {
        url,
        status,
        statusText: error.response.statusText,
      });

      if (status >= 400 && status < 500) {
        return new ApiClientError(`Client error: ${status}`, status, { url });
      }
      if (status >= 500) {
        return new ApiServerError(`Server error: ${status}`, status, { url });
      }
    }
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new NetworkTimeoutError('Request timeout', { url });
    }
    return new NetworkError('Network error', { url, cause: error.message });
  }
}
