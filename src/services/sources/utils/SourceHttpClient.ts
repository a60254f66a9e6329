/**
 * Base for the upstream HTTP clients.
 *
 * Every request acquires a permit from the source's rate limiter before it
 * is sent, and every failure leaves as an ApplicationError so the gateway's
 * retry policy can classify it. Responses are validated with zod.
 */

import axios, { AxiosAdapter, AxiosInstance, AxiosRequestConfig } from 'axios';
import { z } from 'zod';
import { SourceName } from '../../../config/types.js';
import { RateLimiter } from './RateLimiter.js';
import { logger } from '../../../utils/logger.js';
import {
  AuthenticationError,
  ErrorCode,
  InvalidResponseError,
  NetworkError,
  RateLimitError,
  ResourceNotFoundError,
  SourceServerError,
} from '../../../errors/index.js';

export interface SourceHttpClientOptions {
  baseUrl: string;
  timeoutMs: number;
  rateLimiter: RateLimiter;
  headers?: Record<string, string>;
  params?: Record<string, string>;
  /** Replaces the HTTP transport (tests) */
  adapter?: AxiosAdapter;
}

export abstract class SourceHttpClient {
  protected readonly client: AxiosInstance;
  protected readonly rateLimiter: RateLimiter;
  protected readonly baseUrl: string;

  protected constructor(
    readonly sourceName: SourceName,
    options: SourceHttpClientOptions
  ) {
    this.baseUrl = options.baseUrl;
    this.rateLimiter = options.rateLimiter;
    this.client = axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      headers: { Accept: 'application/json', ...options.headers },
      params: options.params,
      ...(options.adapter && { adapter: options.adapter }),
    });
  }

  /**
   * Send a request and validate the response body
   */
  protected async request<T>(
    config: AxiosRequestConfig,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    operation: string
  ): Promise<T> {
    const data = await this.send(config, operation);
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new InvalidResponseError(
        this.sourceName,
        `Unexpected ${this.sourceName} response for ${operation}: ${parsed.error.issues
          .slice(0, 3)
          .map((issue) => `${issue.path.join('.') || '(root)'} ${issue.message}`)
          .join('; ')}`,
        { service: this.constructor.name, operation, metadata: { url: config.url } }
      );
    }
    return parsed.data;
  }

  /**
   * Send a request whose body is not needed
   */
  protected async send(config: AxiosRequestConfig, operation: string): Promise<unknown> {
    await this.rateLimiter.acquire();

    try {
      const response = await this.client.request<unknown>(config);

      logger.debug(`[${this.constructor.name}] ${operation} succeeded`, {
        method: config.method ?? 'get',
        url: config.url,
        status: response.status,
      });

      return response.data;
    } catch (error) {
      throw this.convertToApplicationError(error, config, operation);
    }
  }

  /**
   * Convert Axios errors to ApplicationError types
   */
  protected convertToApplicationError(error: unknown, config: AxiosRequestConfig, operation: string): Error {
    const context = {
      service: this.constructor.name,
      operation,
      metadata: { url: config.url, method: config.method ?? 'get' },
    };

    if (!axios.isAxiosError(error)) {
      return error instanceof Error ? error : new Error(String(error));
    }

    if (error.response) {
      const status = error.response.status;
      const message = error.message;

      switch (status) {
        case 401:
        case 403:
          return new AuthenticationError(
            `${this.sourceName} authentication failed: ${message}`,
            { ...context, metadata: { ...context.metadata, status } },
            error
          );

        case 404:
          return new ResourceNotFoundError(`${this.sourceName} resource`, config.url ?? '', undefined, {
            ...context,
            metadata: { ...context.metadata, status },
          });

        case 429: {
          const header: unknown = error.response.headers['retry-after'];
          const retryAfter = typeof header === 'string' ? Number.parseInt(header, 10) : NaN;
          return new RateLimitError(
            this.sourceName,
            Number.isFinite(retryAfter) ? retryAfter : undefined,
            `${this.sourceName} rate limit exceeded: ${message}`,
            { ...context, metadata: { ...context.metadata, status } }
          );
        }

        default:
          return new SourceServerError(this.sourceName, status, `${this.sourceName} returned ${status}: ${message}`, context, error);
      }
    }

    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new NetworkError(
        `${this.sourceName} request timed out`,
        ErrorCode.NETWORK_TIMEOUT,
        this.baseUrl,
        context,
        error
      );
    }

    return new NetworkError(
      `${this.sourceName} network error: ${error.message}`,
      ErrorCode.NETWORK_CONNECTION_FAILED,
      this.baseUrl,
      context,
      error
    );
  }
}
