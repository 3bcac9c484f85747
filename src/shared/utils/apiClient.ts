/**
 * HTTP API client wrapper around axios
 * Handles bearer auth, accepted-status checks, and error mapping
 */

import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import { ApiError, NetworkError } from './errors.js';

export interface APIClientConfig {
  baseURL: string;
  /**
   * Bearer token sent unmodified on every request
   */
  token: string;
  /**
   * Request timeout in milliseconds
   * @default 30000
   */
  timeout?: number;
}

export interface RequestOptions {
  /**
   * Statuses treated as success. Anything else becomes an ApiError.
   * @default [200]
   */
  expectStatus?: readonly number[];
  params?: Record<string, string | number>;
}

export class APIClient {
  private axiosInstance: AxiosInstance;

  constructor(config: APIClientConfig) {
    this.axiosInstance = axios.create({
      baseURL: config.baseURL,
      timeout: config.timeout ?? 30000,
      headers: {
        Authorization: `Bearer ${config.token}`,
        'Content-Type': 'application/json',
        Accept: 'application/json',
        'User-Agent': 'fossa-pipeline-tools/0.1.0',
      },
    });
  }

  /**
   * GET request
   */
  async get<T = unknown>(endpoint: string, options: RequestOptions = {}): Promise<T> {
    const response = await this.send<T>(() =>
      this.axiosInstance.get<T>(endpoint, {
        params: options.params,
        validateStatus: this.statusValidator(options),
      })
    );
    return response.data;
  }

  /**
   * POST request with JSON payload
   */
  async post<T = unknown>(endpoint: string, data: unknown, options: RequestOptions = {}): Promise<T> {
    const response = await this.send<T>(() =>
      this.axiosInstance.post<T>(endpoint, data, {
        params: options.params,
        validateStatus: this.statusValidator(options),
      })
    );
    return response.data;
  }

  private statusValidator(options: RequestOptions): (status: number) => boolean {
    const accepted = options.expectStatus ?? [200];
    return (status) => accepted.includes(status);
  }

  private async send<T>(request: () => Promise<AxiosResponse<T>>): Promise<AxiosResponse<T>> {
    try {
      return await request();
    } catch (error) {
      throw this.mapError(error);
    }
  }

  /**
   * Map axios errors to custom error types
   */
  private mapError(error: unknown): Error {
    if (!axios.isAxiosError(error)) {
      return error instanceof Error ? error : new Error(String(error));
    }

    const method = error.config?.method?.toUpperCase() ?? 'REQUEST';
    const url = error.config?.url ?? '';

    if (error.response) {
      const status = error.response.status;
      return new ApiError(`${method} ${url} failed (HTTP ${status})`, status, error.response.data);
    }

    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new NetworkError(`${method} ${url} timed out: ${error.message}`, error.code);
    }

    return new NetworkError(`${method} ${url} failed: ${error.message}`, error.code);
  }
}
