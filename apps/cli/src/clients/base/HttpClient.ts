import axios, { AxiosInstance } from 'axios';
import { logger } from '../../utils/logger';
import { HttpError } from './HttpError';

export interface ClientConfig {
  timeout?: number;
  userAgent?: string;
  headers?: Record<string, string>;
}

/**
 * Plain-text GET client for reference pages. One attempt per request.
 */
export class HttpClient {
  protected axiosInstance: AxiosInstance;
  protected serviceName: string;

  constructor(config: ClientConfig = {}, serviceName: string = 'http') {
    this.serviceName = serviceName;

    this.axiosInstance = axios.create({
      timeout: config.timeout || 30000,
      responseType: 'text',
      headers: {
        Accept: 'text/html,application/xhtml+xml',
        ...(config.userAgent && { 'User-Agent': config.userAgent }),
        ...config.headers,
      },
    });

    this.setupInterceptors();
  }

  private setupInterceptors(): void {
    this.axiosInstance.interceptors.request.use((config) => {
      logger.debug(`[${this.serviceName}] ${config.method?.toUpperCase()} ${config.url}`);
      return config;
    });
  }

  async getText(url: string): Promise<string> {
    try {
      const response = await this.axiosInstance.get<string>(url);
      logger.debug(`[${this.serviceName}] GET ${url} returned ${response.status}`);
      return typeof response.data === 'string' ? response.data : String(response.data);
    } catch (error) {
      throw this.toHttpError(error, url);
    }
  }

  private toHttpError(error: unknown, url: string): HttpError {
    if (axios.isAxiosError(error)) {
      const status = error.response?.status;
      if (status !== undefined) {
        return new HttpError(`GET ${url} failed with status ${status}`, url, status, error.code, error);
      }
      return new HttpError(
        `GET ${url} failed: ${error.code ?? error.message}`,
        url,
        undefined,
        error.code,
        error
      );
    }
    const message = error instanceof Error ? error.message : String(error);
    return new HttpError(`GET ${url} failed: ${message}`, url, undefined, undefined, error);
  }
}
