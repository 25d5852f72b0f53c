import axios, { AxiosAdapter, AxiosInstance, ResponseType } from 'axios';
import { FetchError } from '../utils/errors.js';

export const DEFAULT_TIMEOUT_MS = 30000;

export interface HttpRequestOptions {
  userAgent?: string;
  signal?: AbortSignal;
}

export interface HttpResponse<T> {
  status: number;
  statusText: string;
  data: T;
}

export interface HttpClientOptions {
  timeoutMs?: number;
  /** Replaces the network transport; tests plug an in-process site in here */
  adapter?: AxiosAdapter;
}

/**
 * Thin axios wrapper shared by discovery and page fetching.
 *
 * Never throws on an HTTP status: callers decide what a 404 or 500 means.
 * Network failures and timeouts are rethrown as FetchError; aborts are
 * rethrown untouched so callers can tell them apart.
 */
export class HttpClient {
  private client: AxiosInstance;

  constructor(options: HttpClientOptions = {}) {
    this.client = axios.create({
      timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      maxRedirects: 5,
      validateStatus: () => true,
      adapter: options.adapter,
      headers: {
        Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
        'Accept-Language': 'en-US,en;q=0.9',
      },
    });
  }

  async getText(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse<string>> {
    const response = await this.request(url, 'text', options);
    const data = response.data;
    return { ...response, data: typeof data === 'string' ? data : String(data ?? '') };
  }

  /** Raw bytes, for documents that may arrive gzipped without a Content-Encoding header */
  async getBuffer(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse<Buffer>> {
    const response = await this.request(url, 'arraybuffer', options);
    const data = response.data;
    return { ...response, data: toBuffer(data) };
  }

  private async request(
    url: string,
    responseType: ResponseType,
    options: HttpRequestOptions
  ): Promise<HttpResponse<unknown>> {
    try {
      const response = await this.client.get<unknown>(url, {
        responseType,
        signal: options.signal,
        headers: options.userAgent ? { 'User-Agent': options.userAgent } : undefined,
      });
      return { status: response.status, statusText: response.statusText, data: response.data };
    } catch (error) {
      if (axios.isCancel(error) || options.signal?.aborted) {
        throw error;
      }
      if (axios.isAxiosError(error)) {
        const reason = error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT'
          ? `Request timed out after ${this.client.defaults.timeout}ms`
          : error.message;
        throw new FetchError(reason, url);
      }
      throw error;
    }
  }
}

function toBuffer(data: unknown): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (data instanceof ArrayBuffer) return Buffer.from(data);
  if (ArrayBuffer.isView(data)) return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
  if (typeof data === 'string') return Buffer.from(data, 'utf-8');
  return Buffer.alloc(0);
}
