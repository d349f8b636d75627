import { Inject, Injectable, OnModuleDestroy, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Agent, Dispatcher, FormData } from 'undici';
import { AppConfig } from '../../config/configuration';
import { PinoLoggerService } from '../logging/pino-logger.service';

/**
 * DI token for overriding the undici dispatcher (tests bind a `MockAgent`).
 */
export const HTTP_DISPATCHER = 'HttpDispatcher';

export type HttpHeaders = Record<string, string | string[] | undefined>;

export interface HttpRequestOptions {
  method?: Dispatcher.HttpMethod;
  headers?: Record<string, string>;
  body?: string | Buffer | FormData;
  timeout?: number;
  signal?: AbortSignal;
}

export interface HttpResponse {
  statusCode: number;
  headers: HttpHeaders;
  body: Buffer;
}

export interface StreamResponse {
  statusCode: number;
  headers: HttpHeaders;
  body: AsyncIterable<Buffer>;
  /** Drops the connection; pending reads reject. */
  close(): void;
}

/**
 * Thin undici wrapper. Each call is a single attempt: retry policy belongs
 * to the callers, which know which statuses are worth repeating.
 */
@Injectable()
export class HttpClientService implements OnModuleDestroy {
  private readonly dispatcher: Dispatcher;
  private readonly ownsDispatcher: boolean;
  private readonly defaultTimeout: number;

  constructor(
    private readonly logger: PinoLoggerService,
    configService: ConfigService<AppConfig>,
    @Optional() @Inject(HTTP_DISPATCHER) dispatcher?: Dispatcher,
  ) {
    this.logger.setContext(HttpClientService.name);
    this.defaultTimeout =
      configService.get('scanApi', { infer: true })?.requestTimeoutMs ?? 30000;

    if (dispatcher) {
      this.dispatcher = dispatcher;
      this.ownsDispatcher = false;
    } else {
      this.dispatcher = new Agent({
        connections: 10,
        pipelining: 1,
        keepAliveTimeout: 30000,
        keepAliveMaxTimeout: 60000,
      });
      this.ownsDispatcher = true;
    }
  }

  async request(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
    const parsedUrl = new URL(url);
    const timeout = options.timeout ?? this.defaultTimeout;

    this.logger.debug({ url, method: options.method || 'GET' }, 'HTTP request');

    const response = await this.dispatcher.request({
      origin: parsedUrl.origin,
      path: parsedUrl.pathname + parsedUrl.search,
      method: options.method || 'GET',
      headers: options.headers,
      body: options.body,
      signal: options.signal,
      headersTimeout: timeout,
      bodyTimeout: timeout,
    });

    const body = Buffer.from(await response.body.arrayBuffer());

    return {
      statusCode: response.statusCode,
      headers: response.headers,
      body,
    };
  }

  /**
   * Opens a long-lived response. There is no body timeout: idle detection is
   * the consumer's job, since only it knows the expected ping cadence.
   */
  async openStream(url: string, options: HttpRequestOptions = {}): Promise<StreamResponse> {
    const parsedUrl = new URL(url);
    const controller = new AbortController();
    const onCallerAbort = () => controller.abort(options.signal?.reason);
    options.signal?.addEventListener('abort', onCallerAbort, { once: true });

    try {
      const response = await this.dispatcher.request({
        origin: parsedUrl.origin,
        path: parsedUrl.pathname + parsedUrl.search,
        method: options.method || 'GET',
        headers: options.headers,
        signal: controller.signal,
        headersTimeout: options.timeout ?? this.defaultTimeout,
        bodyTimeout: 0,
      });

      return {
        statusCode: response.statusCode,
        headers: response.headers,
        body: response.body,
        close: () => {
          options.signal?.removeEventListener('abort', onCallerAbort);
          if (!controller.signal.aborted) {
            controller.abort();
          }
          response.body.destroy();
        },
      };
    } catch (error) {
      options.signal?.removeEventListener('abort', onCallerAbort);
      throw error;
    }
  }

  async get(
    url: string,
    options?: Omit<HttpRequestOptions, 'method' | 'body'>,
  ): Promise<HttpResponse> {
    return this.request(url, { ...options, method: 'GET' });
  }

  async postForm(
    url: string,
    form: FormData,
    options?: Omit<HttpRequestOptions, 'method' | 'body'>,
  ): Promise<HttpResponse> {
    return this.request(url, { ...options, method: 'POST', body: form });
  }

  async delete(
    url: string,
    options?: Omit<HttpRequestOptions, 'method' | 'body'>,
  ): Promise<HttpResponse> {
    return this.request(url, { ...options, method: 'DELETE' });
  }

  async onModuleDestroy(): Promise<void> {
    await this.destroy();
  }

  async destroy(): Promise<void> {
    if (this.ownsDispatcher) {
      await this.dispatcher.close();
    }
  }
}
