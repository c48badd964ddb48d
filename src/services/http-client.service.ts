// ============================================================================
// HTTP CLIENT SERVICE
// Axios-based JSON client with correlation headers and error mapping
// ============================================================================

import axios, {
  AxiosError,
  type AxiosAdapter,
  type AxiosInstance,
  type AxiosRequestConfig,
  type AxiosResponse,
} from "axios";
import { logger } from "../utils/logger.js";
import { metrics } from "../utils/metrics.js";
import { context } from "../utils/context.js";
import { ProviderTimeoutError, ProviderUnavailableError } from "../errors/index.js";

export interface HttpClientConfig {
  baseURL: string;
  timeout: number;
  headers?: Record<string, string>;
  /** Replaces the network transport (used by tests) */
  adapter?: AxiosAdapter;
}

declare module "axios" {
  export interface InternalAxiosRequestConfig {
    metadata?: {
      startTime: number;
    };
  }
}

export class HttpClientService {
  private readonly client: AxiosInstance;
  private readonly serviceName: string;

  constructor(clientConfig: HttpClientConfig, serviceName: string = "http-client") {
    this.serviceName = serviceName;
    this.client = axios.create({
      baseURL: clientConfig.baseURL,
      timeout: clientConfig.timeout,
      headers: {
        Accept: "application/json",
        ...clientConfig.headers,
      },
      ...(clientConfig.adapter ? { adapter: clientConfig.adapter } : {}),
    });

    this.setupInterceptors();
  }

  private setupInterceptors(): void {
    this.client.interceptors.request.use((reqConfig) => {
      const ctx = context.get();

      if (ctx?.correlationId) {
        reqConfig.headers["X-Correlation-ID"] = ctx.correlationId;
      }
      if (ctx?.transactionId) {
        reqConfig.headers["X-Request-ID"] = ctx.transactionId;
      }

      reqConfig.metadata = { startTime: Date.now() };

      logger.debug(
        {
          type: "http_request",
          service: this.serviceName,
          method: reqConfig.method?.toUpperCase(),
          url: reqConfig.url,
        },
        "HTTP request starting"
      );

      return reqConfig;
    });

    this.client.interceptors.response.use(
      (response) => {
        const startTime = response.config.metadata?.startTime;

        logger.debug(
          {
            type: "http_response",
            service: this.serviceName,
            status: response.status,
            duration: startTime ? Date.now() - startTime : 0,
          },
          "HTTP response received"
        );

        return response;
      },
      (error: unknown) => this.handleError(error)
    );
  }

  private handleError(error: unknown): Promise<never> {
    if (!axios.isAxiosError(error)) {
      return Promise.reject(error);
    }

    const url = error.config?.url || "unknown";

    if (error.code === AxiosError.ECONNABORTED || error.code === AxiosError.ETIMEDOUT) {
      const timeout = error.config?.timeout || 0;
      logger.error(
        { type: "http_timeout", service: this.serviceName, url, timeout },
        "HTTP request timed out"
      );
      return Promise.reject(new ProviderTimeoutError(url, timeout));
    }

    if (!error.response) {
      logger.error(
        {
          type: "http_connection_error",
          service: this.serviceName,
          url,
          code: error.code,
          message: error.message,
        },
        "HTTP connection error"
      );
      return Promise.reject(new ProviderUnavailableError(error.message, error));
    }

    logger.warn(
      { type: "http_error", service: this.serviceName, status: error.response.status, url },
      "HTTP request failed"
    );

    // Callers inspect the status themselves
    return Promise.reject(error);
  }

  async get<T = unknown>(
    url: string,
    additionalConfig?: Partial<AxiosRequestConfig>
  ): Promise<AxiosResponse<T>> {
    return this.track("GET", url, () => this.client.get<T>(url, additionalConfig));
  }

  /**
   * POST an application/x-www-form-urlencoded body
   */
  async postForm<T = unknown>(
    url: string,
    fields: Record<string, string>,
    additionalConfig?: Partial<AxiosRequestConfig>
  ): Promise<AxiosResponse<T>> {
    const body = new URLSearchParams(fields).toString();
    return this.track("POST", url, () =>
      this.client.post<T>(url, body, {
        ...additionalConfig,
        headers: { "Content-Type": "application/x-www-form-urlencoded" },
      })
    );
  }

  private async track<T>(
    method: string,
    url: string,
    send: () => Promise<AxiosResponse<T>>
  ): Promise<AxiosResponse<T>> {
    try {
      const response = await send();
      metrics.incCounter("http_client_requests_total", {
        service: this.serviceName,
        method,
        status: String(response.status),
      });
      return response;
    } catch (error) {
      const status = axios.isAxiosError(error) ? error.response?.status || 0 : 0;
      metrics.incCounter("http_client_requests_total", {
        service: this.serviceName,
        method,
        status: String(status),
      });
      throw error;
    }
  }
}
