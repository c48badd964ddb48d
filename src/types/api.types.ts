// ============================================================================
// API TYPES
// HTTP response envelope shared by every route
// ============================================================================

import type { TokenCacheStats } from "./lounge.types.js";

export interface ApiError {
  code: string;
  message: string;
  retryable: boolean;
  details?: Record<string, unknown>;
}

export interface ResponseMeta {
  transactionId: string;
  correlationId: string;
  timestamp: string;
  duration: number;
  operation: string;
}

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: ApiError;
  message?: string;
  meta: ResponseMeta;
}

export interface StatusResponse {
  status: "healthy";
  timestamp: string;
  uptime: string;
  version: string;
  environment: string;
  services: {
    tokenCache: TokenCacheStats | null;
  };
}
