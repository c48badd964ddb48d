// ============================================================================
// REQUEST CONTEXT
// Async Local Storage for request-scoped data (correlation ID, operation, etc.)
// ============================================================================

import { AsyncLocalStorage } from "async_hooks";
import { v4 as uuidv4 } from "uuid";

// ----------------------------------------------------------------------------
// CONTEXT TYPES
// ----------------------------------------------------------------------------

export interface RequestContext {
  correlationId: string;
  transactionId: string;
  operation?: string;
  startTime: number;
  clientIp?: string;
  userAgent?: string;
}

// ----------------------------------------------------------------------------
// ASYNC LOCAL STORAGE INSTANCE
// ----------------------------------------------------------------------------

const asyncLocalStorage = new AsyncLocalStorage<RequestContext>();

// ----------------------------------------------------------------------------
// CONTEXT MANAGEMENT
// ----------------------------------------------------------------------------

export const context = {
  /**
   * Run a function within a request context
   */
  run<T>(ctx: Partial<RequestContext>, fn: () => T): T {
    const fullContext: RequestContext = {
      correlationId: ctx.correlationId || uuidv4(),
      transactionId: ctx.transactionId || uuidv4(),
      startTime: ctx.startTime || Date.now(),
      operation: ctx.operation,
      clientIp: ctx.clientIp,
      userAgent: ctx.userAgent,
    };
    return asyncLocalStorage.run(fullContext, fn);
  },

  /**
   * Get current context (may be undefined)
   */
  get(): RequestContext | undefined {
    return asyncLocalStorage.getStore();
  },

  getCorrelationId(): string {
    return asyncLocalStorage.getStore()?.correlationId || "no-context";
  },

  getElapsedMs(): number {
    const ctx = asyncLocalStorage.getStore();
    return ctx ? Date.now() - ctx.startTime : 0;
  },

  /**
   * Update context with new values
   */
  update(updates: Partial<RequestContext>): void {
    const ctx = asyncLocalStorage.getStore();
    if (ctx) {
      Object.assign(ctx, updates);
    }
  },

  setOperation(operation: string): void {
    this.update({ operation });
  },
};
