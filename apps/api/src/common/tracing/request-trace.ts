import { AsyncLocalStorage } from 'node:async_hooks';

export interface RequestTraceContext {
  traceId: string;
  sessionId?: string;
}

export const requestTraceStorage =
  new AsyncLocalStorage<RequestTraceContext>();

export function currentTraceId(): string | undefined {
  return requestTraceStorage.getStore()?.traceId;
}

/** Per-request fields set by the tracing interceptor and cart session resolver. */
export interface RequestState {
  txId?: string;
  cartSessionId?: string;
}
