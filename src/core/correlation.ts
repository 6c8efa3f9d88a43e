/**
 * Dispatch correlation context using AsyncLocalStorage.
 * Every log line written while a job runs carries its correlationId.
 */
import { AsyncLocalStorage } from "node:async_hooks";
import { generateEventId } from "../utils/id.js";

export interface DispatchContext {
  correlationId: string;
  userId?: string;
  jobId?: string;
}

const dispatchContext = new AsyncLocalStorage<DispatchContext>();

export function withContext<T>(ctx: DispatchContext, fn: () => Promise<T>): Promise<T> {
  return dispatchContext.run(ctx, fn);
}

export function getCurrentContext(): DispatchContext | undefined {
  return dispatchContext.getStore();
}

export function createCorrelationId(): string {
  return generateEventId();
}
