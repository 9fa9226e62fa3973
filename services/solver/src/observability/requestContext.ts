import { AsyncLocalStorage } from "node:async_hooks";

export type RequestContext = {
  requestId: string;
  traceId: string;
  sessionId?: string;
};

const storage = new AsyncLocalStorage<RequestContext>();

export function runWithContext<T>(context: RequestContext, fn: () => T): T {
  return storage.run(context, fn);
}

export function getRequestContext(): RequestContext | undefined {
  return storage.getStore();
}

export function setSessionInContext(sessionId: string): void {
  const context = storage.getStore();
  if (!context) {
    return;
  }
  context.sessionId = sessionId;
}

export function updateContextIdentifiers(update: {
  requestId?: string;
  traceId?: string;
}): void {
  const context = storage.getStore();
  if (!context) {
    return;
  }
  if (update.requestId) {
    context.requestId = update.requestId;
  }
  if (update.traceId) {
    context.traceId = update.traceId;
  }
}
