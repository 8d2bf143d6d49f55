import { randomUUID } from "crypto";
import { AsyncLocalStorage } from "async_hooks";

type ContextStore = {
  requestId: string;
  language?: string;
  actorName?: string;
};

const storage = new AsyncLocalStorage<ContextStore>();

export function withRequestContext<T>(
  fn: () => Promise<T>,
  requestId?: string,
) {
  return storage.run(
    {
      requestId: requestId ?? randomUUID(),
    },
    fn,
  );
}

export function getRequestId(): string | undefined {
  return storage.getStore()?.requestId;
}

export function getRequestLanguage(): string | undefined {
  return storage.getStore()?.language;
}

export function getRequestActorName(): string | undefined {
  return storage.getStore()?.actorName;
}

/**
 * Context fields resolved by later middleware (language, identity).
 * No-op outside a request scope.
 */
export function setRequestContext(
  patch: Partial<Omit<ContextStore, "requestId">>,
): void {
  const store = storage.getStore();
  if (!store) return;
  Object.assign(store, patch);
}
