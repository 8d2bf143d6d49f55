// src/modules/records/optimisticLock.guard.ts
// Pre-write version check. The increment itself is a compare-and-swap inside the store.

export type LockCheckResult =
  | { ok: true }
  | { ok: false; reason: "VERSION_REQUIRED" | "VERSION_CONFLICT" };

export function checkVersion(
  storedVersion: number,
  suppliedVersion: number | null | undefined,
): LockCheckResult {
  if (suppliedVersion === null || suppliedVersion === undefined) {
    return { ok: false, reason: "VERSION_REQUIRED" };
  }

  if (storedVersion !== suppliedVersion) {
    return { ok: false, reason: "VERSION_CONFLICT" };
  }

  return { ok: true };
}
