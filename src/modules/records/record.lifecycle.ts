// src/modules/records/record.lifecycle.ts
// Purpose: Create / update / delete / view for one record resource. The only code path that writes records.

import { isDeepStrictEqual } from "node:util";
import { errorMeta, log } from "@/lib/observability/logger";
import { DomainError } from "@/lib/errors/domain-error";
import { translate } from "@/lib/i18n/translate";
import {
  DEFAULT_CREATE_STATUS,
  INITIAL_LOCK_VERSION,
  RECORD_STATUS_LABELS,
  RecordStatus,
  RESTRICTED_STATUSES,
  Scenario,
} from "./record.constants";
import type { ResourceDefinition } from "./record.definition";
import {
  DependencyBlockedError,
  InvalidStatusTransitionError,
  LockConflictError,
  NoEffectiveChangeError,
  PermissionDeniedError,
  RecordNotFoundError,
  StorageFailureError,
  ValidationFailedError,
  BadRequestError,
} from "./record.errors";
import { serializeRecord } from "./record.mapper";
import type { RecordMirror, RecordStore } from "./record.store";
import type {
  ActorContext,
  JsonObject,
  JsonValue,
  RecordChanges,
  RecordDetail,
  StoredRecord,
} from "./record.types";
import { findBlockingReferences } from "./dependency.guard";
import { formatUtcTimestamp, onCreate, onMutate } from "./changeLog.tracker";
import { checkVersion } from "./optimisticLock.guard";
import { evaluateTransition, type StatusPolicyConfig, DEFAULT_STATUS_POLICY } from "./status.policy";
import {
  isPlainObject,
  parsePositiveInteger,
  validateShape,
  validateValues,
  type ParsedMutation,
} from "./record.validator";
import {
  scenarioSuccess,
  success,
  type SuccessEnvelope,
} from "./response.envelope";

export type LifecycleDeps = {
  store: RecordStore;
  /** Omitted when the mirror is disabled. */
  mirror?: RecordMirror | null;
  policy?: StatusPolicyConfig;
  /** Statuses only a privileged actor may move a record into. */
  restrictedStatuses?: readonly RecordStatus[];
  clock?: () => Date;
};

export type RecordEnvelope = SuccessEnvelope<JsonObject>;

export class RecordLifecycle {
  private readonly store: RecordStore;
  private readonly mirror: RecordMirror | null;
  private readonly policy: StatusPolicyConfig;
  private readonly restricted: readonly RecordStatus[];
  private readonly clock: () => Date;

  constructor(
    private readonly resource: ResourceDefinition,
    deps: LifecycleDeps,
  ) {
    this.store = deps.store;
    this.mirror = deps.mirror ?? null;
    this.policy = deps.policy ?? DEFAULT_STATUS_POLICY;
    this.restricted = deps.restrictedStatuses ?? RESTRICTED_STATUSES;
    this.clock = deps.clock ?? (() => new Date());
  }

  ////////////////////////////////////////////////////////////////
  // Create
  ////////////////////////////////////////////////////////////////

  async create(input: unknown, actor: ActorContext): Promise<RecordEnvelope> {
    const params = requireObject(input);
    const parsed = validateShape(this.resource, Scenario.CREATE, params);
    const status = parsed.status ?? DEFAULT_CREATE_STATUS;

    this.assertMayRequest(status, actor);

    const attributes = this.completeAttributes(
      validateValues(this.resource, parsed.attributes),
    );

    const detail: RecordDetail = {
      ...(parsed.detail ?? {}),
      changeLog: onCreate(actor.name, this.now()),
    };

    let saved: StoredRecord;
    try {
      saved = await this.store.insert(this.resource, {
        status,
        lockVersion: INITIAL_LOCK_VERSION,
        detail,
        syncFlag: null,
        attributes,
      });
    } catch (err) {
      throw this.storageFailure(Scenario.CREATE, err);
    }

    log("INFO", "RECORD_CREATED", {
      resource: this.resource.name,
      recordId: saved.id,
      status: saved.status,
    });

    const synced = await this.mirrorWrite(saved);
    return scenarioSuccess(Scenario.CREATE, serializeRecord(synced));
  }

  ////////////////////////////////////////////////////////////////
  // Update
  ////////////////////////////////////////////////////////////////

  async update(input: unknown, actor: ActorContext): Promise<RecordEnvelope> {
    const params = requireObject(input);
    const parsed = validateShape(this.resource, Scenario.UPDATE, params);
    return this.mutate(Scenario.UPDATE, parsed, actor);
  }

  ////////////////////////////////////////////////////////////////
  // Delete (soft)
  ////////////////////////////////////////////////////////////////

  async delete(input: unknown, actor: ActorContext): Promise<RecordEnvelope> {
    const params = requireObject(input);
    const parsed = validateShape(this.resource, Scenario.DELETE, params);

    return this.mutate(
      Scenario.DELETE,
      { ...parsed, status: RecordStatus.DELETED, attributes: {} },
      actor,
    );
  }

  ////////////////////////////////////////////////////////////////
  // View
  ////////////////////////////////////////////////////////////////

  /** Deleted records are invisible to non-privileged actors. */
  async view(input: unknown, actor: ActorContext): Promise<RecordEnvelope> {
    const params = requireObject(input);
    const id = parsePositiveInteger(params.id);

    if (id === null) {
      throw new ValidationFailedError([
        { field: "id", message: translate("integerNoZero", { label: "ID" }) },
      ]);
    }

    const record = await this.store.findById(this.resource, id);

    if (!record || (record.status === RecordStatus.DELETED && !actor.isPrivileged)) {
      throw new RecordNotFoundError(id);
    }

    return success(serializeRecord(record));
  }

  ////////////////////////////////////////////////////////////////
  // Shared update/delete pipeline
  ////////////////////////////////////////////////////////////////

  private async mutate(
    scenario: Scenario,
    parsed: ParsedMutation,
    actor: ActorContext,
  ): Promise<RecordEnvelope> {
    if (parsed.id === undefined) {
      throw new BadRequestError();
    }

    ////////////////////////////////////////////////////////////////
    // 1️⃣ Load
    ////////////////////////////////////////////////////////////////

    const existing = await this.store.findById(this.resource, parsed.id);
    if (!existing) {
      throw new RecordNotFoundError(parsed.id);
    }

    const nextStatus = parsed.status ?? existing.status;

    ////////////////////////////////////////////////////////////////
    // 2️⃣ Status law, then restricted targets
    ////////////////////////////////////////////////////////////////

    if (nextStatus !== existing.status) {
      const verdict = evaluateTransition(
        this.policy,
        existing.status,
        nextStatus,
        actor.isPrivileged,
      );

      if (!verdict.allowed) {
        if (verdict.reason === "DELETED_REQUIRES_PRIVILEGE") {
          throw new PermissionDeniedError(
            translate("deletedStatusChanged", {
              value: RECORD_STATUS_LABELS[existing.status],
            }),
          );
        }

        throw new InvalidStatusTransitionError(
          existing.status,
          nextStatus,
          translate("cannotChangeStatus", {
            value: RECORD_STATUS_LABELS[existing.status],
            newValue: RECORD_STATUS_LABELS[nextStatus],
          }),
        );
      }

      this.assertMayRequest(nextStatus, actor);
    }

    ////////////////////////////////////////////////////////////////
    // 3️⃣ Optimistic lock
    ////////////////////////////////////////////////////////////////

    const lock = checkVersion(existing.lockVersion, parsed.lockVersion);
    if (!lock.ok) {
      if (lock.reason === "VERSION_CONFLICT") {
        throw new LockConflictError(existing.id);
      }
      throw new ValidationFailedError([
        { field: "lockVersion", message: translate("required", { label: "Lock Version" }) },
      ]);
    }

    ////////////////////////////////////////////////////////////////
    // 4️⃣ Field values
    ////////////////////////////////////////////////////////////////

    const attributes = validateValues(this.resource, parsed.attributes);
    const changes: RecordChanges = {};
    const changedFields: string[] = [];

    for (const [name, value] of Object.entries(attributes)) {
      if (!isDeepStrictEqual(existing.attributes[name] ?? null, value)) {
        changes.attributes = { ...changes.attributes, [name]: value };
        changedFields.push(name);
      }
    }

    if (nextStatus !== existing.status) {
      changes.status = nextStatus;
      changedFields.push("status");
    }

    let nextDetail: JsonObject | null = null;
    if (parsed.detail) {
      const { changeLog: _current, ...storedDetail } = existing.detail;
      const merged: JsonObject = { ...storedDetail, ...parsed.detail };
      if (!isDeepStrictEqual(storedDetail, merged)) {
        nextDetail = merged;
        changedFields.push("detail");
      }
    }

    ////////////////////////////////////////////////////////////////
    // 5️⃣ Dependency guard
    ////////////////////////////////////////////////////////////////

    const blocking = await findBlockingReferences(this.store, this.resource, {
      id: existing.id,
      nextStatus,
      changedFields,
    });

    if (blocking.length > 0) {
      throw new DependencyBlockedError(blocking);
    }

    ////////////////////////////////////////////////////////////////
    // 6️⃣ No-op rejection
    ////////////////////////////////////////////////////////////////

    const effective =
      scenario === Scenario.DELETE
        ? existing.status !== RecordStatus.DELETED
        : changedFields.length > 0;

    if (!effective) {
      throw new NoEffectiveChangeError(scenario);
    }

    ////////////////////////////////////////////////////////////////
    // 7️⃣ Audit + compare-and-swap write
    ////////////////////////////////////////////////////////////////

    const changeLog = onMutate(
      existing.detail.changeLog,
      { previousStatus: existing.status, status: nextStatus, changedFields },
      actor.name,
      this.now(),
    );

    const { changeLog: _previous, ...baseDetail } = existing.detail;
    changes.detail = { ...(nextDetail ?? baseDetail), changeLog };

    let saved: StoredRecord;
    try {
      saved = await this.store.save(
        this.resource,
        existing.id,
        existing.lockVersion,
        changes,
      );
    } catch (err) {
      throw this.storageFailure(scenario, err);
    }

    log("INFO", scenario === Scenario.DELETE ? "RECORD_DELETED" : "RECORD_UPDATED", {
      resource: this.resource.name,
      recordId: saved.id,
      from: existing.status,
      to: saved.status,
      lockVersion: saved.lockVersion,
      changedFields,
    });

    ////////////////////////////////////////////////////////////////
    // 8️⃣ Mirror
    ////////////////////////////////////////////////////////////////

    const synced = await this.mirrorWrite(saved);
    return scenarioSuccess(scenario, serializeRecord(synced));
  }

  ////////////////////////////////////////////////////////////////
  // Helpers
  ////////////////////////////////////////////////////////////////

  private now(): string {
    return formatUtcTimestamp(this.clock());
  }

  private assertMayRequest(status: RecordStatus, actor: ActorContext): void {
    if (this.restricted.includes(status) && !actor.isPrivileged) {
      throw new PermissionDeniedError();
    }
  }

  /** Declared attributes not supplied on create are stored as null. */
  private completeAttributes(
    values: Record<string, JsonValue>,
  ): Record<string, JsonValue> {
    const complete: Record<string, JsonValue> = {};
    for (const name of Object.keys(this.resource.fields)) {
      complete[name] = values[name] ?? null;
    }
    return complete;
  }

  private storageFailure(scenario: Scenario, err: unknown): DomainError {
    if (err instanceof DomainError) return err;

    log("ERROR", "RECORD_WRITE_FAILED", {
      resource: this.resource.name,
      scenario,
      ...errorMeta(err),
    });
    return new StorageFailureError(scenario, { cause: err });
  }

  /**
   * Best-effort upsert into the mirror. A failure flags the row for
   * resync and is never surfaced to the caller. Flag writes are pinned to
   * this record's lock version; a newer write owns the flag from then on.
   */
  private async mirrorWrite(record: StoredRecord): Promise<StoredRecord> {
    const binding = this.resource.mirror;
    if (!binding || !this.mirror) return record;

    try {
      const outcome = await this.mirror.upsert(
        binding.collection,
        serializeRecord(record),
        binding.uniqueKeys,
      );
      if (outcome === "written" && record.syncFlag !== null) {
        const cleared = await this.store.setSyncFlag(this.resource, record.id, null, record.lockVersion);
        if (cleared) return { ...record, syncFlag: null };
      }
      return record;
    } catch (err) {
      log("WARN", "MIRROR_UPSERT_FAILED", {
        resource: this.resource.name,
        recordId: record.id,
        ...errorMeta(err),
      });
    }

    try {
      await this.store.setSyncFlag(this.resource, record.id, 1, record.lockVersion);
    } catch (err) {
      log("ERROR", "SYNC_FLAG_WRITE_FAILED", {
        resource: this.resource.name,
        recordId: record.id,
        ...errorMeta(err),
      });
    }

    return { ...record, syncFlag: 1 };
  }
}

function requireObject(input: unknown): Record<string, unknown> {
  if (!isPlainObject(input)) {
    throw new BadRequestError();
  }
  return input;
}
