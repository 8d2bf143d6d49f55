// src/modules/records/record.search.ts
// Purpose: Paginated, filtered listing over the relational store (`data`) or the document mirror (`list`).

import type { FieldError } from "@/lib/errors/domain-error";
import { translate } from "@/lib/i18n/translate";
import type { ResourceDefinition } from "./record.definition";
import { BadRequestError, ValidationFailedError } from "./record.errors";
import { serializeRecord } from "./record.mapper";
import type { RecordMirror, RecordStore } from "./record.store";
import type { JsonObject } from "./record.types";
import type { FilterPredicate } from "./filters/filter.types";
import { renderMongoFilter } from "./filters/mongo.renderer";
import {
  applyChangeLogFilters,
  CHANGE_LOG_ACTOR_FIELDS,
  CHANGE_LOG_DATE_FIELDS,
  RecordFilterBuilder,
  type ChangeLogFilterValues,
} from "./filters/recordFilter.builder";
import { resolvePage, resolveSort, type SortSpec } from "./pagination";
import { paginated, type PaginatedEnvelope } from "./response.envelope";
import {
  isBlank,
  isPlainObject,
  parseInteger,
  parsePositiveInteger,
} from "./record.validator";

export type SearchBackend = "primary" | "mirror";

export type SearchDeps = {
  store: RecordStore;
  mirror?: RecordMirror | null;
  defaultPageSize: number;
};

export type SearchQuery = {
  where: FilterPredicate | null;
  page: number;
  pageSize: number | null;
  sort: SortSpec;
};

const PAGING_PARAMS = ["page", "pageSize", "sortBy", "sortDir"] as const;

const DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

const NUMERIC_RE = /^-?\d+(\.\d+)?$/;

const INTEGER_COLUMNS = new Set(["id", "status", "lockVersion"]);

type Scalar = string | number | boolean;

function isScalar(value: unknown): value is Scalar {
  return typeof value === "string" || typeof value === "number" || typeof value === "boolean";
}

function asText(value: unknown): string | null {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return null;
}

export class RecordSearch {
  private readonly store: RecordStore;
  private readonly mirror: RecordMirror | null;
  private readonly defaultPageSize: number;

  constructor(
    private readonly resource: ResourceDefinition,
    deps: SearchDeps,
  ) {
    this.store = deps.store;
    this.mirror = deps.mirror ?? null;
    this.defaultPageSize = deps.defaultPageSize;
  }

  /**
   * Validates search parameters and turns them into a predicate tree plus
   * paging. Absent parameters add no constraint, except that Deleted rows
   * stay hidden unless the status filter asks for them.
   */
  parse(input: unknown): SearchQuery {
    const params = input === undefined || input === null ? {} : input;
    if (!isPlainObject(params)) {
      throw new BadRequestError();
    }

    const errors: FieldError[] = [];
    const allowed = new Set<string>([
      ...Object.keys(this.resource.search),
      ...PAGING_PARAMS,
      ...CHANGE_LOG_DATE_FIELDS,
      ...CHANGE_LOG_ACTOR_FIELDS,
    ]);

    for (const name of Object.keys(params)) {
      if (!allowed.has(name)) {
        errors.push({ field: name, message: translate("invalidField", { label: name }) });
      }
    }

    let page = 1;
    if (!isBlank(params.page)) {
      const requested = parseInteger(params.page);
      if (requested === null) {
        errors.push({ field: "page", message: translate("integer", { label: "Page" }) });
      } else if (requested < 1) {
        errors.push({ field: "page", message: translate("pageMustBeGreaterThanZero") });
      } else {
        page = requested;
      }
    }

    let pageSize: number | null = null;
    if (!isBlank(params.pageSize)) {
      pageSize = parsePositiveInteger(params.pageSize);
      if (pageSize === null) {
        errors.push({
          field: "pageSize",
          message: translate("integerNoZero", { label: "Page Size" }),
        });
      }
    }

    const sortBy = asText(params.sortBy);
    if (sortBy !== null && sortBy !== "" && !this.resource.sortable.includes(sortBy)) {
      errors.push({
        field: "sortBy",
        message: translate("valueNotInList", {
          label: "Sort By",
          value: this.resource.sortable.join(", "),
        }),
      });
    }

    const changeLog: ChangeLogFilterValues = {};
    for (const name of CHANGE_LOG_DATE_FIELDS) {
      const raw = params[name];
      if (isBlank(raw)) continue;
      const text = asText(raw);
      const parts = text === null ? [] : text.split(",").map((part) => part.trim());
      if (parts.length === 0 || parts.length > 2 || parts.some((part) => part !== "" && !DATE_RE.test(part))) {
        errors.push({ field: name, message: translate("invalidValue", { label: name }) });
        continue;
      }
      changeLog[name] = text;
    }
    for (const name of CHANGE_LOG_ACTOR_FIELDS) {
      const text = asText(params[name]);
      if (text !== null && text !== "") changeLog[name] = text;
    }

    const builder = new RecordFilterBuilder();
    const orLike: [string, string][] = [];

    for (const [name, kind] of Object.entries(this.resource.search)) {
      const raw = params[name];

      switch (kind) {
        case "equals": {
          if (isBlank(raw)) break;
          const value = this.equalsValue(name, raw);
          if (value === null) {
            errors.push({ field: name, message: translate("invalidValue", { label: name }) });
          } else {
            builder.equals(name, value);
          }
          break;
        }

        case "like":
        case "exact":
        case "orLike": {
          if (isBlank(raw)) break;
          const text = asText(raw);
          if (text === null) {
            errors.push({ field: name, message: translate("string", { label: name }) });
          } else if (kind === "like") {
            builder.like(name, text);
          } else if (kind === "exact") {
            builder.exactString(name, text);
          } else {
            orLike.push([name, text]);
          }
          break;
        }

        case "multi": {
          if (isBlank(raw)) break;
          if (typeof raw === "string" && raw.split(",").every((item) => item.trim() === "" || parseInteger(item) !== null)) {
            builder.multiValue(name, raw);
          } else if (Array.isArray(raw) && raw.every((item): item is number => Number.isInteger(item))) {
            builder.multiValue(name, raw);
          } else {
            errors.push({ field: name, message: translate("invalidValue", { label: name }) });
          }
          break;
        }

        case "status": {
          if (isBlank(raw)) {
            builder.status(name, null);
            break;
          }
          const status = parseInteger(raw);
          if (status === null) {
            errors.push({ field: name, message: translate("integer", { label: name }) });
          } else {
            builder.status(name, status);
          }
          break;
        }
      }
    }

    if (orLike.length > 0) {
      builder.or((group) => {
        for (const [name, text] of orLike) group.like(name, text);
      });
    }

    applyChangeLogFilters(builder, changeLog);

    if (errors.length > 0) {
      throw new ValidationFailedError(errors);
    }

    return {
      where: builder.build(),
      page,
      pageSize,
      sort: resolveSort(sortBy, asText(params.sortDir)),
    };
  }

  /**
   * Both backends must see the stored type: core integer columns take an
   * integer, declared fields go through their own schema, with a numeric
   * string retried as a number.
   */
  private equalsValue(name: string, raw: unknown): Scalar | null {
    if (INTEGER_COLUMNS.has(name)) return parseInteger(raw);

    const field = this.resource.fields[name];
    if (!field) return null;

    const candidates: unknown[] = [raw];
    if (typeof raw === "string" && NUMERIC_RE.test(raw.trim())) {
      candidates.push(Number(raw.trim()));
    }

    for (const candidate of candidates) {
      const parsed = field.schema.safeParse(candidate);
      if (parsed.success && isScalar(parsed.data)) return parsed.data;
    }
    return null;
  }

  async search(
    input: unknown,
    backend: SearchBackend = "primary",
  ): Promise<PaginatedEnvelope<JsonObject>> {
    const query = this.parse(input);
    return backend === "mirror" ? this.searchMirror(query) : this.searchPrimary(query);
  }

  private async searchPrimary(query: SearchQuery): Promise<PaginatedEnvelope<JsonObject>> {
    const totalCount = await this.store.count(this.resource.table, query.where);
    const page = resolvePage(query.page, query.pageSize, totalCount, this.defaultPageSize);

    const rows =
      page.limit > 0
        ? await this.store.find(this.resource, {
            where: query.where,
            sort: query.sort,
            limit: page.limit,
            offset: page.offset,
          })
        : [];

    return paginated(rows.map(serializeRecord), page);
  }

  private async searchMirror(query: SearchQuery): Promise<PaginatedEnvelope<JsonObject>> {
    const binding = this.resource.mirror;
    if (!binding || !this.mirror) {
      throw new BadRequestError();
    }

    const filter = renderMongoFilter(query.where);
    const totalCount = await this.mirror.count(binding.collection, filter);
    const page = resolvePage(query.page, query.pageSize, totalCount, this.defaultPageSize);

    const documents =
      page.limit > 0
        ? await this.mirror.find(binding.collection, filter, {
            sort: { [query.sort.field]: query.sort.direction === "asc" ? 1 : -1 },
            limit: page.limit,
            skip: page.offset,
          })
        : [];

    const rows: JsonObject[] = documents.map(({ _id, syncFlag, ...rest }) => rest);
    return paginated(rows, page);
  }
}
