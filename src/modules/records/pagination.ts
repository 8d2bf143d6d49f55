// src/modules/records/pagination.ts
// Page bounds and sort resolution shared by the relational and mirror read paths.

export type PageSpec = {
  page: number;
  pageSize: number;
  totalCount: number;
  limit: number;
  offset: number;
};

export type SortDirection = "asc" | "desc";

export type SortSpec = {
  field: string;
  direction: SortDirection;
};

export const DEFAULT_SORT_FIELD = "id";
export const DEFAULT_SORT_DIRECTION: SortDirection = "desc";

/**
 * `requestedPage` is 1-based and already validated (> 0) by the caller.
 * The effective size never exceeds `totalCount`.
 */
export function resolvePage(
  requestedPage: number,
  requestedSize: number | null | undefined,
  totalCount: number,
  defaultSize: number,
): PageSpec {
  const pageSize = Math.max(
    0,
    Math.min(totalCount, requestedSize ?? defaultSize),
  );
  const offset = (requestedPage - 1) * pageSize;

  return {
    page: requestedPage,
    pageSize,
    totalCount,
    limit: pageSize,
    offset,
  };
}

export function resolveSort(
  requestedField?: string | null,
  requestedDirection?: string | null,
): SortSpec {
  const field = requestedField || DEFAULT_SORT_FIELD;
  const direction: SortDirection =
    requestedDirection === "asc" || requestedDirection === "desc"
      ? requestedDirection
      : DEFAULT_SORT_DIRECTION;

  return { field, direction };
}
