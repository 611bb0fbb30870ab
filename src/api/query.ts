import type { Descriptor, Metadata } from '../filesystem/types.js';

export const DEFAULT_LIMIT = 200;
export const MAX_LIMIT = 500;
export const DEFAULT_SORT_FIELD = 'name';

export const SORT_FIELDS = [
  'name',
  'resource_kind',
  'size_bytes',
  'permission_mode',
  'user',
  'group',
  'user_id',
  'group_id',
  'mime_type',
  'accessed_at',
  'modified_at',
  'changed_at',
  'born_at',
] as const;

export type SortField = (typeof SORT_FIELDS)[number];

export interface ListParams {
  limit: number;
  offset: number;
  sortField: SortField;
  descending: boolean;
}

export interface PaginationLinks {
  self: string;
  first: string;
  last: string;
  prev: string | null;
  next: string | null;
}

export interface Page {
  entries: Descriptor[];
  links: PaginationLinks;
  total: number;
}

export class InvalidQueryParameterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidQueryParameterError';
  }
}

function isSortField(value: string): value is SortField {
  return SORT_FIELDS.some(field => field === value);
}

function parseInteger(raw: string): number | undefined {
  if (!/^[+-]?\d+$/.test(raw)) return undefined;
  const value = Number(raw);
  return Number.isSafeInteger(value) ? value : undefined;
}

/**
 * Read `page[limit]`, `page[offset]` and `sort` from a query string.
 * Only the first occurrence of each parameter counts; an empty value means the default.
 */
export function parseListParams(query: URLSearchParams): ListParams {
  const params: ListParams = {
    limit: DEFAULT_LIMIT,
    offset: 0,
    sortField: DEFAULT_SORT_FIELD,
    descending: false,
  };

  const limitRaw = query.get('page[limit]');
  if (limitRaw) {
    const limit = parseInteger(limitRaw);
    if (limit === undefined || limit < 1) {
      throw new InvalidQueryParameterError('invalid page[limit]: must be a positive integer');
    }
    if (limit > MAX_LIMIT) {
      throw new InvalidQueryParameterError(`page[limit] exceeds maximum of ${MAX_LIMIT}`);
    }
    params.limit = limit;
  }

  const offsetRaw = query.get('page[offset]');
  if (offsetRaw) {
    const offset = parseInteger(offsetRaw);
    if (offset === undefined || offset < 0) {
      throw new InvalidQueryParameterError('invalid page[offset]: must be a non-negative integer');
    }
    params.offset = offset;
  }

  const sortRaw = query.get('sort');
  if (sortRaw) {
    if (sortRaw.includes(',')) {
      throw new InvalidQueryParameterError('sorting by multiple fields is not supported');
    }
    let field = sortRaw;
    if (field.startsWith('-')) {
      params.descending = true;
      field = field.slice(1);
    }
    if (!isSortField(field)) {
      throw new InvalidQueryParameterError(`invalid sort field: ${field}`);
    }
    params.sortField = field;
  }

  return params;
}

type Less = (a: Metadata, b: Metadata) => boolean;

/** Absent sorts before present; two absent values are equal. */
function lessOptional<T>(a: T | undefined, b: T | undefined, less: (x: T, y: T) => boolean): boolean {
  if (a === undefined) return b !== undefined;
  if (b === undefined) return false;
  return less(a, b);
}

const lessNumber = (x: number, y: number): boolean => x < y;
const lessDate = (x: Date, y: Date): boolean => x.getTime() < y.getTime();
// UTF-8 byte order; UTF-16 code units disagree once names leave the BMP.
const lessString = (x: string, y: string): boolean => Buffer.compare(Buffer.from(x), Buffer.from(y)) < 0;

const comparators: Record<SortField, Less> = {
  name: (a, b) => lessString(a.name, b.name),
  resource_kind: (a, b) => lessString(a.resourceKind, b.resourceKind),
  size_bytes: (a, b) => lessOptional(a.sizeBytes, b.sizeBytes, lessNumber),
  permission_mode: (a, b) => lessString(a.permissionMode, b.permissionMode),
  user: (a, b) => lessString(a.user, b.user),
  group: (a, b) => lessString(a.group, b.group),
  user_id: (a, b) => lessNumber(a.userId, b.userId),
  group_id: (a, b) => lessNumber(a.groupId, b.groupId),
  mime_type: (a, b) => lessString(a.mimeType, b.mimeType),
  accessed_at: (a, b) => lessOptional(a.accessedAt, b.accessedAt, lessDate),
  modified_at: (a, b) => lessOptional(a.modifiedAt, b.modifiedAt, lessDate),
  changed_at: (a, b) => lessOptional(a.changedAt, b.changedAt, lessDate),
  born_at: (a, b) => lessOptional(a.bornAt, b.bornAt, lessDate),
};

/**
 * Stable merge sort driven by a strict "less" predicate.
 * An element from the right run only moves ahead when it is strictly less.
 */
function stableSort<T extends object>(items: readonly T[], less: (a: T, b: T) => boolean): T[] {
  if (items.length <= 1) return [...items];
  const middle = Math.floor(items.length / 2);
  const left = stableSort(items.slice(0, middle), less);
  const right = stableSort(items.slice(middle), less);

  const merged: T[] = [];
  let i = 0;
  let j = 0;
  for (;;) {
    const l = left[i];
    const r = right[j];
    if (l === undefined || r === undefined) break;
    if (less(r, l)) {
      merged.push(r);
      j++;
    } else {
      merged.push(l);
      i++;
    }
  }
  return merged.concat(left.slice(i), right.slice(j));
}

/**
 * Order the full descriptor set by one field.
 *
 * Descending negates the ascending predicate rather than reversing the result,
 * so entries without a value land last when descending, not first.
 */
export function sortDescriptors(entries: readonly Descriptor[], field: SortField, descending: boolean): Descriptor[] {
  const compare = comparators[field];
  const less = descending
    ? (a: Descriptor, b: Descriptor) => !compare(a.metadata, b.metadata)
    : (a: Descriptor, b: Descriptor) => compare(a.metadata, b.metadata);
  return stableSort(entries, less);
}

export function buildPaginationLinks(basePath: string, params: ListParams, total: number): PaginationLinks {
  const buildUrl = (offset: number): string => {
    let url = `${basePath}?page[offset]=${offset}&page[limit]=${params.limit}`;
    if (params.sortField !== DEFAULT_SORT_FIELD || params.descending) {
      url += `&sort=${params.descending ? '-' : ''}${params.sortField}`;
    }
    return url;
  };

  const lastOffset = total > 0 ? Math.floor((total - 1) / params.limit) * params.limit : 0;

  return {
    self: buildUrl(params.offset),
    first: buildUrl(0),
    last: buildUrl(lastOffset),
    prev: params.offset > 0 ? buildUrl(Math.max(params.offset - params.limit, 0)) : null,
    next: params.offset + params.limit < total ? buildUrl(params.offset + params.limit) : null,
  };
}

/** Sort everything, then cut the requested window out of the sorted set. */
export function applyListParams(entries: readonly Descriptor[], params: ListParams, basePath: string): Page {
  const sorted = sortDescriptors(entries, params.sortField, params.descending);
  const total = sorted.length;
  const start = Math.min(params.offset, total);
  const end = Math.min(start + params.limit, total);

  return {
    entries: sorted.slice(start, end),
    links: buildPaginationLinks(basePath, params, total),
    total,
  };
}
