/**
 * Book Listing Criteria
 *
 * Search and ordering options for the home page, read leniently from the
 * query string: unknown values fall back to the defaults.
 *
 * @module
 */

export const SORT_KEYS = ['title', 'author', 'year'] as const;
export type SortKey = (typeof SORT_KEYS)[number];

export const SORT_ORDERS = ['asc', 'desc'] as const;
export type SortOrder = (typeof SORT_ORDERS)[number];

export interface ListingCriteria {
  search: string;
  sort: SortKey;
  order: SortOrder;
}

export interface ListingRow {
  id: number;
  isbn: string;
  title: string;
  year: number;
  cover: string;
  author: string;
}

function isSortKey(value: string): value is SortKey {
  return SORT_KEYS.some((key) => key === value);
}

function isSortOrder(value: string): value is SortOrder {
  return SORT_ORDERS.some((order) => order === value);
}

export function parseListingCriteria(input: {
  search?: string | null;
  sort?: string | null;
  order?: string | null;
}): ListingCriteria {
  const sort = (input.sort ?? '').trim().toLowerCase();
  const order = (input.order ?? '').trim().toLowerCase();

  return {
    search: (input.search ?? '').trim(),
    sort: isSortKey(sort) ? sort : 'title',
    order: isSortOrder(order) ? order : 'asc',
  };
}
