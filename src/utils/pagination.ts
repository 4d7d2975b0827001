import type { Paginated } from '../shared/types.js';
import type { PageRequest } from '../services/chat-store.js';

export const DEFAULT_PAGE_SIZE = 50;
export const MAX_PAGE_SIZE = 100;

export function pageRequest(page: number, pageSize: number): PageRequest {
  return { offset: (page - 1) * pageSize, limit: pageSize };
}

export function paginated<T>(items: T[], total: number, page: number, pageSize: number): Paginated<T> {
  return { items, total, page, page_size: pageSize, has_more: page * pageSize < total };
}
