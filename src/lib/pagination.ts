import type { PaginationMetadata } from '@src/lib/types/api.js';

export const DEFAULT_PAGE_SIZE = 100;
export const MAX_PAGE_SIZE = 1000;

/** Highest page whose offset stays a safe integer at the largest page size */
export const MAX_PAGE = Math.floor(Number.MAX_SAFE_INTEGER / MAX_PAGE_SIZE);

/**
 * Pages are 1-based; anything below 1 (or not an integer) becomes 1,
 * anything past MAX_PAGE becomes MAX_PAGE
 */
export function normalizePage(page: number): number {
    if (!Number.isInteger(page) || page < 1) {
        return 1;
    }
    return Math.min(page, MAX_PAGE);
}

/**
 * Clamp a page size into [1, MAX_PAGE_SIZE]
 */
export function clampPageSize(pageSize: number): number {
    if (!Number.isFinite(pageSize)) {
        return DEFAULT_PAGE_SIZE;
    }
    return Math.min(MAX_PAGE_SIZE, Math.max(1, Math.trunc(pageSize)));
}

export function pageOffset(page: number, pageSize: number): number {
    return (page - 1) * pageSize;
}

/**
 * ceil(totalItems / pageSize) in integer arithmetic
 */
export function totalPages(totalItems: number, pageSize: number): number {
    return Math.floor((totalItems + pageSize - 1) / pageSize);
}

export function buildPagination(totalItems: number, page: number, pageSize: number): PaginationMetadata {
    return {
        total_items: totalItems,
        page,
        page_size: pageSize,
        total_pages: totalPages(totalItems, pageSize),
    };
}
