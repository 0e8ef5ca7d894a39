/**
 * Page-based slicing of list responses.
 */

export const DEFAULT_PAGE_SIZE = 25;
export const MAX_PAGE_SIZE = 100;

export interface PaginationQuery {
    /** 1-based */
    page?: number;
    pageSize?: number;
}

export interface PaginationMeta {
    page: number;
    pageSize: number;
    total: number;
    totalPages: number;
}

export interface PaginatedResponse<T> {
    data: T[];
    pagination: PaginationMeta;
}

export interface PaginationProblem {
    field: 'page' | 'pageSize';
    message: string;
    value: string;
}

export interface PaginationReadResult {
    query: Required<PaginationQuery>;
    problems: PaginationProblem[];
}

const INTEGER = /^\d+$/;

/**
 * Read `page` and `pageSize` from a query string. Out-of-range values are
 * reported and replaced by the defaults.
 */
export function readPaginationQuery(query: Record<string, string | undefined>): PaginationReadResult {
    const problems: PaginationProblem[] = [];

    const read = (field: PaginationProblem['field'], fallback: number, max: number, message: string): number => {
        const raw = query[field];
        if (raw === undefined || raw === '') {
            return fallback;
        }
        const value = INTEGER.test(raw) ? Number(raw) : NaN;
        if (!(value >= 1 && value <= max)) {
            problems.push({ field, message, value: raw });
            return fallback;
        }
        return value;
    };

    return {
        query: {
            page: read('page', 1, Number.MAX_SAFE_INTEGER, 'page must be a positive integer'),
            pageSize: read('pageSize', DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE, `pageSize must be between 1 and ${MAX_PAGE_SIZE}`),
        },
        problems,
    };
}

export function paginate<T>(items: readonly T[], { page = 1, pageSize = DEFAULT_PAGE_SIZE }: PaginationQuery): PaginatedResponse<T> {
    const start = (page - 1) * pageSize;
    return {
        data: items.slice(start, start + pageSize),
        pagination: {
            page,
            pageSize,
            total: items.length,
            totalPages: Math.ceil(items.length / pageSize),
        },
    };
}
