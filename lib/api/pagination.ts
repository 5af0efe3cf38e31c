// ============================================================
// ?limit=&offset= (or ?page=) for list endpoints.
// ============================================================

const DEFAULT_LIMIT = 50;
const MAX_LIMIT = 200;

export interface Pagination {
    limit: number;
    page: number;
    offset: number;
}

export function parsePagination(searchParams: URLSearchParams): Pagination {
    const rawLimit = Number.parseInt(searchParams.get("limit") ?? "", 10);
    const limit = Number.isFinite(rawLimit)
        ? Math.min(Math.max(rawLimit, 1), MAX_LIMIT)
        : DEFAULT_LIMIT;

    const rawOffset = Number.parseInt(searchParams.get("offset") ?? "", 10);
    if (Number.isFinite(rawOffset) && rawOffset >= 0) {
        return { limit, page: Math.floor(rawOffset / limit) + 1, offset: rawOffset };
    }

    const rawPage = Number.parseInt(searchParams.get("page") ?? "", 10);
    const page = Number.isFinite(rawPage) ? Math.max(rawPage, 1) : 1;

    return { limit, page, offset: (page - 1) * limit };
}
