import { describe, expect, it } from "vitest";
import { parsePagination } from "./pagination";

describe("parsePagination", () => {
    it("defaults to the first page of 50", () => {
        expect(parsePagination(new URLSearchParams())).toEqual({ limit: 50, page: 1, offset: 0 });
    });

    it("prefers offset over page", () => {
        expect(parsePagination(new URLSearchParams("limit=10&offset=25&page=9"))).toEqual({
            limit: 10,
            page: 3,
            offset: 25,
        });
    });

    it("derives the offset from the page", () => {
        expect(parsePagination(new URLSearchParams("limit=20&page=3"))).toEqual({
            limit: 20,
            page: 3,
            offset: 40,
        });
    });

    it("clamps the limit", () => {
        expect(parsePagination(new URLSearchParams("limit=1000")).limit).toBe(200);
        expect(parsePagination(new URLSearchParams("limit=0")).limit).toBe(1);
    });
});
