// ============================================================
// Shared safe-error helpers for API routes.
// Ensures no raw provider / DB errors leak to clients.
// Every error response follows { error: string, code: string }.
// ============================================================

import { NextResponse } from "next/server";
import { z } from "zod/v4";
import { AuthError, NotFoundError, StorageError } from "@/lib/errors";

// Stable, machine-readable error codes.
export type ApiErrorCode =
    // Auth
    | "AUTH_REQUIRED"
    | "AUTH_UNAVAILABLE"
    | "FORBIDDEN"
    // Validation
    | "VALIDATION_ERROR"
    // General
    | "INTERNAL_ERROR"
    | "NOT_FOUND"
    | "SERVICE_UNAVAILABLE";

export function safeErrorResponse(
    status: number,
    code: ApiErrorCode,
    error: string,
    extra?: Record<string, unknown>
) {
    return NextResponse.json({ error, code, ...extra }, { status });
}

/**
 * Maps an AuthError to a safe client-facing response.
 * Preserves existing message + status, adds stable code.
 */
export function safeAuthErrorResponse(err: AuthError) {
    const code: ApiErrorCode =
        err.status === 401
            ? "AUTH_REQUIRED"
            : err.status === 403
                ? "FORBIDDEN"
                : "AUTH_UNAVAILABLE";
    return safeErrorResponse(err.status, code, err.message);
}

/** 400 listing every offending field. */
export function safeValidationErrorResponse(err: z.ZodError) {
    const fields = [
        ...new Set(err.issues.map((issue) => issue.path.map(String).join(".") || "body")),
    ];
    return safeErrorResponse(
        400,
        "VALIDATION_ERROR",
        `Validation error: ${err.issues
            .map((issue) => `${issue.path.map(String).join(".") || "body"}: ${issue.message}`)
            .join(", ")}`,
        { fields }
    );
}

/**
 * Shared catch-all for route handlers. `route` is the log tag.
 */
export function safeRouteErrorResponse(route: string, err: unknown) {
    if (err instanceof AuthError) {
        return safeAuthErrorResponse(err);
    }
    if (err instanceof z.ZodError) {
        return safeValidationErrorResponse(err);
    }
    if (err instanceof NotFoundError) {
        return safeErrorResponse(404, "NOT_FOUND", err.message);
    }
    if (err instanceof StorageError) {
        console.error(`[${route}] storage error:`, err.message);
        return safeErrorResponse(503, "SERVICE_UNAVAILABLE", "Storage unavailable. Please try again later.");
    }
    console.error(`[${route}] unexpected error:`, err);
    return safeErrorResponse(500, "INTERNAL_ERROR", "Internal server error");
}

/**
 * Reads a JSON body. A body that is not JSON comes back as null, which
 * the route's schema then rejects as a validation error.
 */
export async function readJsonBody(request: Request): Promise<unknown> {
    try {
        return await request.json();
    } catch {
        return null;
    }
}
