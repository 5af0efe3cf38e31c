// ============================================================
// Profiles — one row per auth user: role, status, avatar and
// the hardness index shown on the dashboard.
// ============================================================

import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod/v4";
import { StorageError } from "@/lib/errors";

export const USER_ROLES = ["user", "admin"] as const;

export type UserRole = (typeof USER_ROLES)[number];

export const DEFAULT_HARDNESS_INDEX = 1;

export interface ProfileRecord {
    id: string;
    email: string;
    username: string | null;
    fullName: string | null;
    role: UserRole;
    avatar: string;
    hardnessIndex: number;
    isActive: boolean;
    createdAt: string;
}

export interface ProfilePatch {
    username?: string;
    fullName?: string | null;
    avatar?: string;
    hardnessIndex?: number;
    role?: UserRole;
    isActive?: boolean;
}

export interface ProfilePage {
    profiles: ProfileRecord[];
    total: number;
}

export interface ProfileStore {
    findById(id: string): Promise<ProfileRecord | null>;
    /** Returns null when no profile has that id. */
    update(id: string, patch: ProfilePatch): Promise<ProfileRecord | null>;
    /** Newest first. */
    list(page: { limit: number; offset: number }): Promise<ProfilePage>;
    count(filter?: { activeOnly?: boolean }): Promise<number>;
    /** Deletes the account and everything it owns. False when it did not exist. */
    remove(id: string): Promise<boolean>;
}

// ---- request bodies ------------------------------------------

const NonBlank = z
    .string()
    .max(100)
    .refine((value) => value.trim().length > 0, "must not be empty");

const ProfileFields = {
    username: NonBlank.optional(),
    full_name: z.string().max(200).nullable().optional(),
    avatar: z.string().max(500).optional(),
    hardness_index: z.number().positive().optional(),
};

function hasAnyField(body: Record<string, unknown>): boolean {
    return Object.values(body).some((value) => value !== undefined);
}

export const ProfileUpdateBodySchema = z
    .strictObject(ProfileFields)
    .refine(hasAnyField, "at least one field is required");

export const AdminUserUpdateBodySchema = z
    .strictObject({
        ...ProfileFields,
        role: z.enum(USER_ROLES).optional(),
        is_active: z.boolean().optional(),
    })
    .refine(hasAnyField, "at least one field is required");

export function toProfilePatch(
    body: z.infer<typeof AdminUserUpdateBodySchema>
): ProfilePatch {
    const patch: ProfilePatch = {};
    if (body.username !== undefined) patch.username = body.username;
    if (body.full_name !== undefined) patch.fullName = body.full_name;
    if (body.avatar !== undefined) patch.avatar = body.avatar;
    if (body.hardness_index !== undefined) patch.hardnessIndex = body.hardness_index;
    if (body.role !== undefined) patch.role = body.role;
    if (body.is_active !== undefined) patch.isActive = body.is_active;
    return patch;
}

export function toUserResponse(profile: ProfileRecord) {
    return {
        id: profile.id,
        email: profile.email,
        username: profile.username,
        full_name: profile.fullName,
        role: profile.role,
        avatar: profile.avatar,
        hardness_index: profile.hardnessIndex,
        is_active: profile.isActive,
        created_at: profile.createdAt,
    };
}

// ---- Supabase implementation ---------------------------------

const PROFILE_COLUMNS =
    "id, email, username, full_name, role, avatar, hardness_index, is_active, created_at";

const ProfileRowSchema = z.object({
    id: z.string(),
    email: z.string(),
    username: z.string().nullable(),
    full_name: z.string().nullable(),
    role: z.enum(USER_ROLES),
    avatar: z.string(),
    hardness_index: z.number(),
    is_active: z.boolean(),
    created_at: z.string(),
});

function toRecord(row: unknown): ProfileRecord {
    const parsed = ProfileRowSchema.safeParse(row);
    if (!parsed.success) {
        throw new StorageError("profiles row has an unexpected shape", {
            cause: parsed.error,
        });
    }
    const r = parsed.data;
    return {
        id: r.id,
        email: r.email,
        username: r.username,
        fullName: r.full_name,
        role: r.role,
        avatar: r.avatar,
        hardnessIndex: r.hardness_index,
        isActive: r.is_active,
        createdAt: r.created_at,
    };
}

function toRow(patch: ProfilePatch): Record<string, unknown> {
    const row: Record<string, unknown> = { updated_at: new Date().toISOString() };
    if (patch.username !== undefined) row.username = patch.username;
    if (patch.fullName !== undefined) row.full_name = patch.fullName;
    if (patch.avatar !== undefined) row.avatar = patch.avatar;
    if (patch.hardnessIndex !== undefined) row.hardness_index = patch.hardnessIndex;
    if (patch.role !== undefined) row.role = patch.role;
    if (patch.isActive !== undefined) row.is_active = patch.isActive;
    return row;
}

export class SupabaseProfileStore implements ProfileStore {
    constructor(private readonly supabase: SupabaseClient) {}

    async findById(id: string): Promise<ProfileRecord | null> {
        const { data, error } = await this.supabase
            .from("profiles")
            .select(PROFILE_COLUMNS)
            .eq("id", id)
            .maybeSingle();

        if (error) {
            throw new StorageError(`profiles query failed: ${error.message}`, { cause: error });
        }
        return data ? toRecord(data) : null;
    }

    async update(id: string, patch: ProfilePatch): Promise<ProfileRecord | null> {
        const { data, error } = await this.supabase
            .from("profiles")
            .update(toRow(patch))
            .eq("id", id)
            .select(PROFILE_COLUMNS)
            .maybeSingle();

        if (error) {
            throw new StorageError(`profiles update failed: ${error.message}`, { cause: error });
        }
        return data ? toRecord(data) : null;
    }

    async list(page: { limit: number; offset: number }): Promise<ProfilePage> {
        const { data, error, count } = await this.supabase
            .from("profiles")
            .select(PROFILE_COLUMNS, { count: "exact" })
            .order("created_at", { ascending: false })
            .range(page.offset, page.offset + page.limit - 1);

        if (error) {
            throw new StorageError(`profiles query failed: ${error.message}`, { cause: error });
        }
        return { profiles: (data ?? []).map(toRecord), total: count ?? 0 };
    }

    async count(filter: { activeOnly?: boolean } = {}): Promise<number> {
        let query = this.supabase.from("profiles").select("id", { count: "exact", head: true });
        if (filter.activeOnly) {
            query = query.eq("is_active", true);
        }
        const { count, error } = await query;

        if (error) {
            throw new StorageError(`profiles count failed: ${error.message}`, { cause: error });
        }
        return count ?? 0;
    }

    async remove(id: string): Promise<boolean> {
        // auth.users rows are deleted by a security-definer function that
        // checks the caller is an admin; profile, roadmaps and quiz_stats
        // cascade from there.
        const { data, error } = await this.supabase.rpc("rpc_admin_delete_user", {
            p_user_id: id,
        });

        if (error) {
            throw new StorageError(`user delete failed: ${error.message}`, { cause: error });
        }
        return data === true;
    }
}
