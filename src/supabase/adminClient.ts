import { createClient, type SupabaseClient } from '@supabase/supabase-js';

type GenericRelationship = {
  foreignKeyName: string;
  columns: string[];
  isOneToOne?: boolean;
  referencedRelation: string;
  referencedColumns: string[];
};

type GenericTable = {
  Row: Record<string, unknown>;
  Insert: Record<string, unknown>;
  Update: Record<string, unknown>;
  Relationships: GenericRelationship[];
};

type GenericNonUpdatableView = {
  Row: Record<string, unknown>;
  Relationships: GenericRelationship[];
};

type GenericUpdatableView = {
  Row: Record<string, unknown>;
  Insert: Record<string, unknown>;
  Update: Record<string, unknown>;
  Relationships: GenericRelationship[];
};

type GenericView = GenericUpdatableView | GenericNonUpdatableView;

type GenericFunction = {
  Args: Record<string, unknown> | never;
  Returns: unknown;
  SetofOptions?: {
    isSetofReturn?: boolean;
    isOneToOne?: boolean;
    isNotNullable?: boolean;
    to: string;
    from: string;
  };
};

type GenericSchema = {
  Tables: Record<string, GenericTable>;
  Views: Record<string, GenericView>;
  Functions: Record<string, GenericFunction>;
};

type GenericSupabaseSchema = {
  public: GenericSchema & {
    Enums: Record<string, string>;
    CompositeTypes: Record<string, unknown>;
  };
};

export type SupabaseAdminClient = SupabaseClient<
  GenericSupabaseSchema,
  'public'
>;

export const SUPABASE_ADMIN_CLIENT = 'SUPABASE_ADMIN_CLIENT';

/**
 * サービスロールキーで接続する管理クライアント。
 * サーバー側でのみ使用し、セッションは自前の session テーブルで管理するため
 * Supabase Auth のトークン更新・永続化は無効にする。
 */
export const createAdminSupabaseClient = (
  url: string,
  serviceKey: string,
): SupabaseAdminClient => {
  if (!url) {
    throw new Error('SUPABASE_URL is not set.');
  }
  if (!serviceKey) {
    throw new Error('SUPABASE_SERVICE_ROLE_KEY is not set.');
  }
  return createClient<GenericSupabaseSchema, 'public'>(url, serviceKey, {
    auth: { autoRefreshToken: false, persistSession: false },
  });
};

/** Postgres の一意制約違反 (unique_violation) */
export const UNIQUE_VIOLATION = '23505';

export const isUniqueViolation = (error: { code?: string } | null): boolean =>
  error?.code === UNIQUE_VIOLATION;
