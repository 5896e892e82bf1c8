import { Pool } from 'pg';
import type { SupabaseClient } from '@supabase/supabase-js';
import type { RemoteKind } from './config';
import {
  applyProfilePatch,
  fromEntryRow,
  fromProfileRow,
  type JournalEntryRow,
  type ProfilePatchRow,
  type ProfileRow
} from './rows';
import type { JournalEntry, UserProfile } from './types';

export const PROFILES_TABLE = 'profiles';
export const ENTRIES_TABLE = 'journal_entries';

export class RemoteRequestError extends Error {
  code?: string;

  constructor(message: string, code?: string) {
    super(message);
    this.name = 'RemoteRequestError';
    this.code = code;
  }
}

export interface RemoteTableStore {
  init(): Promise<void>;
  close(): Promise<void>;

  selectProfile(userId: string): Promise<UserProfile | undefined>;
  insertProfile(row: ProfileRow): Promise<void>;
  /** Resolves false when no row has the id. */
  updateProfile(userId: string, patch: ProfilePatchRow): Promise<boolean>;

  /** Insert-or-replace keyed by entry id. */
  upsertEntry(row: JournalEntryRow): Promise<void>;
  selectEntry(entryId: string): Promise<JournalEntry | undefined>;
}

export class InMemoryRemoteStore implements RemoteTableStore {
  profiles = new Map<string, UserProfile>();
  entries = new Map<string, JournalEntryRow>();

  async init(): Promise<void> {}

  async close(): Promise<void> {}

  async selectProfile(userId: string): Promise<UserProfile | undefined> {
    const profile = this.profiles.get(userId);
    return profile ? { ...profile } : undefined;
  }

  async insertProfile(row: ProfileRow): Promise<void> {
    if (this.profiles.has(row.id)) {
      throw new RemoteRequestError('duplicate key value violates unique constraint', '23505');
    }
    this.profiles.set(row.id, fromProfileRow(row));
  }

  async updateProfile(userId: string, patch: ProfilePatchRow): Promise<boolean> {
    const current = this.profiles.get(userId);
    if (!current) {
      return false;
    }
    this.profiles.set(userId, applyProfilePatch(current, patch));
    return true;
  }

  async upsertEntry(row: JournalEntryRow): Promise<void> {
    this.entries.set(row.id, { ...row });
  }

  async selectEntry(entryId: string): Promise<JournalEntry | undefined> {
    const row = this.entries.get(entryId);
    return row ? fromEntryRow(row) : undefined;
  }
}

export class SupabaseRemoteStore implements RemoteTableStore {
  constructor(private readonly client: SupabaseClient) {}

  async init(): Promise<void> {}

  async close(): Promise<void> {}

  async selectProfile(userId: string): Promise<UserProfile | undefined> {
    const { data, error } = await this.client
      .from(PROFILES_TABLE)
      .select('*')
      .eq('id', userId)
      .maybeSingle();
    if (error) {
      throw new RemoteRequestError(error.message, error.code);
    }
    return data ? fromProfileRow(data) : undefined;
  }

  async insertProfile(row: ProfileRow): Promise<void> {
    const { error } = await this.client.from(PROFILES_TABLE).insert(row);
    if (error) {
      throw new RemoteRequestError(error.message, error.code);
    }
  }

  async updateProfile(userId: string, patch: ProfilePatchRow): Promise<boolean> {
    const { data, error } = await this.client
      .from(PROFILES_TABLE)
      .update(patch)
      .eq('id', userId)
      .select('id');
    if (error) {
      throw new RemoteRequestError(error.message, error.code);
    }
    return data.length > 0;
  }

  async upsertEntry(row: JournalEntryRow): Promise<void> {
    const { error } = await this.client.from(ENTRIES_TABLE).upsert(row, { onConflict: 'id' });
    if (error) {
      throw new RemoteRequestError(error.message, error.code);
    }
  }

  async selectEntry(entryId: string): Promise<JournalEntry | undefined> {
    const { data, error } = await this.client
      .from(ENTRIES_TABLE)
      .select('*')
      .eq('id', entryId)
      .maybeSingle();
    if (error) {
      throw new RemoteRequestError(error.message, error.code);
    }
    return data ? fromEntryRow(data) : undefined;
  }
}

export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
  end(): Promise<void>;
}

const ENTRY_COLUMNS: readonly (keyof JournalEntryRow)[] = [
  'id',
  'user_id',
  'date',
  'user_path',
  'title',
  'content',
  'mood',
  'ai_summary',
  'ai_reflection',
  'ai_insights',
  'voice_note_url',
  'voice_transcript',
  'tags',
  'is_private',
  'created_at',
  'updated_at'
];

export class PostgresRemoteStore implements RemoteTableStore {
  private readonly pool: Queryable;

  constructor(connection: string | Queryable) {
    this.pool =
      typeof connection === 'string' ? new Pool({ connectionString: connection }) : connection;
  }

  async init(): Promise<void> {
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS profiles (
        id TEXT PRIMARY KEY,
        email TEXT NOT NULL,
        selected_path TEXT,
        display_name TEXT,
        onboarding_completed BOOLEAN NOT NULL DEFAULT FALSE,
        streak INT NOT NULL DEFAULT 0,
        total_journal_entries INT NOT NULL DEFAULT 0,
        created_at TIMESTAMPTZ NOT NULL,
        updated_at TIMESTAMPTZ NOT NULL
      );

      CREATE TABLE IF NOT EXISTS journal_entries (
        id TEXT PRIMARY KEY,
        user_id TEXT NOT NULL REFERENCES profiles(id) ON DELETE CASCADE,
        date TIMESTAMPTZ NOT NULL,
        user_path TEXT NOT NULL,
        title TEXT,
        content TEXT NOT NULL,
        mood INT,
        ai_summary TEXT,
        ai_reflection TEXT,
        ai_insights TEXT,
        voice_note_url TEXT,
        voice_transcript TEXT,
        tags TEXT,
        is_private BOOLEAN NOT NULL DEFAULT FALSE,
        created_at TIMESTAMPTZ NOT NULL,
        updated_at TIMESTAMPTZ NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_journal_entries_user_created_at
        ON journal_entries(user_id, created_at);
    `);
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  async selectProfile(userId: string): Promise<UserProfile | undefined> {
    const { rows } = await this.pool.query('SELECT * FROM profiles WHERE id = $1', [userId]);
    const row = rows[0];
    return row ? fromProfileRow(row) : undefined;
  }

  async insertProfile(row: ProfileRow): Promise<void> {
    await this.pool.query(
      `INSERT INTO profiles(id, email, selected_path, display_name, onboarding_completed, streak, total_journal_entries, created_at, updated_at)
       VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9)`,
      [
        row.id,
        row.email,
        row.selected_path,
        row.display_name,
        row.onboarding_completed,
        row.streak,
        row.total_journal_entries,
        row.created_at,
        row.updated_at
      ]
    );
  }

  async updateProfile(userId: string, patch: ProfilePatchRow): Promise<boolean> {
    const entries = Object.entries(patch);
    const assignments = entries.map(([column], index) => `${column} = $${index + 2}`);
    const { rows } = await this.pool.query(
      `UPDATE profiles SET ${assignments.join(', ')} WHERE id = $1 RETURNING id`,
      [userId, ...entries.map(([, value]) => value)]
    );
    return rows.length > 0;
  }

  async upsertEntry(row: JournalEntryRow): Promise<void> {
    const placeholders = ENTRY_COLUMNS.map((_, index) => `$${index + 1}`).join(',');
    const updates = ENTRY_COLUMNS.filter((column) => column !== 'id')
      .map((column) => `${column} = EXCLUDED.${column}`)
      .join(',\n                     ');
    await this.pool.query(
      `INSERT INTO journal_entries(${ENTRY_COLUMNS.join(', ')})
       VALUES (${placeholders})
       ON CONFLICT (id)
       DO UPDATE SET ${updates}`,
      ENTRY_COLUMNS.map((column) => row[column])
    );
  }

  async selectEntry(entryId: string): Promise<JournalEntry | undefined> {
    const { rows } = await this.pool.query('SELECT * FROM journal_entries WHERE id = $1', [
      entryId
    ]);
    const row = rows[0];
    return row ? fromEntryRow(row) : undefined;
  }
}

export function createRemoteStore(params: {
  kind: RemoteKind;
  supabase?: SupabaseClient;
  databaseUrl?: string;
}): RemoteTableStore {
  if (params.kind === 'memory') {
    return new InMemoryRemoteStore();
  }
  if (params.kind === 'postgres') {
    if (!params.databaseUrl) {
      throw new Error('DATABASE_URL is required when using postgres remote store');
    }
    return new PostgresRemoteStore(params.databaseUrl);
  }
  if (!params.supabase) {
    throw new Error(
      'SUPABASE_URL and SUPABASE_ANON_KEY are required for the supabase remote store'
    );
  }
  return new SupabaseRemoteStore(params.supabase);
}
