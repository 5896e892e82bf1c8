import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import { notFound } from './errors';
import type { LocalStoreKind } from './config';
import type { JournalEntry, JournalEntryPatch, SyncStatus, UserPath } from './types';
import { toIso } from './utils';

export interface KeyValueStore {
  getValue(key: string): Promise<string | undefined>;
  setValue(key: string, value: string): Promise<void>;
  deleteValue(key: string): Promise<void>;
}

export interface EntryStore {
  create(entry: JournalEntry): Promise<string>;
  get(entryId: string): Promise<JournalEntry | undefined>;
  list(userId: string): Promise<JournalEntry[]>;
  update(entryId: string, patch: JournalEntryPatch): Promise<JournalEntry>;
  delete(entryId: string): Promise<void>;
  listPending(userId?: string): Promise<JournalEntry[]>;
  /**
   * Marks an entry synced only if it has not changed since the pushed
   * version was read. Returns false when the entry is gone or newer.
   */
  markSynced(entryId: string, pushedUpdatedAt: string): Promise<boolean>;
}

export interface LocalStore extends EntryStore, KeyValueStore {
  init(): Promise<void>;
  close(): Promise<void>;
}

/** updatedAt moves strictly forward and never precedes createdAt. */
function nextUpdatedAt(current: JournalEntry): string {
  const floor = Math.max(Date.parse(current.updatedAt) + 1, Date.parse(current.createdAt));
  return toIso(Math.max(Date.now(), floor));
}

function applyPatch(current: JournalEntry, patch: JournalEntryPatch): JournalEntry {
  return {
    ...current,
    ...patch,
    updatedAt: nextUpdatedAt(current),
    syncStatus: patch.syncStatus ?? 'pending'
  };
}

function byCreatedAtDesc(a: JournalEntry, b: JournalEntry): number {
  return b.createdAt.localeCompare(a.createdAt);
}

export class InMemoryLocalStore implements LocalStore {
  entries = new Map<string, JournalEntry>();
  values = new Map<string, string>();

  async init(): Promise<void> {}

  async close(): Promise<void> {}

  async create(entry: JournalEntry): Promise<string> {
    this.entries.set(entry.id, structuredClone(entry));
    return entry.id;
  }

  async get(entryId: string): Promise<JournalEntry | undefined> {
    const entry = this.entries.get(entryId);
    return entry ? structuredClone(entry) : undefined;
  }

  async list(userId: string): Promise<JournalEntry[]> {
    return [...this.entries.values()]
      .filter((entry) => entry.userId === userId)
      .sort(byCreatedAtDesc)
      .map((entry) => structuredClone(entry));
  }

  async update(entryId: string, patch: JournalEntryPatch): Promise<JournalEntry> {
    const current = this.entries.get(entryId);
    if (!current) {
      throw notFound('entry', entryId);
    }
    const next = applyPatch(current, patch);
    this.entries.set(entryId, next);
    return structuredClone(next);
  }

  async delete(entryId: string): Promise<void> {
    if (!this.entries.delete(entryId)) {
      throw notFound('entry', entryId);
    }
  }

  async listPending(userId?: string): Promise<JournalEntry[]> {
    return [...this.entries.values()]
      .filter((entry) => entry.syncStatus === 'pending')
      .filter((entry) => !userId || entry.userId === userId)
      .sort(byCreatedAtDesc)
      .map((entry) => structuredClone(entry));
  }

  async markSynced(entryId: string, pushedUpdatedAt: string): Promise<boolean> {
    const current = this.entries.get(entryId);
    if (!current || current.updatedAt !== pushedUpdatedAt) {
      return false;
    }
    current.syncStatus = 'synced';
    return true;
  }

  async getValue(key: string): Promise<string | undefined> {
    return this.values.get(key);
  }

  async setValue(key: string, value: string): Promise<void> {
    this.values.set(key, value);
  }

  async deleteValue(key: string): Promise<void> {
    this.values.delete(key);
  }
}

interface LocalEntryRow {
  id: string;
  user_id: string;
  date: string;
  user_path: UserPath;
  title: string | null;
  content: string;
  mood: number | null;
  ai_summary: string | null;
  ai_reflection: string | null;
  ai_insights: string;
  voice_note_url: string | null;
  voice_transcript: string | null;
  tags: string;
  is_private: number;
  created_at: string;
  updated_at: string;
  sync_status: SyncStatus;
}

function parseJsonArray(value: string): string[] {
  try {
    const parsed: unknown = JSON.parse(value);
    if (!Array.isArray(parsed)) {
      return [];
    }
    return parsed.filter((item): item is string => typeof item === 'string');
  } catch {
    return [];
  }
}

function toLocalRow(entry: JournalEntry): LocalEntryRow {
  return {
    id: entry.id,
    user_id: entry.userId,
    date: entry.date,
    user_path: entry.userPath,
    title: entry.title ?? null,
    content: entry.content,
    mood: entry.mood ?? null,
    ai_summary: entry.aiSummary ?? null,
    ai_reflection: entry.aiReflection ?? null,
    ai_insights: JSON.stringify(entry.aiInsights),
    voice_note_url: entry.voiceNoteUrl ?? null,
    voice_transcript: entry.voiceTranscript ?? null,
    tags: JSON.stringify(entry.tags),
    is_private: entry.isPrivate ? 1 : 0,
    created_at: entry.createdAt,
    updated_at: entry.updatedAt,
    sync_status: entry.syncStatus
  };
}

function fromLocalRow(row: LocalEntryRow): JournalEntry {
  return {
    id: row.id,
    userId: row.user_id,
    date: row.date,
    userPath: row.user_path,
    title: row.title ?? undefined,
    content: row.content,
    mood: row.mood ?? undefined,
    aiSummary: row.ai_summary ?? undefined,
    aiReflection: row.ai_reflection ?? undefined,
    aiInsights: parseJsonArray(row.ai_insights),
    voiceNoteUrl: row.voice_note_url ?? undefined,
    voiceTranscript: row.voice_transcript ?? undefined,
    tags: parseJsonArray(row.tags),
    isPrivate: row.is_private === 1,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    syncStatus: row.sync_status
  };
}

const ENTRY_COLUMNS = [
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
  'updated_at',
  'sync_status'
] as const;

export class SqliteLocalStore implements LocalStore {
  private db: Database.Database | null = null;

  constructor(private readonly filename: string) {}

  private get database(): Database.Database {
    if (!this.db) {
      throw new Error('Local store not initialized. Call init() first.');
    }
    return this.db;
  }

  async init(): Promise<void> {
    if (this.db) {
      return;
    }
    if (this.filename !== ':memory:') {
      fs.mkdirSync(path.dirname(path.resolve(this.filename)), { recursive: true });
    }
    const db = new Database(this.filename);
    db.pragma('journal_mode = WAL');
    db.exec(`
      CREATE TABLE IF NOT EXISTS journal_entries (
        id TEXT PRIMARY KEY,
        user_id TEXT NOT NULL,
        date TEXT NOT NULL,
        user_path TEXT NOT NULL,
        title TEXT,
        content TEXT NOT NULL,
        mood INTEGER,
        ai_summary TEXT,
        ai_reflection TEXT,
        ai_insights TEXT NOT NULL DEFAULT '[]',
        voice_note_url TEXT,
        voice_transcript TEXT,
        tags TEXT NOT NULL DEFAULT '[]',
        is_private INTEGER NOT NULL DEFAULT 0,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        sync_status TEXT NOT NULL DEFAULT 'pending'
      );
      CREATE INDEX IF NOT EXISTS idx_journal_entries_user_created
        ON journal_entries(user_id, created_at);
      CREATE INDEX IF NOT EXISTS idx_journal_entries_sync_status
        ON journal_entries(sync_status);

      CREATE TABLE IF NOT EXISTS key_values (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL
      );
    `);
    this.db = db;
  }

  async close(): Promise<void> {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  async create(entry: JournalEntry): Promise<string> {
    const placeholders = ENTRY_COLUMNS.map((column) => `@${column}`).join(', ');
    this.database
      .prepare(`INSERT INTO journal_entries (${ENTRY_COLUMNS.join(', ')}) VALUES (${placeholders})`)
      .run(toLocalRow(entry));
    return entry.id;
  }

  async get(entryId: string): Promise<JournalEntry | undefined> {
    const row = this.selectById(entryId);
    return row ? fromLocalRow(row) : undefined;
  }

  async list(userId: string): Promise<JournalEntry[]> {
    const rows = this.database
      .prepare<[string], LocalEntryRow>(
        'SELECT * FROM journal_entries WHERE user_id = ? ORDER BY created_at DESC'
      )
      .all(userId);
    return rows.map(fromLocalRow);
  }

  async update(entryId: string, patch: JournalEntryPatch): Promise<JournalEntry> {
    const assignments = ENTRY_COLUMNS.filter((column) => column !== 'id')
      .map((column) => `${column} = @${column}`)
      .join(', ');
    const statement = this.database.prepare(
      `UPDATE journal_entries SET ${assignments} WHERE id = @id`
    );
    const apply = this.database.transaction((id: string) => {
      const row = this.selectById(id);
      if (!row) {
        throw notFound('entry', id);
      }
      const next = applyPatch(fromLocalRow(row), patch);
      statement.run(toLocalRow(next));
      return next;
    });
    return apply(entryId);
  }

  async delete(entryId: string): Promise<void> {
    const result = this.database.prepare('DELETE FROM journal_entries WHERE id = ?').run(entryId);
    if (result.changes === 0) {
      throw notFound('entry', entryId);
    }
  }

  async listPending(userId?: string): Promise<JournalEntry[]> {
    const rows = userId
      ? this.database
          .prepare<[string], LocalEntryRow>(
            "SELECT * FROM journal_entries WHERE sync_status = 'pending' AND user_id = ? ORDER BY created_at DESC"
          )
          .all(userId)
      : this.database
          .prepare<[], LocalEntryRow>(
            "SELECT * FROM journal_entries WHERE sync_status = 'pending' ORDER BY created_at DESC"
          )
          .all();
    return rows.map(fromLocalRow);
  }

  async markSynced(entryId: string, pushedUpdatedAt: string): Promise<boolean> {
    const result = this.database
      .prepare(
        "UPDATE journal_entries SET sync_status = 'synced' WHERE id = ? AND updated_at = ?"
      )
      .run(entryId, pushedUpdatedAt);
    return result.changes > 0;
  }

  async getValue(key: string): Promise<string | undefined> {
    const row = this.database
      .prepare<[string], { value: string }>('SELECT value FROM key_values WHERE key = ?')
      .get(key);
    return row?.value;
  }

  async setValue(key: string, value: string): Promise<void> {
    this.database
      .prepare(
        `INSERT INTO key_values (key, value) VALUES (?, ?)
         ON CONFLICT (key) DO UPDATE SET value = excluded.value`
      )
      .run(key, value);
  }

  async deleteValue(key: string): Promise<void> {
    this.database.prepare('DELETE FROM key_values WHERE key = ?').run(key);
  }

  private selectById(entryId: string): LocalEntryRow | undefined {
    return this.database
      .prepare<[string], LocalEntryRow>('SELECT * FROM journal_entries WHERE id = ?')
      .get(entryId);
  }
}

export function createLocalStore(params: { kind: LocalStoreKind; path?: string }): LocalStore {
  if (params.kind === 'memory') {
    return new InMemoryLocalStore();
  }
  if (!params.path) {
    throw new Error('LOCAL_DB_PATH is required when using sqlite local store');
  }
  return new SqliteLocalStore(params.path);
}
