import { z } from 'zod';
import {
  USER_PATHS,
  type IdentityUser,
  type JournalEntry,
  type UserPath,
  type UserProfile
} from './types';
import { splitList, toIso } from './utils';

const pathSchema = z.enum(USER_PATHS);

const timestampSchema = z
  .union([
    z.string().refine((value) => !Number.isNaN(Date.parse(value)), 'invalid timestamp'),
    z.date()
  ])
  .transform((value) => (value instanceof Date ? value.toISOString() : toIso(Date.parse(value))));

export const profileRowSchema = z.object({
  id: z.string(),
  email: z.string(),
  selected_path: pathSchema.nullable(),
  display_name: z.string().nullable(),
  onboarding_completed: z.boolean(),
  streak: z.coerce.number().int(),
  total_journal_entries: z.coerce.number().int(),
  created_at: timestampSchema,
  updated_at: timestampSchema
});

export type ProfileRow = z.input<typeof profileRowSchema>;

export const journalEntryRowSchema = z.object({
  id: z.string(),
  user_id: z.string(),
  date: timestampSchema,
  user_path: pathSchema,
  title: z.string().nullable(),
  content: z.string(),
  mood: z.number().int().nullable(),
  ai_summary: z.string().nullable(),
  ai_reflection: z.string().nullable(),
  ai_insights: z.string().nullable(),
  voice_note_url: z.string().nullable(),
  voice_transcript: z.string().nullable(),
  tags: z.string().nullable(),
  is_private: z.boolean(),
  created_at: timestampSchema,
  updated_at: timestampSchema
});

export interface JournalEntryRow {
  id: string;
  user_id: string;
  date: string;
  user_path: UserPath;
  title: string | null;
  content: string;
  mood: number | null;
  ai_summary: string | null;
  ai_reflection: string | null;
  ai_insights: string | null;
  voice_note_url: string | null;
  voice_transcript: string | null;
  tags: string | null;
  is_private: boolean;
  created_at: string;
  updated_at: string;
}

/** The fixed set of partial profile updates; each carries its own updated_at. */
export type ProfilePatchRow =
  | { selected_path: UserPath; updated_at: string }
  | { display_name: string; updated_at: string }
  | { onboarding_completed: boolean; updated_at: string }
  | { streak: number; updated_at: string }
  | { total_journal_entries: number; updated_at: string };

export const INSIGHT_SEPARATOR = '|';
export const TAG_SEPARATOR = ',';

export function toEntryRow(entry: JournalEntry): JournalEntryRow {
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
    ai_insights: entry.aiInsights.length > 0 ? entry.aiInsights.join(INSIGHT_SEPARATOR) : null,
    voice_note_url: entry.voiceNoteUrl ?? null,
    voice_transcript: entry.voiceTranscript ?? null,
    tags: entry.tags.length > 0 ? entry.tags.join(TAG_SEPARATOR) : null,
    is_private: entry.isPrivate,
    created_at: entry.createdAt,
    updated_at: entry.updatedAt
  };
}

export function fromEntryRow(input: unknown): JournalEntry {
  const row = journalEntryRowSchema.parse(input);
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
    aiInsights: splitList(row.ai_insights, INSIGHT_SEPARATOR),
    voiceNoteUrl: row.voice_note_url ?? undefined,
    voiceTranscript: row.voice_transcript ?? undefined,
    tags: splitList(row.tags, TAG_SEPARATOR),
    isPrivate: row.is_private,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    syncStatus: 'synced'
  };
}

export function newProfileRow(user: IdentityUser, timestamp: string): ProfileRow {
  return {
    id: user.id,
    email: user.email,
    selected_path: null,
    display_name: null,
    onboarding_completed: false,
    streak: 0,
    total_journal_entries: 0,
    created_at: timestamp,
    updated_at: timestamp
  };
}

export function fromProfileRow(input: unknown): UserProfile {
  const row = profileRowSchema.parse(input);
  return {
    id: row.id,
    email: row.email,
    createdAt: row.created_at,
    selectedPath: row.selected_path ?? undefined,
    displayName: row.display_name ?? undefined,
    onboardingCompleted: row.onboarding_completed,
    streak: row.streak,
    totalJournalEntries: row.total_journal_entries,
    updatedAt: row.updated_at
  };
}

/** Applies a patch to a profile the same way the remote row would change. */
export function applyProfilePatch(profile: UserProfile, patch: ProfilePatchRow): UserProfile {
  const next: UserProfile = { ...profile, updatedAt: patch.updated_at };
  if ('selected_path' in patch) {
    next.selectedPath = patch.selected_path;
  } else if ('display_name' in patch) {
    next.displayName = patch.display_name;
  } else if ('onboarding_completed' in patch) {
    next.onboardingCompleted = patch.onboarding_completed;
  } else if ('streak' in patch) {
    next.streak = patch.streak;
  } else {
    next.totalJournalEntries = patch.total_journal_entries;
  }
  return next;
}
