import {
  AppError,
  notFound,
  toUserMessage,
  transportError,
  unauthenticated,
  validationError
} from '../errors';
import type { EntryStore } from '../localStore';
import type { Logger } from '../logger';
import { PATH_PROFILES } from '../paths';
import type { BackgroundTasks, TaskHandle } from '../tasks';
import type {
  AnalysisResult,
  EntryFilters,
  JournalEntry,
  JournalEntryPatch,
  SyncBatchResult,
  UserPath,
  UserProfile
} from '../types';
import { addDays, dateKey, isMood, newId, normalizeList, now, toIso, wordCount } from '../utils';
import { voiceNotePath, type VoiceNoteStore } from '../voiceNotes';
import type { AiService } from './aiService';
import type { ProfileService } from './profileService';
import type { PushResult, SyncService } from './syncService';

export type EntryPhase =
  | 'idle'
  | 'writing_local'
  | 'analyzing'
  | 'persisting_analysis'
  | 'syncing';

export interface JournalState {
  entries: JournalEntry[];
  filteredEntries: JournalEntry[];
  filters: EntryFilters;
  phase: EntryPhase;
  isLoading: boolean;
  errorMessage?: string;
  lastAnalysis?: AnalysisResult;
}

export interface CreateEntryInput {
  content: string;
  title?: string;
  mood?: number;
  tags?: string[];
  isPrivate?: boolean;
  path?: UserPath;
  voiceNoteUrl?: string;
  voiceTranscript?: string;
  withAnalysis?: boolean;
}

export interface UpdateEntryInput {
  title?: string | null;
  content?: string;
  mood?: number | null;
  tags?: string[];
  isPrivate?: boolean;
  voiceNoteUrl?: string | null;
  voiceTranscript?: string | null;
}

export interface CreateEntryResult {
  entry: JournalEntry;
  analysis?: AnalysisResult;
  /** Set when the entry was saved but a later step did not complete. */
  advisory?: string;
  sync: TaskHandle<PushResult>;
  counter: TaskHandle<UserProfile>;
}

export interface UpdateEntryResult {
  entry: JournalEntry;
  sync: TaskHandle<PushResult>;
}

export interface DeleteEntryResult {
  counter: TaskHandle<UserProfile>;
}

export const EMPTY_FILTERS: EntryFilters = { privateOnly: false, searchText: '', tags: [] };

const DEFAULT_PATH: UserPath = 'clarity';
const RECENT_CONTEXT_ENTRIES = 3;

export const ANALYSIS_ADVISORY = 'Entry saved, but AI analysis failed';
export const SYNC_ADVISORY = 'Entry saved locally, but cloud sync failed';
export const COUNTER_ADVISORY = 'Entry saved, but your profile could not be updated';

type JournalListener = (state: JournalState) => void;

export function filterEntries(entries: JournalEntry[], filters: EntryFilters): JournalEntry[] {
  const search = filters.searchText.toLowerCase();
  return entries.filter((entry) => {
    if (filters.path && entry.userPath !== filters.path) {
      return false;
    }
    if (filters.privateOnly && !entry.isPrivate) {
      return false;
    }
    if (search) {
      const haystack = [entry.title ?? '', entry.content, ...entry.tags].map((value) =>
        value.toLowerCase()
      );
      if (!haystack.some((value) => value.includes(search))) {
        return false;
      }
    }
    if (filters.tags.length > 0 && !entry.tags.some((tag) => filters.tags.includes(tag))) {
      return false;
    }
    if (filters.moodRange) {
      if (entry.mood === undefined) {
        return false;
      }
      if (entry.mood < filters.moodRange.min || entry.mood > filters.moodRange.max) {
        return false;
      }
    }
    return true;
  });
}

/**
 * Consecutive calendar days (UTC) with at least one entry, counting back
 * from today. No entry today means no streak.
 */
export function computeStreak(entries: JournalEntry[], today: number = now()): number {
  const days = new Set(entries.map((entry) => dateKey(entry.date)));
  let cursor = dateKey(today);
  let streak = 0;
  while (days.has(cursor)) {
    streak += 1;
    cursor = addDays(cursor, -1);
  }
  return streak;
}

const exportDateFormat = new Intl.DateTimeFormat('en-US', {
  dateStyle: 'medium',
  timeZone: 'UTC'
});

export function formatExport(entries: JournalEntry[], generatedAt: number = now()): string {
  const totalWords = entries.reduce((sum, entry) => sum + wordCount(entry.content), 0);
  const lines = [
    'Obex Journal Export',
    `Generated: ${toIso(generatedAt)}`,
    `Total Entries: ${entries.length}`,
    `Total Words: ${totalWords}`,
    ''
  ];
  const oldestFirst = [...entries].sort((a, b) => a.date.localeCompare(b.date));
  for (const entry of oldestFirst) {
    lines.push('---');
    lines.push(`Date: ${exportDateFormat.format(new Date(entry.date))}`);
    lines.push(`Path: ${PATH_PROFILES[entry.userPath].displayName}`);
    if (entry.title) {
      lines.push(`Title: ${entry.title}`);
    }
    if (entry.mood !== undefined) {
      lines.push(`Mood: ${entry.mood}/10`);
    }
    if (entry.tags.length > 0) {
      lines.push(`Tags: ${entry.tags.join(', ')}`);
    }
    lines.push('', entry.content);
    if (entry.aiSummary) {
      lines.push('', `AI Summary: ${entry.aiSummary}`);
    }
    lines.push('');
  }
  return lines.join('\n');
}

/**
 * Journal operations for one signed-in user. Entries are written locally
 * first; analysis, remote sync and profile counters follow and never undo a
 * saved entry.
 */
export class JournalService {
  private state: JournalState = {
    entries: [],
    filteredEntries: [],
    filters: { ...EMPTY_FILTERS },
    phase: 'idle',
    isLoading: false
  };
  private readonly listeners = new Set<JournalListener>();
  private disposed = false;

  constructor(
    readonly userId: string,
    private readonly deps: {
      entries: EntryStore;
      profiles: ProfileService;
      sync: SyncService;
      ai: AiService;
      voiceNotes: VoiceNoteStore;
      tasks: BackgroundTasks;
      logger: Logger;
    }
  ) {}

  getState(): JournalState {
    return this.state;
  }

  subscribe(listener: JournalListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  dispose(): void {
    this.disposed = true;
    this.listeners.clear();
  }

  async loadEntries(): Promise<JournalEntry[]> {
    this.requireSession();
    this.setState({ isLoading: true });
    try {
      const entries = await this.deps.entries.list(this.userId);
      this.setState({
        entries,
        filteredEntries: filterEntries(entries, this.state.filters),
        isLoading: false
      });
      return entries;
    } catch (err) {
      this.setState({ isLoading: false, errorMessage: toUserMessage(err) });
      throw err;
    }
  }

  async getEntry(entryId: string): Promise<JournalEntry> {
    this.requireSession();
    return this.ownEntry(entryId);
  }

  async createEntry(input: CreateEntryInput): Promise<CreateEntryResult> {
    const profile = this.requireSession();
    if (input.mood !== undefined && !isMood(input.mood)) {
      throw validationError('Mood must be an integer from 1 to 10', { mood: input.mood });
    }

    const timestamp = toIso(now());
    const path = input.path ?? profile.selectedPath ?? DEFAULT_PATH;
    const draft: JournalEntry = {
      id: newId(),
      userId: this.userId,
      date: timestamp,
      userPath: path,
      title: input.title?.trim() || undefined,
      content: input.content,
      mood: input.mood,
      aiInsights: [],
      voiceNoteUrl: input.voiceNoteUrl?.trim() || undefined,
      voiceTranscript: input.voiceTranscript?.trim() || undefined,
      tags: normalizeList(input.tags ?? []),
      isPrivate: input.isPrivate ?? false,
      createdAt: timestamp,
      updatedAt: timestamp,
      syncStatus: 'pending'
    };
    const recentEntries = this.state.entries
      .slice(0, RECENT_CONTEXT_ENTRIES)
      .map((entry) => entry.content);

    this.setState({ phase: 'writing_local', errorMessage: undefined });
    let entry = draft;
    try {
      await this.deps.entries.create(draft);
    } catch (err) {
      this.setState({ phase: 'idle', errorMessage: toUserMessage(err) });
      throw err;
    }

    let analysis: AnalysisResult | undefined;
    let advisory: string | undefined;
    if (input.withAnalysis ?? true) {
      this.setState({ phase: 'analyzing' });
      try {
        analysis = await this.deps.ai.analyze({
          content: draft.content,
          path,
          recentEntries,
          mood: draft.mood
        });
      } catch (err) {
        advisory = `${ANALYSIS_ADVISORY}: ${toUserMessage(err)}`;
        this.deps.logger.warn({ err, entryId: draft.id }, 'entry analysis failed');
      }
      if (analysis) {
        this.setState({ phase: 'persisting_analysis' });
        try {
          entry = await this.deps.entries.update(draft.id, {
            aiSummary: analysis.summary,
            aiReflection: analysis.reflection,
            aiInsights: normalizeList(analysis.insights),
            tags: normalizeList([...draft.tags, ...analysis.suggestedTags]),
            mood: draft.mood ?? analysis.mood
          });
        } catch (err) {
          this.setState({ phase: 'idle', errorMessage: toUserMessage(err) });
          throw err;
        }
        this.setState({ lastAnalysis: analysis });
      }
    }

    this.setState({ phase: 'syncing' });
    const sync = this.schedulePush(entry.id);
    const counter = this.adjustEntryCount(1);

    if (advisory) {
      this.setState({ errorMessage: advisory });
    }
    await this.refreshQuietly();
    this.setState({ phase: 'idle' });
    this.deps.logger.info({ entryId: entry.id, analyzed: Boolean(analysis) }, 'entry created');
    return { entry, analysis, advisory, sync, counter };
  }

  async updateEntry(entryId: string, input: UpdateEntryInput): Promise<UpdateEntryResult> {
    this.requireSession();
    if (input.mood !== undefined && input.mood !== null && !isMood(input.mood)) {
      throw validationError('Mood must be an integer from 1 to 10', { mood: input.mood });
    }
    await this.ownEntry(entryId);

    const patch: JournalEntryPatch = {};
    if (input.title !== undefined) {
      patch.title = input.title?.trim() || undefined;
    }
    if (input.content !== undefined) {
      patch.content = input.content;
    }
    if (input.mood !== undefined) {
      patch.mood = input.mood ?? undefined;
    }
    if (input.tags !== undefined) {
      patch.tags = normalizeList(input.tags);
    }
    if (input.isPrivate !== undefined) {
      patch.isPrivate = input.isPrivate;
    }
    if (input.voiceNoteUrl !== undefined) {
      patch.voiceNoteUrl = input.voiceNoteUrl?.trim() || undefined;
    }
    if (input.voiceTranscript !== undefined) {
      patch.voiceTranscript = input.voiceTranscript?.trim() || undefined;
    }
    return this.applyPatch(entryId, patch);
  }

  async uploadVoiceNote(entryId: string, audio: Uint8Array): Promise<UpdateEntryResult> {
    this.requireSession();
    if (audio.byteLength === 0) {
      throw validationError('Voice note is empty');
    }
    await this.ownEntry(entryId);

    let url: string;
    try {
      url = await this.deps.voiceNotes.upload(voiceNotePath(this.userId, entryId), audio);
    } catch (err) {
      const error = err instanceof AppError ? err : transportError('upload voice note', err);
      this.deps.logger.warn({ err, entryId }, 'voice note upload failed');
      this.setState({ errorMessage: toUserMessage(error) });
      throw error;
    }
    return this.applyPatch(entryId, { voiceNoteUrl: url });
  }

  async deleteEntry(entryId: string): Promise<DeleteEntryResult> {
    this.requireSession();
    await this.ownEntry(entryId);
    try {
      await this.deps.entries.delete(entryId);
    } catch (err) {
      this.setState({ errorMessage: toUserMessage(err) });
      throw err;
    }
    const counter = this.adjustEntryCount(-1);
    await this.refreshQuietly();
    this.deps.logger.info({ entryId }, 'entry deleted');
    return { counter };
  }

  async syncPending(): Promise<SyncBatchResult> {
    this.requireSession();
    this.setState({ phase: 'syncing' });
    const result = await this.deps.sync.pushAllPending(this.userId);
    this.setState({
      phase: 'idle',
      errorMessage: result.failed > 0 ? SYNC_ADVISORY : this.state.errorMessage
    });
    await this.refreshQuietly();
    return result;
  }

  setFilters(filters: Partial<EntryFilters>): JournalEntry[] {
    const next: EntryFilters = { ...this.state.filters, ...filters };
    if (next.moodRange && next.moodRange.min > next.moodRange.max) {
      throw validationError('Mood range minimum exceeds its maximum', { ...next.moodRange });
    }
    this.setState({
      filters: next,
      filteredEntries: filterEntries(this.state.entries, next)
    });
    return this.state.filteredEntries;
  }

  clearFilters(): JournalEntry[] {
    return this.setFilters({ ...EMPTY_FILTERS, path: undefined, moodRange: undefined });
  }

  get availableTags(): string[] {
    const tags = new Set(this.state.entries.flatMap((entry) => entry.tags));
    return [...tags].sort((a, b) => a.localeCompare(b));
  }

  get entriesByDate(): Array<{ date: string; entries: JournalEntry[] }> {
    const groups = new Map<string, JournalEntry[]>();
    for (const entry of this.state.filteredEntries) {
      const key = dateKey(entry.date);
      groups.set(key, [...(groups.get(key) ?? []), entry]);
    }
    return [...groups.entries()]
      .sort(([a], [b]) => b.localeCompare(a))
      .map(([date, entries]) => ({ date, entries }));
  }

  get totalWordCount(): number {
    return this.state.entries.reduce((sum, entry) => sum + wordCount(entry.content), 0);
  }

  currentStreak(today: number = now()): number {
    return computeStreak(this.state.entries, today);
  }

  async refreshStreak(): Promise<UserProfile> {
    this.requireSession();
    return this.deps.profiles.updateStreak(this.currentStreak());
  }

  exportEntries(): string {
    this.requireSession();
    return formatExport(this.state.entries);
  }

  /** Resolves to undefined and records an advisory when generation fails. */
  async generateReflection(content: string, path?: UserPath): Promise<string | undefined> {
    const profile = this.requireSession();
    const target = path ?? profile.selectedPath ?? DEFAULT_PATH;
    return this.bestEffort('generate reflection', () =>
      this.deps.ai.generateReflection(content, target)
    );
  }

  async analyzeMood(content: string): Promise<number | undefined> {
    this.requireSession();
    return this.bestEffort('analyze mood', () => this.deps.ai.analyzeMood(content));
  }

  private requireSession(): UserProfile {
    const profile = this.deps.profiles.current;
    if (this.disposed || !profile || profile.id !== this.userId) {
      throw unauthenticated();
    }
    return profile;
  }

  private async applyPatch(entryId: string, patch: JournalEntryPatch): Promise<UpdateEntryResult> {
    let entry: JournalEntry;
    try {
      entry = await this.deps.entries.update(entryId, patch);
    } catch (err) {
      this.setState({ errorMessage: toUserMessage(err) });
      throw err;
    }
    const sync = this.schedulePush(entry.id);
    await this.refreshQuietly();
    return { entry, sync };
  }

  private async ownEntry(entryId: string): Promise<JournalEntry> {
    const entry = await this.deps.entries.get(entryId);
    if (!entry || entry.userId !== this.userId) {
      throw notFound('entry', entryId);
    }
    return entry;
  }

  private schedulePush(entryId: string): TaskHandle<PushResult> {
    return this.deps.tasks.run(`sync entry ${entryId}`, async () => {
      const result = await this.deps.sync.push(entryId);
      if (result.status === 'failed') {
        this.setState({ errorMessage: SYNC_ADVISORY });
      }
      return result;
    });
  }

  /**
   * Writes the cached profile counter plus delta, floored at zero. Two
   * devices writing at once can lose an increment.
   */
  private adjustEntryCount(delta: number): TaskHandle<UserProfile> {
    return this.deps.tasks.run('update entry count', async () => {
      const profile = this.requireSession();
      const count = Math.max(0, profile.totalJournalEntries + delta);
      try {
        return await this.deps.profiles.updateEntryCount(count);
      } catch (err) {
        this.setState({ errorMessage: COUNTER_ADVISORY });
        throw err;
      }
    });
  }

  private async bestEffort<T>(operation: string, work: () => Promise<T>): Promise<T | undefined> {
    try {
      return await work();
    } catch (err) {
      this.deps.logger.warn({ err, operation }, 'text generation failed');
      this.setState({ errorMessage: toUserMessage(err) });
      return undefined;
    }
  }

  private async refreshQuietly(): Promise<void> {
    try {
      await this.loadEntries();
    } catch (err) {
      this.deps.logger.warn({ err }, 'entry list could not be refreshed');
    }
  }

  private setState(patch: Partial<JournalState>): void {
    if (this.disposed) {
      return;
    }
    this.state = { ...this.state, ...patch };
    this.listeners.forEach((listener) => listener(this.state));
  }
}
