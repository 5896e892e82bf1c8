import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { RemoteRequestError } from '../src/remoteStore';
import {
  ANALYSIS_ADVISORY,
  computeStreak,
  EMPTY_FILTERS,
  filterEntries,
  formatExport,
  SYNC_ADVISORY
} from '../src/services/journalService';
import { buildTestApp, makeEntry, type TestApp } from './support';

const analysisReply = JSON.stringify({
  summary: 'Steady progress.',
  insights: ['Keep the routine'],
  reflection: 'What kept you going?',
  mood: 8,
  suggestedTags: ['routine', 'focus']
});

describe('journal service', () => {
  let ctx: TestApp;

  beforeEach(async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2026-03-10T09:00:00.000Z'));
    ctx = buildTestApp();
    await ctx.app.start();
    await ctx.app.auth.signUp('writer@example.com', 'test-secret');
  });

  afterEach(async () => {
    await ctx.app.stop();
    vi.useRealTimers();
  });

  it('saves, analyzes and syncs a new entry', async () => {
    ctx.transport.queue(analysisReply);
    const journal = ctx.app.journals;

    const result = await journal.createEntry({
      content: 'Finished the draft.',
      tags: ['focus', 'writing']
    });
    await result.sync.done;

    expect(result.advisory).toBeUndefined();
    expect(result.entry).toMatchObject({
      content: 'Finished the draft.',
      userPath: 'clarity',
      aiSummary: 'Steady progress.',
      aiReflection: 'What kept you going?',
      aiInsights: ['Keep the routine'],
      tags: ['focus', 'writing', 'routine'],
      mood: 8
    });
    expect(ctx.remote.entries.get(result.entry.id)?.tags).toBe('focus,writing,routine');
    expect((await ctx.local.get(result.entry.id))?.syncStatus).toBe('synced');
    expect(journal.getState()).toMatchObject({ phase: 'idle', lastAnalysis: { mood: 8 } });
  });

  it('never overwrites the mood the user gave', async () => {
    ctx.transport.queue(analysisReply);

    const { entry } = await ctx.app.journals.createEntry({ content: 'Tired.', mood: 3 });

    expect(entry.mood).toBe(3);
    expect(ctx.transport.requests[0].messages[1].content).toContain(
      "User's self-reported mood: 3/10"
    );
  });

  it('keeps the entry when analysis fails', async () => {
    ctx.transport.queue(new Error('socket hang up'));
    const journal = ctx.app.journals;

    const result = await journal.createEntry({ content: 'Offline thoughts.' });

    expect(result.advisory).toBe(
      `${ANALYSIS_ADVISORY}: Network connection error. Please try again.`
    );
    expect(result.analysis).toBeUndefined();
    const stored = await ctx.local.get(result.entry.id);
    expect(stored?.content).toBe('Offline thoughts.');
    expect(stored?.aiSummary).toBeUndefined();
    expect(journal.getState().entries).toHaveLength(1);
    expect(journal.getState().errorMessage).toBe(result.advisory);
  });

  it('skips analysis when asked', async () => {
    const result = await ctx.app.journals.createEntry({
      content: 'Quick note.',
      withAnalysis: false
    });
    expect(result.advisory).toBeUndefined();
    expect(ctx.transport.requests).toHaveLength(0);
  });

  it('passes the three latest entries as context', async () => {
    const journal = ctx.app.journals;
    for (const content of ['one', 'two', 'three', 'four']) {
      vi.setSystemTime(new Date(Date.now() + 60_000));
      await journal.createEntry({ content, withAnalysis: false });
    }
    ctx.transport.queue(analysisReply);

    await journal.createEntry({ content: 'five' });

    const prompt = ctx.transport.requests[0].messages[1].content;
    expect(prompt).toContain('\nEntry 1: four...\nEntry 2: three...\nEntry 3: two...');
    expect(prompt).not.toContain('Entry 4');
  });

  it('increments the entry counter once the handle settles', async () => {
    const { counter } = await ctx.app.journals.createEntry({
      content: 'Counted.',
      withAnalysis: false
    });

    const outcome = await counter.done;

    expect(outcome.ok).toBe(true);
    expect(ctx.app.profiles.current?.totalJournalEntries).toBe(1);
    expect([...ctx.remote.profiles.values()][0]?.totalJournalEntries).toBe(1);
  });

  it('records a sync advisory but keeps the entry pending when the push fails', async () => {
    vi.spyOn(ctx.remote, 'upsertEntry').mockRejectedValueOnce(
      new RemoteRequestError('fetch failed')
    );

    const { entry, sync } = await ctx.app.journals.createEntry({
      content: 'No signal.',
      withAnalysis: false
    });
    const outcome = await sync.done;

    expect(outcome).toMatchObject({ ok: true, value: { status: 'failed' } });
    expect((await ctx.local.get(entry.id))?.syncStatus).toBe('pending');
    expect(ctx.app.journals.getState().errorMessage).toBe(SYNC_ADVISORY);

    const batch = await ctx.app.journals.syncPending();
    expect(batch).toEqual({ synced: 1, failed: 0, skipped: 0, stale: 0 });
    expect((await ctx.local.get(entry.id))?.syncStatus).toBe('synced');
  });

  it('rejects a mood outside 1 to 10 before writing', async () => {
    await expect(
      ctx.app.journals.createEntry({ content: 'Bad mood value.', mood: 11 })
    ).rejects.toMatchObject({ kind: 'validation', code: 42201 });
    expect(ctx.local.entries.size).toBe(0);
  });

  it('updates an entry and pushes the change', async () => {
    const journal = ctx.app.journals;
    const { entry, sync } = await journal.createEntry({
      content: 'First take.',
      title: 'Draft',
      mood: 4,
      withAnalysis: false
    });
    await sync.done;

    vi.setSystemTime(new Date('2026-03-10T09:30:00.000Z'));
    const updated = await journal.updateEntry(entry.id, {
      content: 'Second take.',
      title: null,
      tags: [' calm ', 'calm'],
      mood: null
    });
    await updated.sync.done;

    expect(updated.entry).toMatchObject({
      content: 'Second take.',
      tags: ['calm'],
      updatedAt: '2026-03-10T09:30:00.000Z'
    });
    expect(updated.entry.title).toBeUndefined();
    expect(updated.entry.mood).toBeUndefined();
    expect(ctx.remote.entries.get(entry.id)).toMatchObject({
      content: 'Second take.',
      title: null,
      mood: null,
      tags: 'calm'
    });
  });

  it('stores voice note fields given on create and update', async () => {
    const journal = ctx.app.journals;
    const { entry, sync } = await journal.createEntry({
      content: 'Recorded on the walk.',
      voiceNoteUrl: 'https://files.example.com/walk.m4a',
      voiceTranscript: ' Recorded on the walk. ',
      withAnalysis: false
    });
    await sync.done;

    expect(entry).toMatchObject({
      voiceNoteUrl: 'https://files.example.com/walk.m4a',
      voiceTranscript: 'Recorded on the walk.'
    });
    expect(ctx.remote.entries.get(entry.id)).toMatchObject({
      voice_note_url: 'https://files.example.com/walk.m4a',
      voice_transcript: 'Recorded on the walk.'
    });

    const updated = await journal.updateEntry(entry.id, { voiceTranscript: null });
    await updated.sync.done;

    expect(updated.entry.voiceTranscript).toBeUndefined();
    expect(ctx.remote.entries.get(entry.id)?.voice_transcript).toBeNull();
  });

  it('uploads a voice note under the owner and links it to the entry', async () => {
    const journal = ctx.app.journals;
    const { entry } = await journal.createEntry({ content: 'Say it aloud.', withAnalysis: false });
    await ctx.app.tasks.drain();
    const audio = new Uint8Array([1, 2, 3]);

    const { entry: linked, sync } = await journal.uploadVoiceNote(entry.id, audio);
    await sync.done;

    const path = `${journal.userId}/voice_notes/${entry.id}.m4a`;
    expect(ctx.voiceNotes.files.get(path)).toBe(audio);
    expect(linked.voiceNoteUrl).toBe(`memory://voice-notes/${path}`);
    expect((await ctx.remote.selectEntry(entry.id))?.voiceNoteUrl).toBe(
      `memory://voice-notes/${path}`
    );
  });

  it('keeps the entry unchanged when the voice note upload fails', async () => {
    const journal = ctx.app.journals;
    const { entry } = await journal.createEntry({ content: 'Mic check.', withAnalysis: false });
    vi.spyOn(ctx.voiceNotes, 'upload').mockRejectedValueOnce(new Error('bucket not found'));

    await expect(journal.uploadVoiceNote(entry.id, new Uint8Array([1]))).rejects.toMatchObject({
      kind: 'transport',
      message: 'upload voice note failed'
    });
    await expect(journal.uploadVoiceNote(entry.id, new Uint8Array())).rejects.toMatchObject({
      kind: 'validation'
    });
    expect((await ctx.local.get(entry.id))?.voiceNoteUrl).toBeUndefined();
  });

  it('deletes an entry and floors the counter at zero', async () => {
    const journal = ctx.app.journals;
    const { entry } = await journal.createEntry({ content: 'Gone soon.', withAnalysis: false });
    await ctx.app.tasks.drain();
    await ctx.app.profiles.updateEntryCount(0);

    const { counter } = await journal.deleteEntry(entry.id);
    await counter.done;

    expect(await ctx.local.get(entry.id)).toBeUndefined();
    expect(ctx.app.profiles.current?.totalJournalEntries).toBe(0);
    expect(journal.getState().entries).toEqual([]);
  });

  it('reports unknown entries as not found', async () => {
    await expect(ctx.app.journals.deleteEntry('missing')).rejects.toMatchObject({
      kind: 'not_found',
      code: 40401
    });
    await expect(ctx.app.journals.updateEntry('missing', { content: 'x' })).rejects.toMatchObject(
      { kind: 'not_found' }
    );
  });

  it('filters by path, privacy, search, tags and mood together', async () => {
    const journal = ctx.app.journals;
    const seed = [
      { content: 'Quiet morning', path: 'clarity' as const, isPrivate: true, mood: 7 },
      { content: 'Public clarity', path: 'clarity' as const, isPrivate: false, mood: 7 },
      { content: 'Private grit', path: 'discipline' as const, isPrivate: true, mood: 5 }
    ];
    for (const input of seed) {
      await journal.createEntry({ ...input, tags: ['daily'], withAnalysis: false });
    }

    const filtered = journal.setFilters({ path: 'clarity', privateOnly: true });
    expect(filtered.map((entry) => entry.content)).toEqual(['Quiet morning']);

    journal.clearFilters();
    expect(journal.getState().filteredEntries).toHaveLength(3);
    expect(journal.getState().filters).toEqual({
      ...EMPTY_FILTERS,
      path: undefined,
      moodRange: undefined
    });

    expect(() => journal.setFilters({ moodRange: { min: 8, max: 2 } })).toThrow(
      'Mood range minimum exceeds its maximum'
    );
  });

  it('derives tags, day groups, word count and export', async () => {
    const journal = ctx.app.journals;
    await journal.createEntry({
      content: 'Two words',
      tags: ['zen', 'alpha'],
      withAnalysis: false
    });
    vi.setSystemTime(new Date('2026-03-11T09:00:00.000Z'));
    await journal.createEntry({
      content: 'Three more words',
      tags: ['alpha'],
      withAnalysis: false
    });

    expect(journal.availableTags).toEqual(['alpha', 'zen']);
    expect(journal.totalWordCount).toBe(5);
    expect(journal.entriesByDate.map((group) => [group.date, group.entries.length])).toEqual([
      ['2026-03-11', 1],
      ['2026-03-10', 1]
    ]);
    expect(journal.currentStreak()).toBe(2);
    expect(journal.exportEntries().split('\n').slice(0, 4)).toEqual([
      'Obex Journal Export',
      'Generated: 2026-03-11T09:00:00.000Z',
      'Total Entries: 2',
      'Total Words: 5'
    ]);
  });

  it('writes the computed streak to the profile', async () => {
    await ctx.app.journals.createEntry({ content: 'Today.', withAnalysis: false });
    const profile = await ctx.app.journals.refreshStreak();
    expect(profile.streak).toBe(1);
  });

  it('turns reflection and mood failures into an advisory', async () => {
    ctx.transport.queue(new Error('socket hang up'), '9');
    const journal = ctx.app.journals;

    expect(await journal.generateReflection('Stuck again.')).toBeUndefined();
    expect(journal.getState().errorMessage).toBe('Network connection error. Please try again.');
    expect(await journal.analyzeMood('Great day!')).toBe(9);
  });

  it('refuses journal work after sign-out', async () => {
    const journal = ctx.app.journals;
    await ctx.app.signOut();

    await expect(journal.createEntry({ content: 'Too late.' })).rejects.toMatchObject({
      kind: 'unauthenticated'
    });
    expect(() => ctx.app.journals).toThrow('Sign in to continue');
  });
});

describe('streaks', () => {
  const today = Date.parse('2026-03-10T15:00:00.000Z');
  const on = (date: string) => makeEntry({ id: date, date: `${date}T12:00:00.000Z` });

  it('counts consecutive days ending today', () => {
    const entries = [on('2026-03-10'), on('2026-03-09'), on('2026-03-08'), on('2026-03-06')];
    expect(computeStreak(entries, today)).toBe(3);
  });

  it('counts several entries on one day once', () => {
    const entries = [on('2026-03-10'), makeEntry({ id: 'x', date: '2026-03-10T01:00:00.000Z' })];
    expect(computeStreak(entries, today)).toBe(1);
  });

  it('is zero without an entry today', () => {
    expect(computeStreak([on('2026-03-09'), on('2026-03-08')], today)).toBe(0);
    expect(computeStreak([], today)).toBe(0);
  });
});

describe('entry filters', () => {
  const entries = [
    makeEntry({ id: 'low', mood: 3, tags: ['work'], title: 'Deadline' }),
    makeEntry({ id: 'edge', mood: 5, tags: ['Home'] }),
    makeEntry({ id: 'high', mood: 9, content: 'Gym PR', userPath: 'discipline' }),
    makeEntry({ id: 'none', tags: ['work'] })
  ];

  it('includes both ends of the mood range and drops entries without mood', () => {
    const result = filterEntries(entries, { ...EMPTY_FILTERS, moodRange: { min: 3, max: 5 } });
    expect(result.map((entry) => entry.id)).toEqual(['low', 'edge']);
  });

  it('searches title, content and tags without case', () => {
    const search = (searchText: string) =>
      filterEntries(entries, { ...EMPTY_FILTERS, searchText }).map((entry) => entry.id);
    expect(search('deadline')).toEqual(['low']);
    expect(search('gym pr')).toEqual(['high']);
    expect(search('home')).toEqual(['edge']);
  });

  it('matches the search text as typed, surrounding spaces included', () => {
    const search = (searchText: string) =>
      filterEntries(entries, { ...EMPTY_FILTERS, searchText }).map((entry) => entry.id);
    expect(search(' pr')).toEqual(['high']);
    expect(search(' gym')).toEqual([]);
  });

  it('matches any selected tag', () => {
    const result = filterEntries(entries, { ...EMPTY_FILTERS, tags: ['work', 'Home'] });
    expect(result.map((entry) => entry.id)).toEqual(['low', 'edge', 'none']);
  });
});

describe('export format', () => {
  it('lists entries oldest first with their details', () => {
    const text = formatExport(
      [
        makeEntry({
          id: 'new',
          date: '2026-03-11T08:00:00.000Z',
          content: 'Later entry',
          userPath: 'discipline',
          title: 'Push',
          mood: 8,
          tags: ['gym', 'legs'],
          aiSummary: 'Strong session.'
        }),
        makeEntry({ id: 'old', date: '2026-03-09T08:00:00.000Z', content: 'Earlier entry' })
      ],
      Date.parse('2026-03-12T00:00:00.000Z')
    );

    expect(text.split('\n')).toEqual([
      'Obex Journal Export',
      'Generated: 2026-03-12T00:00:00.000Z',
      'Total Entries: 2',
      'Total Words: 4',
      '',
      '---',
      'Date: Mar 9, 2026',
      'Path: Clarity',
      '',
      'Earlier entry',
      '',
      '---',
      'Date: Mar 11, 2026',
      'Path: Discipline',
      'Title: Push',
      'Mood: 8/10',
      'Tags: gym, legs',
      '',
      'Later entry',
      '',
      'AI Summary: Strong session.',
      ''
    ]);
  });
});
