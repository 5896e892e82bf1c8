import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { silentLogger } from '../src/logger';
import { InMemoryRemoteStore, RemoteRequestError } from '../src/remoteStore';
import { ProfileService } from '../src/services/profileService';
import type { IdentityUser } from '../src/types';

const user: IdentityUser = {
  id: 'user-1',
  email: 'reader@example.com',
  createdAt: '2026-03-01T00:00:00.000Z'
};

describe('profile service', () => {
  let remote: InMemoryRemoteStore;
  let profiles: ProfileService;

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2026-03-10T09:00:00.000Z'));
    remote = new InMemoryRemoteStore();
    profiles = new ProfileService(remote, silentLogger);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('creates the initial row and fetches it', async () => {
    await profiles.create(user);

    const profile = await profiles.fetch('user-1');
    expect(profile).toEqual({
      id: 'user-1',
      email: 'reader@example.com',
      createdAt: '2026-03-10T09:00:00.000Z',
      onboardingCompleted: false,
      streak: 0,
      totalJournalEntries: 0,
      updatedAt: '2026-03-10T09:00:00.000Z'
    });
    expect(profiles.current).toEqual(profile);
  });

  it('throws not found for a missing row but loads defaults for a new identity', async () => {
    await expect(profiles.fetch('user-1')).rejects.toMatchObject({ code: 40402 });

    const loaded = await profiles.load(user);
    expect(loaded).toMatchObject({
      id: 'user-1',
      onboardingCompleted: false,
      streak: 0,
      totalJournalEntries: 0
    });
    expect(loaded.selectedPath).toBeUndefined();
    expect(remote.profiles.get('user-1')).toEqual(loaded);
  });

  it('keeps updates made after loading a profile that had no row', async () => {
    await profiles.load(user);
    await profiles.completeOnboarding();
    await profiles.updateEntryCount(5);

    const reloaded = await new ProfileService(remote, silentLogger).load(user);
    expect(reloaded).toMatchObject({ onboardingCompleted: true, totalJournalEntries: 5 });
  });

  it('rejects an update whose row has gone and keeps the cache', async () => {
    await profiles.load(user);
    const before = profiles.current;
    remote.profiles.delete('user-1');

    await expect(profiles.completeOnboarding()).rejects.toMatchObject({
      kind: 'not_found',
      code: 40402
    });
    expect(profiles.current).toEqual(before);
  });

  it('writes successful updates through to the cached profile', async () => {
    await profiles.create(user);
    await profiles.load(user);
    const seen: Array<string | undefined> = [];
    profiles.subscribe((profile) => seen.push(profile?.selectedPath));

    vi.setSystemTime(new Date('2026-03-10T09:05:00.000Z'));
    await profiles.updatePath('discipline');
    await profiles.updateDisplayName('  Sam  ');
    await profiles.completeOnboarding();
    await profiles.updateEntryCount(3);
    await profiles.updateStreak(2);

    expect(profiles.current).toMatchObject({
      selectedPath: 'discipline',
      displayName: 'Sam',
      onboardingCompleted: true,
      totalJournalEntries: 3,
      streak: 2,
      updatedAt: '2026-03-10T09:05:00.000Z'
    });
    expect(remote.profiles.get('user-1')).toEqual(profiles.current);
    expect(seen).toHaveLength(5);
  });

  it('leaves the cache unchanged when the remote update fails', async () => {
    await profiles.create(user);
    await profiles.load(user);
    const before = profiles.current;
    vi.spyOn(remote, 'updateProfile').mockRejectedValueOnce(
      new RemoteRequestError('fetch failed')
    );

    await expect(profiles.updatePath('confidence')).rejects.toMatchObject({
      kind: 'transport',
      code: 50201,
      message: 'update path failed'
    });
    expect(profiles.current).toEqual(before);
  });

  it('validates counters and names before any remote call', async () => {
    await profiles.load(user);
    const update = vi.spyOn(remote, 'updateProfile');

    await expect(profiles.updateEntryCount(-1)).rejects.toMatchObject({ kind: 'validation' });
    await expect(profiles.updateStreak(1.5)).rejects.toMatchObject({ kind: 'validation' });
    await expect(profiles.updateDisplayName('   ')).rejects.toMatchObject({
      message: 'Display name cannot be empty'
    });
    expect(update).not.toHaveBeenCalled();
  });

  it('requires a loaded profile for updates', async () => {
    await expect(profiles.completeOnboarding()).rejects.toMatchObject({
      kind: 'unauthenticated'
    });
  });
});
