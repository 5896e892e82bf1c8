import { AppError, notFound, transportError, unauthenticated, validationError } from '../errors';
import type { Logger } from '../logger';
import type { RemoteTableStore } from '../remoteStore';
import { fromProfileRow, newProfileRow, type ProfilePatchRow } from '../rows';
import type { IdentityUser, UserPath, UserProfile } from '../types';
import { now, toIso } from '../utils';

type ProfileListener = (profile: UserProfile | undefined) => void;

export class ProfileService {
  private cached?: UserProfile;
  private readonly listeners = new Set<ProfileListener>();

  constructor(
    private readonly remote: RemoteTableStore,
    private readonly logger: Logger
  ) {}

  get current(): UserProfile | undefined {
    return this.cached;
  }

  subscribe(listener: ProfileListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async fetch(userId: string): Promise<UserProfile> {
    const profile = await this.call('fetch profile', () => this.remote.selectProfile(userId));
    if (!profile) {
      throw notFound('profile', userId);
    }
    this.setCurrent(profile);
    return profile;
  }

  async load(user: IdentityUser): Promise<UserProfile> {
    const existing = await this.call('fetch profile', () => this.remote.selectProfile(user.id));
    let profile: UserProfile;
    if (existing) {
      profile = { ...existing, email: user.email || existing.email };
    } else {
      const row = newProfileRow(user, toIso(now()));
      await this.call('create profile', () => this.remote.insertProfile(row));
      this.logger.info({ userId: user.id }, 'created missing profile row');
      profile = fromProfileRow(row);
    }
    this.setCurrent(profile);
    return profile;
  }

  async create(user: IdentityUser): Promise<void> {
    await this.call('create profile', () =>
      this.remote.insertProfile(newProfileRow(user, toIso(now())))
    );
  }

  updatePath(path: UserPath): Promise<UserProfile> {
    const patch = { selected_path: path, updated_at: toIso(now()) };
    return this.update('update path', patch, (draft) => {
      draft.selectedPath = path;
    });
  }

  updateDisplayName(displayName: string): Promise<UserProfile> {
    const trimmed = displayName.trim();
    if (trimmed.length === 0) {
      return Promise.reject(validationError('Display name cannot be empty'));
    }
    const patch = { display_name: trimmed, updated_at: toIso(now()) };
    return this.update('update display name', patch, (draft) => {
      draft.displayName = trimmed;
    });
  }

  completeOnboarding(): Promise<UserProfile> {
    const patch = { onboarding_completed: true, updated_at: toIso(now()) };
    return this.update('complete onboarding', patch, (draft) => {
      draft.onboardingCompleted = true;
    });
  }

  updateStreak(streak: number): Promise<UserProfile> {
    if (!Number.isInteger(streak) || streak < 0) {
      return Promise.reject(validationError('Streak must be a non-negative integer', { streak }));
    }
    const patch = { streak, updated_at: toIso(now()) };
    return this.update('update streak', patch, (draft) => {
      draft.streak = streak;
    });
  }

  updateEntryCount(count: number): Promise<UserProfile> {
    if (!Number.isInteger(count) || count < 0) {
      return Promise.reject(
        validationError('Entry count must be a non-negative integer', { count })
      );
    }
    const patch = { total_journal_entries: count, updated_at: toIso(now()) };
    return this.update('update entry count', patch, (draft) => {
      draft.totalJournalEntries = count;
    });
  }

  clear(): void {
    this.setCurrent(undefined);
  }

  private async update(
    operation: string,
    patch: ProfilePatchRow,
    mutate: (draft: UserProfile) => void
  ): Promise<UserProfile> {
    const current = this.cached;
    if (!current) {
      throw unauthenticated('No profile is loaded');
    }
    const matched = await this.call(operation, () => this.remote.updateProfile(current.id, patch));
    if (!matched) {
      throw notFound('profile', current.id);
    }
    // A sign-out while the call was in flight drops the result.
    const latest = this.cached;
    if (!latest || latest.id !== current.id) {
      return { ...current };
    }
    const next: UserProfile = { ...latest, updatedAt: patch.updated_at };
    mutate(next);
    this.setCurrent(next);
    return next;
  }

  private async call<T>(operation: string, work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (err) {
      if (err instanceof AppError) {
        throw err;
      }
      this.logger.warn({ err, operation }, 'profile request failed');
      throw transportError(operation, err);
    }
  }

  private setCurrent(profile: UserProfile | undefined): void {
    this.cached = profile;
    this.listeners.forEach((listener) => listener(profile));
  }
}
