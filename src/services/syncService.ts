import { AppError, transportError } from '../errors';
import type { EntryStore } from '../localStore';
import type { Logger } from '../logger';
import type { RemoteTableStore } from '../remoteStore';
import { toEntryRow } from '../rows';
import type { JournalEntry, SyncBatchResult } from '../types';

export type PushResult =
  | { status: 'synced'; entryId: string }
  | { status: 'skipped'; entryId: string }
  /** The row was written, but the entry was edited meanwhile and stays pending. */
  | { status: 'stale'; entryId: string }
  | { status: 'failed'; entryId: string; error: AppError };

export class SyncService {
  constructor(
    private readonly entries: EntryStore,
    private readonly remote: RemoteTableStore,
    private readonly logger: Logger
  ) {}

  /** Never rejects; failures are reported in the result and logged. */
  async push(entryOrId: JournalEntry | string): Promise<PushResult> {
    const entryId = typeof entryOrId === 'string' ? entryOrId : entryOrId.id;
    try {
      const entry = await this.entries.get(entryId);
      if (!entry) {
        this.logger.debug({ entryId }, 'entry deleted before sync, skipping');
        return { status: 'skipped', entryId };
      }
      try {
        await this.remote.upsertEntry(toEntryRow(entry));
      } catch (err) {
        throw transportError('sync entry', err);
      }
      const marked = await this.entries.markSynced(entry.id, entry.updatedAt);
      if (!marked) {
        this.logger.debug({ entryId }, 'entry changed during sync, left pending');
        return { status: 'stale', entryId };
      }
      return { status: 'synced', entryId };
    } catch (err) {
      const error = err instanceof AppError ? err : transportError('sync entry', err);
      this.logger.warn({ err, entryId }, 'entry sync failed');
      return { status: 'failed', entryId, error };
    }
  }

  async pushAllPending(userId?: string): Promise<SyncBatchResult> {
    const pending = await this.entries.listPending(userId);
    const result: SyncBatchResult = { synced: 0, failed: 0, skipped: 0, stale: 0 };
    for (const entry of pending) {
      const outcome = await this.push(entry.id);
      result[outcome.status] += 1;
    }
    this.logger.info({ userId, ...result }, 'pending entries pushed');
    return result;
  }
}
