import { z } from 'zod';
import type { KeyValueStore } from './localStore';
import type { Logger } from './logger';
import type { AuthSession } from './types';
import { now } from './utils';

export const SESSION_KEY = 'obex_auth_session';

const storedSessionSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1),
  expires_at: z.string().refine((value) => !Number.isNaN(Date.parse(value)))
});

/**
 * Holds the one persisted session. A corrupt or expired value reads as no
 * session; nothing here talks to the network.
 */
export class SessionStore {
  constructor(
    private readonly store: KeyValueStore,
    private readonly logger: Logger
  ) {}

  async load(): Promise<AuthSession | undefined> {
    const raw = await this.store.getValue(SESSION_KEY);
    if (raw === undefined) {
      return undefined;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      this.logger.warn('stored session is not valid JSON, ignoring it');
      return undefined;
    }
    const result = storedSessionSchema.safeParse(parsed);
    if (!result.success) {
      this.logger.warn('stored session has an unexpected shape, ignoring it');
      return undefined;
    }
    if (Date.parse(result.data.expires_at) <= now()) {
      this.logger.debug('stored session has expired');
      return undefined;
    }
    return {
      accessToken: result.data.access_token,
      refreshToken: result.data.refresh_token,
      expiresAt: result.data.expires_at
    };
  }

  async save(session: AuthSession): Promise<void> {
    await this.store.setValue(
      SESSION_KEY,
      JSON.stringify({
        access_token: session.accessToken,
        refresh_token: session.refreshToken,
        expires_at: session.expiresAt
      })
    );
  }

  async clear(): Promise<void> {
    await this.store.deleteValue(SESSION_KEY);
  }
}
