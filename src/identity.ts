import { createClient, type Session, type SupabaseClient, type User } from '@supabase/supabase-js';
import { AuthFailure, type AuthFailureReason } from './errors';
import type { AuthSession, IdentityUser } from './types';
import { newId, now, toIso } from './utils';

export type AuthEvent = 'signed_in' | 'signed_out' | 'token_refreshed';

export interface AuthChange {
  event: AuthEvent;
  session?: AuthSession;
}

export type AuthChangeListener = (change: AuthChange) => void;

export interface SignUpResult {
  user: IdentityUser;
  /** Absent when the provider requires email confirmation first. */
  session?: AuthSession;
}

export interface SignInResult {
  user: IdentityUser;
  session: AuthSession;
}

/** Remote identity provider; every failure surfaces as an {@link AuthFailure}. */
export interface IdentityProvider {
  signUp(email: string, password: string): Promise<SignUpResult>;
  signIn(email: string, password: string): Promise<SignInResult>;
  signOut(): Promise<void>;
  resetPassword(email: string): Promise<void>;
  getUser(): Promise<IdentityUser>;
  setSession(session: AuthSession): Promise<void>;
  onAuthStateChange(listener: AuthChangeListener): () => void;
}

const CODE_REASONS: Record<string, AuthFailureReason> = {
  invalid_credentials: 'invalid_credentials',
  email_not_confirmed: 'email_not_confirmed',
  weak_password: 'weak_password',
  user_already_exists: 'already_registered',
  email_exists: 'already_registered',
  over_request_rate_limit: 'rate_limited',
  over_email_send_rate_limit: 'rate_limited'
};

function readField(error: unknown, field: 'message' | 'code' | 'status'): unknown {
  if (typeof error !== 'object' || error === null || !(field in error)) {
    return undefined;
  }
  return Reflect.get(error, field);
}

export function classifyAuthError(error: unknown): AuthFailureReason {
  const code = readField(error, 'code');
  if (typeof code === 'string' && code in CODE_REASONS) {
    return CODE_REASONS[code];
  }
  if (readField(error, 'status') === 429) {
    return 'rate_limited';
  }
  const rawMessage = readField(error, 'message');
  const message = typeof rawMessage === 'string' ? rawMessage.toLowerCase() : '';
  if (message.includes('invalid login credentials')) {
    return 'invalid_credentials';
  }
  if (message.includes('email not confirmed')) {
    return 'email_not_confirmed';
  }
  if (message.includes('already registered') || message.includes('already exists')) {
    return 'already_registered';
  }
  if (message.includes('weak password') || message.includes('password should be at least')) {
    return 'weak_password';
  }
  if (message.includes('rate limit')) {
    return 'rate_limited';
  }
  if (
    message.includes('network') ||
    message.includes('connection') ||
    message.includes('fetch failed')
  ) {
    return 'network';
  }
  return 'unknown';
}

function toFailure(error: unknown): AuthFailure {
  if (error instanceof AuthFailure) {
    return error;
  }
  const rawMessage = readField(error, 'message');
  const message = typeof rawMessage === 'string' ? rawMessage : 'authentication failed';
  return new AuthFailure(classifyAuthError(error), message, { cause: error });
}

export function toAuthSession(session: Session): AuthSession {
  const expiresAtMs =
    session.expires_at !== undefined
      ? session.expires_at * 1000
      : now() + session.expires_in * 1000;
  return {
    accessToken: session.access_token,
    refreshToken: session.refresh_token,
    expiresAt: toIso(expiresAtMs)
  };
}

function toIdentityUser(user: User): IdentityUser {
  return {
    id: user.id,
    email: user.email ?? '',
    createdAt: user.created_at
  };
}

export function createSupabase(url: string, anonKey: string): SupabaseClient {
  return createClient(url, anonKey, {
    auth: {
      persistSession: false,
      autoRefreshToken: true,
      detectSessionInUrl: false
    }
  });
}

export class SupabaseIdentityProvider implements IdentityProvider {
  constructor(private readonly client: SupabaseClient) {}

  async signUp(email: string, password: string): Promise<SignUpResult> {
    const { data, error } = await this.client.auth.signUp({ email, password });
    if (error) {
      throw toFailure(error);
    }
    if (!data.user) {
      throw new AuthFailure('unknown', 'Registration failed. Please try again.');
    }
    return {
      user: toIdentityUser(data.user),
      session: data.session ? toAuthSession(data.session) : undefined
    };
  }

  async signIn(email: string, password: string): Promise<SignInResult> {
    const { data, error } = await this.client.auth.signInWithPassword({ email, password });
    if (error) {
      throw toFailure(error);
    }
    return { user: toIdentityUser(data.user), session: toAuthSession(data.session) };
  }

  async signOut(): Promise<void> {
    const { error } = await this.client.auth.signOut();
    if (error) {
      throw toFailure(error);
    }
  }

  async resetPassword(email: string): Promise<void> {
    const { error } = await this.client.auth.resetPasswordForEmail(email);
    if (error) {
      throw toFailure(error);
    }
  }

  async getUser(): Promise<IdentityUser> {
    const { data, error } = await this.client.auth.getUser();
    if (error) {
      throw toFailure(error);
    }
    return toIdentityUser(data.user);
  }

  async setSession(session: AuthSession): Promise<void> {
    const { error } = await this.client.auth.setSession({
      access_token: session.accessToken,
      refresh_token: session.refreshToken
    });
    if (error) {
      throw toFailure(error);
    }
  }

  onAuthStateChange(listener: AuthChangeListener): () => void {
    const { data } = this.client.auth.onAuthStateChange((event, session) => {
      if (event === 'SIGNED_IN' && session) {
        listener({ event: 'signed_in', session: toAuthSession(session) });
      } else if (event === 'SIGNED_OUT') {
        listener({ event: 'signed_out' });
      } else if (event === 'TOKEN_REFRESHED' && session) {
        listener({ event: 'token_refreshed', session: toAuthSession(session) });
      }
    });
    return () => data.subscription.unsubscribe();
  }
}

interface LocalAccount {
  user: IdentityUser;
  password: string;
}

const SESSION_TTL_MS = 60 * 60 * 1000;

export class InMemoryIdentityProvider implements IdentityProvider {
  accounts = new Map<string, LocalAccount>();
  private current?: { user: IdentityUser; session: AuthSession };
  private listeners = new Set<AuthChangeListener>();

  async signUp(email: string, password: string): Promise<SignUpResult> {
    const key = email.trim().toLowerCase();
    if (this.accounts.has(key)) {
      throw new AuthFailure('already_registered', 'User already registered');
    }
    if (password.length < 6) {
      throw new AuthFailure('weak_password', 'Password should be at least 6 characters');
    }
    const user: IdentityUser = { id: newId(), email: key, createdAt: toIso(now()) };
    this.accounts.set(key, { user, password });
    const session = this.startSession(user);
    return { user, session };
  }

  async signIn(email: string, password: string): Promise<SignInResult> {
    const account = this.accounts.get(email.trim().toLowerCase());
    if (!account || account.password !== password) {
      throw new AuthFailure('invalid_credentials', 'Invalid login credentials');
    }
    const session = this.startSession(account.user);
    return { user: account.user, session };
  }

  async signOut(): Promise<void> {
    this.current = undefined;
    this.emit({ event: 'signed_out' });
  }

  async resetPassword(email: string): Promise<void> {
    if (!email.includes('@')) {
      throw new AuthFailure('unknown', 'Unable to validate email address: invalid format');
    }
  }

  async getUser(): Promise<IdentityUser> {
    if (!this.current) {
      throw new AuthFailure('unknown', 'Auth session missing!');
    }
    return this.current.user;
  }

  async setSession(session: AuthSession): Promise<void> {
    const userId = session.accessToken.split('.')[0];
    for (const account of this.accounts.values()) {
      if (account.user.id === userId) {
        this.current = { user: account.user, session };
        return;
      }
    }
    throw new AuthFailure('invalid_credentials', 'Invalid Refresh Token: Refresh Token Not Found');
  }

  onAuthStateChange(listener: AuthChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Simulates the provider rotating tokens in the background. */
  refresh(): AuthSession | undefined {
    if (!this.current) {
      return undefined;
    }
    const session = this.issue(this.current.user);
    this.current = { user: this.current.user, session };
    this.emit({ event: 'token_refreshed', session });
    return session;
  }

  private startSession(user: IdentityUser): AuthSession {
    const session = this.issue(user);
    this.current = { user, session };
    this.emit({ event: 'signed_in', session });
    return session;
  }

  private issue(user: IdentityUser): AuthSession {
    return {
      accessToken: `${user.id}.${newId()}`,
      refreshToken: newId(),
      expiresAt: toIso(now() + SESSION_TTL_MS)
    };
  }

  private emit(change: AuthChange): void {
    for (const listener of this.listeners) {
      listener(change);
    }
  }
}
