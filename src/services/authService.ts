import { AuthFailure, toUserMessage } from '../errors';
import type { AuthChange, IdentityProvider } from '../identity';
import type { Logger } from '../logger';
import type { SessionStore } from '../sessionStore';
import type { AuthSession, IdentityUser, UserProfile } from '../types';
import type { ProfileService } from './profileService';

export type AuthStatus = 'signed_out' | 'signed_in';

export interface AuthState {
  status: AuthStatus;
  isLoading: boolean;
  profile?: UserProfile;
  errorMessage?: string;
}

type AuthListener = (state: AuthState) => void;

const SIGNED_OUT: AuthState = { status: 'signed_out', isLoading: false };

export class AuthService {
  private state: AuthState = { ...SIGNED_OUT };
  private session?: AuthSession;
  private authenticating = false;
  private readonly listeners = new Set<AuthListener>();
  private readonly unsubscribers: Array<() => void> = [];

  constructor(
    private readonly identity: IdentityProvider,
    private readonly sessions: SessionStore,
    private readonly profiles: ProfileService,
    private readonly logger: Logger
  ) {}

  getState(): AuthState {
    return this.state;
  }

  get userId(): string | undefined {
    return this.state.status === 'signed_in' ? this.state.profile?.id : undefined;
  }

  subscribe(listener: AuthListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async start(): Promise<AuthState> {
    this.unsubscribers.push(
      this.identity.onAuthStateChange((change) => {
        void this.handleAuthChange(change);
      }),
      this.profiles.subscribe((profile) => {
        if (this.state.status === 'signed_in' && profile && profile.id === this.userId) {
          this.setState({ ...this.state, profile });
        }
      })
    );

    const stored = await this.sessions.load();
    if (!stored) {
      this.setState({ ...SIGNED_OUT });
      return this.state;
    }

    this.setState({ ...this.state, isLoading: true });
    this.authenticating = true;
    try {
      await this.identity.setSession(stored);
      await this.establish(stored);
    } catch (err) {
      this.logger.warn({ err }, 'stored session could not be restored');
      await this.forceSignOut(err);
    } finally {
      this.authenticating = false;
    }
    return this.state;
  }

  stop(): void {
    this.unsubscribers.splice(0).forEach((unsubscribe) => unsubscribe());
  }

  async signUp(email: string, password: string): Promise<UserProfile> {
    return this.authenticate(async () => {
      const result = await this.identity.signUp(email, password);
      if (!result.session) {
        throw new AuthFailure('email_not_confirmed', 'Email confirmation required');
      }
      await this.profiles.create(result.user);
      return { user: result.user, session: result.session };
    });
  }

  async signIn(email: string, password: string): Promise<UserProfile> {
    return this.authenticate(() => this.identity.signIn(email, password));
  }

  /** Local state is cleared even when the remote sign-out fails. */
  async signOut(): Promise<void> {
    this.setState({ ...this.state, isLoading: true });
    try {
      await this.identity.signOut();
    } catch (err) {
      this.logger.warn({ err }, 'remote sign-out failed, clearing local session anyway');
    }
    await this.clearLocal();
    this.setState({ ...SIGNED_OUT });
  }

  async resetPassword(email: string): Promise<void> {
    this.setState({ ...this.state, isLoading: true, errorMessage: undefined });
    try {
      await this.identity.resetPassword(email);
      this.setState({ ...this.state, isLoading: false });
    } catch (err) {
      this.setState({ ...this.state, isLoading: false, errorMessage: toUserMessage(err) });
      throw err;
    }
  }

  private async authenticate(
    flow: () => Promise<{ user: IdentityUser; session: AuthSession }>
  ): Promise<UserProfile> {
    this.setState({ ...this.state, isLoading: true, errorMessage: undefined });
    this.authenticating = true;
    let session: AuthSession;
    try {
      session = (await flow()).session;
    } catch (err) {
      this.authenticating = false;
      this.setState({ ...this.state, isLoading: false, errorMessage: toUserMessage(err) });
      throw err;
    }
    try {
      return await this.establish(session);
    } catch (err) {
      await this.forceSignOut(err);
      throw err;
    } finally {
      this.authenticating = false;
    }
  }

  private async establish(session: AuthSession): Promise<UserProfile> {
    await this.sessions.save(session);
    this.session = session;
    const user = await this.identity.getUser();
    const profile = await this.profiles.load(user);
    this.setState({ status: 'signed_in', isLoading: false, profile });
    this.logger.info({ userId: profile.id }, 'signed in');
    return profile;
  }

  private async handleAuthChange(change: AuthChange): Promise<void> {
    try {
      if (change.event === 'token_refreshed' && change.session && this.session) {
        this.session = change.session;
        await this.sessions.save(change.session);
        this.logger.debug('session token refreshed');
        return;
      }
      if (change.event === 'signed_out' && this.state.status === 'signed_in') {
        await this.clearLocal();
        this.setState({ ...SIGNED_OUT });
        return;
      }
      if (
        change.event === 'signed_in' &&
        change.session &&
        !this.authenticating &&
        change.session.accessToken !== this.session?.accessToken
      ) {
        await this.establish(change.session);
      }
    } catch (err) {
      this.logger.warn({ err, event: change.event }, 'auth state change could not be applied');
      await this.forceSignOut(err);
    }
  }

  private async forceSignOut(cause: unknown): Promise<void> {
    try {
      await this.identity.signOut();
    } catch (err) {
      this.logger.debug({ err }, 'remote sign-out failed during forced sign-out');
    }
    try {
      await this.clearLocal();
    } catch (err) {
      this.logger.error({ err }, 'stored session could not be cleared');
    }
    this.setState({ ...SIGNED_OUT, errorMessage: toUserMessage(cause) });
  }

  private async clearLocal(): Promise<void> {
    this.session = undefined;
    this.profiles.clear();
    await this.sessions.clear();
  }

  private setState(next: AuthState): void {
    this.state = next;
    this.listeners.forEach((listener) => listener(next));
  }
}
