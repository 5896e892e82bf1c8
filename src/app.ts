import type { AppConfig } from './config';
import { unauthenticated } from './errors';
import {
  createSupabase,
  InMemoryIdentityProvider,
  SupabaseIdentityProvider,
  type IdentityProvider
} from './identity';
import { createLocalStore, type LocalStore } from './localStore';
import type { Logger } from './logger';
import { createRemoteStore, type RemoteTableStore } from './remoteStore';
import { AiService, OpenAiTransport, type CompletionTransport } from './services/aiService';
import { AuthService, type AuthState } from './services/authService';
import { JournalService } from './services/journalService';
import { ProfileService } from './services/profileService';
import { SyncService } from './services/syncService';
import { SessionStore } from './sessionStore';
import { BackgroundTasks } from './tasks';
import {
  InMemoryVoiceNoteStore,
  SupabaseVoiceNoteStore,
  type VoiceNoteStore
} from './voiceNotes';

export interface AppDeps {
  local: LocalStore;
  remote: RemoteTableStore;
  identity: IdentityProvider;
  voiceNotes: VoiceNoteStore;
  /** Without a transport, analysis calls fail with a configuration error. */
  transport?: CompletionTransport;
  logger: Logger;
}

export class JournalApp {
  readonly tasks: BackgroundTasks;
  readonly sessions: SessionStore;
  readonly profiles: ProfileService;
  readonly auth: AuthService;
  readonly sync: SyncService;
  readonly ai: AiService;
  private journal?: JournalService;
  private unsubscribe?: () => void;

  constructor(private readonly deps: AppDeps) {
    const { local, remote, identity, logger } = deps;
    this.tasks = new BackgroundTasks(logger.child({ module: 'tasks' }));
    this.sessions = new SessionStore(local, logger.child({ module: 'session' }));
    this.profiles = new ProfileService(remote, logger.child({ module: 'profile' }));
    this.auth = new AuthService(
      identity,
      this.sessions,
      this.profiles,
      logger.child({ module: 'auth' })
    );
    this.sync = new SyncService(local, remote, logger.child({ module: 'sync' }));
    this.ai = new AiService(deps.transport, logger.child({ module: 'analysis' }));
  }

  async start(): Promise<AuthState> {
    await this.deps.local.init();
    await this.deps.remote.init();
    this.unsubscribe = this.auth.subscribe((state) => this.onAuthState(state));
    const state = await this.auth.start();
    this.onAuthState(state);
    return state;
  }

  get journals(): JournalService {
    if (!this.journal) {
      throw unauthenticated();
    }
    return this.journal;
  }

  /** Lets in-flight sync and counter writes finish before the session ends. */
  async signOut(): Promise<void> {
    await this.tasks.drain();
    await this.auth.signOut();
  }

  async stop(): Promise<void> {
    await this.tasks.drain();
    this.unsubscribe?.();
    this.auth.stop();
    this.journal?.dispose();
    this.journal = undefined;
    await this.deps.remote.close();
    await this.deps.local.close();
  }

  private onAuthState(state: AuthState): void {
    const userId = state.status === 'signed_in' ? state.profile?.id : undefined;
    if (this.journal && this.journal.userId === userId) {
      return;
    }
    this.journal?.dispose();
    this.journal = undefined;
    if (!userId) {
      return;
    }
    const journal = new JournalService(userId, {
      entries: this.deps.local,
      profiles: this.profiles,
      sync: this.sync,
      ai: this.ai,
      voiceNotes: this.deps.voiceNotes,
      tasks: this.tasks,
      logger: this.deps.logger.child({ module: 'journal', userId })
    });
    this.journal = journal;
    journal.loadEntries().catch((err: unknown) => {
      this.deps.logger.warn({ err, userId }, 'initial entry load failed');
    });
  }
}

export function createApp(config: AppConfig, logger: Logger): JournalApp {
  const local = createLocalStore(config.localStore);
  const supabase =
    config.remote.supabaseUrl && config.remote.supabaseAnonKey
      ? createSupabase(config.remote.supabaseUrl, config.remote.supabaseAnonKey)
      : undefined;
  const remote = createRemoteStore({
    kind: config.remote.kind,
    supabase,
    databaseUrl: config.remote.databaseUrl
  });

  let identity: IdentityProvider;
  let voiceNotes: VoiceNoteStore;
  if (config.remote.kind === 'memory') {
    identity = new InMemoryIdentityProvider();
    voiceNotes = new InMemoryVoiceNoteStore();
  } else if (supabase) {
    identity = new SupabaseIdentityProvider(supabase);
    voiceNotes = new SupabaseVoiceNoteStore(supabase, config.remote.voiceNotesBucket);
  } else {
    throw new Error('SUPABASE_URL and SUPABASE_ANON_KEY are required for sign-in');
  }

  const transport = config.openai.apiKey
    ? new OpenAiTransport(
        { apiKey: config.openai.apiKey, baseUrl: config.openai.baseUrl },
        config.openai.model
      )
    : undefined;
  if (!transport) {
    logger.warn('OPENAI_API_KEY is not set, entry analysis is disabled');
  }

  return new JournalApp({ local, remote, identity, voiceNotes, transport, logger });
}
