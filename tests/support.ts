import { JournalApp } from '../src/app';
import { loadConfig, type AppConfig } from '../src/config';
import { InMemoryIdentityProvider } from '../src/identity';
import { InMemoryLocalStore } from '../src/localStore';
import { silentLogger } from '../src/logger';
import { InMemoryRemoteStore } from '../src/remoteStore';
import type { CompletionRequest, CompletionTransport } from '../src/services/aiService';
import type { JournalEntry } from '../src/types';
import { InMemoryVoiceNoteStore } from '../src/voiceNotes';

/** Replays queued completions; an Error in the queue is thrown instead. */
export class FakeTransport implements CompletionTransport {
  readonly requests: CompletionRequest[] = [];
  private readonly replies: Array<string | Error>;

  constructor(...replies: Array<string | Error>) {
    this.replies = replies;
  }

  queue(...replies: Array<string | Error>): void {
    this.replies.push(...replies);
  }

  async complete(request: CompletionRequest): Promise<string | undefined> {
    this.requests.push(request);
    const reply = this.replies.shift();
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  }
}

export function memoryConfig(): AppConfig {
  return loadConfig({
    NODE_ENV: 'test',
    LOCAL_STORE_DRIVER: 'memory',
    REMOTE_DRIVER: 'memory',
    LOG_LEVEL: 'silent'
  });
}

export interface TestApp {
  app: JournalApp;
  local: InMemoryLocalStore;
  remote: InMemoryRemoteStore;
  identity: InMemoryIdentityProvider;
  voiceNotes: InMemoryVoiceNoteStore;
  transport: FakeTransport;
}

export function buildTestApp(transport = new FakeTransport()): TestApp {
  const local = new InMemoryLocalStore();
  const remote = new InMemoryRemoteStore();
  const identity = new InMemoryIdentityProvider();
  const voiceNotes = new InMemoryVoiceNoteStore();
  const app = new JournalApp({
    local,
    remote,
    identity,
    voiceNotes,
    transport,
    logger: silentLogger
  });
  return { app, local, remote, identity, voiceNotes, transport };
}

export function makeEntry(overrides: Partial<JournalEntry> = {}): JournalEntry {
  return {
    id: 'entry-1',
    userId: 'user-1',
    date: '2026-03-10T08:00:00.000Z',
    userPath: 'clarity',
    content: 'Walked before work and planned the week.',
    aiInsights: [],
    tags: [],
    isPrivate: false,
    createdAt: '2026-03-10T08:00:00.000Z',
    updatedAt: '2026-03-10T08:00:00.000Z',
    syncStatus: 'pending',
    ...overrides
  };
}
