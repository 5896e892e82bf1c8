import { z } from 'zod';

const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim().length === 0 ? undefined : value;

const optionalString = z.preprocess(blankToUndefined, z.string().trim().optional());

const envSchema = z.object({
  NODE_ENV: z.preprocess(blankToUndefined, z.string().default('development')),
  PORT: z.preprocess(blankToUndefined, z.coerce.number().int().min(1).max(65535).default(3000)),
  HOST: z.preprocess(blankToUndefined, z.string().default('127.0.0.1')),
  LOCAL_STORE_DRIVER: z.preprocess(
    blankToUndefined,
    z.enum(['sqlite', 'memory']).default('sqlite')
  ),
  LOCAL_DB_PATH: z.preprocess(blankToUndefined, z.string().default('./data/obex.db')),
  REMOTE_DRIVER: z.preprocess(
    blankToUndefined,
    z.enum(['supabase', 'postgres', 'memory']).default('supabase')
  ),
  SUPABASE_URL: optionalString,
  SUPABASE_ANON_KEY: optionalString,
  DATABASE_URL: optionalString,
  VOICE_NOTES_BUCKET: z.preprocess(blankToUndefined, z.string().default('voice-notes')),
  OPENAI_API_KEY: optionalString,
  OPENAI_BASE_URL: optionalString,
  OPENAI_MODEL: z.preprocess(blankToUndefined, z.string().default('gpt-4')),
  LOG_LEVEL: z.preprocess(
    blankToUndefined,
    z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info')
  )
});

export type LocalStoreKind = 'sqlite' | 'memory';
export type RemoteKind = 'supabase' | 'postgres' | 'memory';
export type LogLevel = z.infer<typeof envSchema>['LOG_LEVEL'];

export interface AppConfig {
  nodeEnv: string;
  port: number;
  host: string;
  localStore: { kind: LocalStoreKind; path: string };
  remote: {
    kind: RemoteKind;
    supabaseUrl?: string;
    supabaseAnonKey?: string;
    databaseUrl?: string;
    voiceNotesBucket: string;
  };
  openai: { apiKey?: string; baseUrl?: string; model: string };
  logLevel: LogLevel;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    host: parsed.HOST,
    localStore: { kind: parsed.LOCAL_STORE_DRIVER, path: parsed.LOCAL_DB_PATH },
    remote: {
      kind: parsed.REMOTE_DRIVER,
      supabaseUrl: parsed.SUPABASE_URL,
      supabaseAnonKey: parsed.SUPABASE_ANON_KEY,
      databaseUrl: parsed.DATABASE_URL,
      voiceNotesBucket: parsed.VOICE_NOTES_BUCKET
    },
    openai: {
      apiKey: parsed.OPENAI_API_KEY,
      baseUrl: parsed.OPENAI_BASE_URL,
      model: parsed.OPENAI_MODEL
    },
    logLevel: parsed.LOG_LEVEL
  };
}
