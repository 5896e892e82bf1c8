import Fastify from 'fastify';
import { z } from 'zod';
import { createApp, type JournalApp } from './app';
import { loadConfig, type AppConfig } from './config';
import { AppError, GENERIC_MESSAGE, toUserMessage, unauthenticated } from './errors';
import { createLogger, type Logger } from './logger';
import { EMPTY_FILTERS } from './services/journalService';
import { PATH_PROFILES } from './paths';
import { USER_PATHS } from './types';
import { readingTime } from './utils';

export interface BuildServerOptions {
  /** A prebuilt application; takes precedence over `config`. */
  app?: JournalApp;
  config?: AppConfig;
  logger?: Logger;
}

const pathSchema = z.enum(USER_PATHS);
const moodSchema = z.number().int().min(1).max(10);
const credentialsSchema = z.object({
  email: z.string().trim().email(),
  password: z.string().min(1)
});
const idParamsSchema = z.object({ id: z.string().min(1) });
const VOICE_NOTE_LIMIT_BYTES = 10 * 1024 * 1024;

const listQuerySchema = z.object({
  path: pathSchema.optional(),
  private_only: z.enum(['true', 'false']).optional(),
  search: z.string().optional(),
  tags: z.string().optional(),
  mood_min: z.coerce.number().int().min(1).max(10).optional(),
  mood_max: z.coerce.number().int().min(1).max(10).optional()
});

function publicDetails(error: AppError): Record<string, unknown> | null {
  if (error.kind === 'transport') {
    return { operation: error.details?.operation ?? null };
  }
  return error.details ?? null;
}

export function buildServer(options: BuildServerOptions = {}) {
  const config = options.config ?? loadConfig(process.env);
  const logger = options.logger ?? createLogger(config.logLevel);
  const journalApp = options.app ?? createApp(config, logger);
  const startedAt = Date.now();

  const app = Fastify({ logger, disableRequestLogging: true });

  app.addContentTypeParser(/^audio\//, { parseAs: 'buffer' }, (_request, body, done) => {
    done(null, body);
  });

  app.addHook('onReady', async () => {
    await journalApp.start();
  });

  app.addHook('onClose', async () => {
    await journalApp.stop();
  });

  const requireProfile = () => {
    const profile = journalApp.profiles.current;
    if (journalApp.auth.getState().status !== 'signed_in' || !profile) {
      throw unauthenticated();
    }
    return profile;
  };

  app.setErrorHandler((error, _request, reply) => {
    if (error instanceof AppError) {
      reply.status(error.status).send({
        code: error.code,
        message: toUserMessage(error),
        details: publicDetails(error)
      });
      return;
    }

    if (error instanceof z.ZodError) {
      reply.status(400).send({
        code: 40000,
        message: 'Invalid request parameters',
        details: { issues: error.issues }
      });
      return;
    }

    if (error.statusCode !== undefined && error.statusCode < 500) {
      reply.status(error.statusCode).send({
        code: error.statusCode * 100,
        message: error.message
      });
      return;
    }

    app.log.error({ err: error }, 'unhandled request error');
    reply.status(500).send({
      code: 50000,
      message: GENERIC_MESSAGE
    });
  });

  app.get('/healthz', async () => {
    return {
      code: 0,
      message: 'ok',
      data: { status: 'ok', uptime_sec: Math.floor((Date.now() - startedAt) / 1000) }
    };
  });

  app.get('/readyz', async () => {
    return {
      code: 0,
      message: 'ok',
      data: { status: 'ready', analysis_enabled: journalApp.ai.enabled }
    };
  });

  app.get('/v1/paths', async () => {
    return {
      code: 0,
      message: 'ok',
      data: USER_PATHS.map((id) => ({
        id,
        display_name: PATH_PROFILES[id].displayName,
        description: PATH_PROFILES[id].description,
        icon: PATH_PROFILES[id].icon
      }))
    };
  });

  app.get('/v1/auth/state', async () => {
    const state = journalApp.auth.getState();
    return {
      code: 0,
      message: 'ok',
      data: {
        status: state.status,
        profile: state.profile ?? null,
        error_message: state.errorMessage ?? null
      }
    };
  });

  app.post('/v1/auth/sign-up', async (request) => {
    const body = credentialsSchema.parse(request.body);
    const profile = await journalApp.auth.signUp(body.email, body.password);
    return { code: 0, message: 'ok', data: profile };
  });

  app.post('/v1/auth/sign-in', async (request) => {
    const body = credentialsSchema.parse(request.body);
    const profile = await journalApp.auth.signIn(body.email, body.password);
    return { code: 0, message: 'ok', data: profile };
  });

  app.post('/v1/auth/sign-out', async () => {
    await journalApp.signOut();
    return { code: 0, message: 'ok' };
  });

  app.post('/v1/auth/password/reset', async (request) => {
    const body = z.object({ email: z.string().trim().email() }).parse(request.body);
    await journalApp.auth.resetPassword(body.email);
    return { code: 0, message: 'ok' };
  });

  app.get('/v1/profile', async () => {
    return { code: 0, message: 'ok', data: requireProfile() };
  });

  app.patch('/v1/profile', async (request) => {
    requireProfile();
    const body = z
      .object({
        selected_path: pathSchema.optional(),
        display_name: z.string().optional(),
        onboarding_completed: z.literal(true).optional()
      })
      .parse(request.body);
    if (body.selected_path !== undefined) {
      await journalApp.profiles.updatePath(body.selected_path);
    }
    if (body.display_name !== undefined) {
      await journalApp.profiles.updateDisplayName(body.display_name);
    }
    if (body.onboarding_completed) {
      await journalApp.profiles.completeOnboarding();
    }
    return { code: 0, message: 'ok', data: requireProfile() };
  });

  app.post('/v1/profile/streak', async () => {
    const profile = await journalApp.journals.refreshStreak();
    return { code: 0, message: 'ok', data: profile };
  });

  app.get('/v1/journals', async (request) => {
    const query = listQuerySchema.parse(request.query);
    const journal = journalApp.journals;
    await journal.loadEntries();
    const moodRange =
      query.mood_min !== undefined || query.mood_max !== undefined
        ? { min: query.mood_min ?? 1, max: query.mood_max ?? 10 }
        : undefined;
    const entries = journal.setFilters({
      ...EMPTY_FILTERS,
      path: query.path,
      privateOnly: query.private_only === 'true',
      searchText: query.search ?? '',
      tags: query.tags ? query.tags.split(',').map((tag) => tag.trim()) : [],
      moodRange
    });
    return { code: 0, message: 'ok', data: { entries, total: entries.length } };
  });

  app.post('/v1/journals', async (request) => {
    const body = z
      .object({
        content: z.string(),
        title: z.string().optional(),
        mood: moodSchema.optional(),
        tags: z.array(z.string()).optional(),
        is_private: z.boolean().optional(),
        path: pathSchema.optional(),
        voice_note_url: z.string().url().optional(),
        voice_transcript: z.string().optional(),
        with_analysis: z.boolean().optional()
      })
      .parse(request.body);
    const result = await journalApp.journals.createEntry({
      content: body.content,
      title: body.title,
      mood: body.mood,
      tags: body.tags,
      isPrivate: body.is_private,
      path: body.path,
      voiceNoteUrl: body.voice_note_url,
      voiceTranscript: body.voice_transcript,
      withAnalysis: body.with_analysis
    });
    return {
      code: 0,
      message: 'ok',
      data: {
        entry: result.entry,
        analysis: result.analysis ?? null,
        advisory: result.advisory ?? null
      }
    };
  });

  app.get('/v1/journals/stats', async () => {
    const journal = journalApp.journals;
    const { entries } = journal.getState();
    return {
      code: 0,
      message: 'ok',
      data: {
        total_entries: entries.length,
        total_words: journal.totalWordCount,
        current_streak: journal.currentStreak(),
        available_tags: journal.availableTags,
        entries_by_date: journal.entriesByDate.map((group) => ({
          date: group.date,
          count: group.entries.length
        }))
      }
    };
  });

  app.get('/v1/journals/export', async (_request, reply) => {
    const text = journalApp.journals.exportEntries();
    reply.header('content-type', 'text/plain; charset=utf-8');
    return text;
  });

  app.post('/v1/journals/sync', async () => {
    const result = await journalApp.journals.syncPending();
    return { code: 0, message: 'ok', data: result };
  });

  app.post('/v1/journals/reflection', async (request) => {
    const body = z
      .object({ content: z.string().min(1), path: pathSchema.optional() })
      .parse(request.body);
    const journal = journalApp.journals;
    const reflection = await journal.generateReflection(body.content, body.path);
    return {
      code: 0,
      message: 'ok',
      data: {
        reflection: reflection ?? null,
        advisory: reflection === undefined ? (journal.getState().errorMessage ?? null) : null
      }
    };
  });

  app.post('/v1/journals/mood', async (request) => {
    const body = z.object({ content: z.string().min(1) }).parse(request.body);
    const journal = journalApp.journals;
    const mood = await journal.analyzeMood(body.content);
    return {
      code: 0,
      message: 'ok',
      data: {
        mood: mood ?? null,
        advisory: mood === undefined ? (journal.getState().errorMessage ?? null) : null
      }
    };
  });

  app.get('/v1/journals/:id', async (request) => {
    const params = idParamsSchema.parse(request.params);
    const entry = await journalApp.journals.getEntry(params.id);
    return {
      code: 0,
      message: 'ok',
      data: { ...entry, reading_time: readingTime(entry.content) }
    };
  });

  app.patch('/v1/journals/:id', async (request) => {
    const params = idParamsSchema.parse(request.params);
    const body = z
      .object({
        title: z.string().nullable().optional(),
        content: z.string().optional(),
        mood: moodSchema.nullable().optional(),
        tags: z.array(z.string()).optional(),
        is_private: z.boolean().optional(),
        voice_note_url: z.string().url().nullable().optional(),
        voice_transcript: z.string().nullable().optional()
      })
      .parse(request.body);
    const result = await journalApp.journals.updateEntry(params.id, {
      title: body.title,
      content: body.content,
      mood: body.mood,
      tags: body.tags,
      isPrivate: body.is_private,
      voiceNoteUrl: body.voice_note_url,
      voiceTranscript: body.voice_transcript
    });
    return { code: 0, message: 'ok', data: result.entry };
  });

  app.put(
    '/v1/journals/:id/voice-note',
    { bodyLimit: VOICE_NOTE_LIMIT_BYTES },
    async (request) => {
      const params = idParamsSchema.parse(request.params);
      const audio = z.instanceof(Buffer).parse(request.body);
      const result = await journalApp.journals.uploadVoiceNote(params.id, audio);
      return { code: 0, message: 'ok', data: result.entry };
    }
  );

  app.delete('/v1/journals/:id', async (request) => {
    const params = idParamsSchema.parse(request.params);
    await journalApp.journals.deleteEntry(params.id);
    return { code: 0, message: 'ok' };
  });

  return app;
}
