import OpenAI from 'openai';
import { z } from 'zod';
import { analysisFailure, AppError, configurationError, transportError } from '../errors';
import type { Logger } from '../logger';
import { PATH_PROFILES } from '../paths';
import type { AnalysisResult, UserPath } from '../types';
import { normalizeList } from '../utils';

export interface ChatMessage {
  role: 'system' | 'user';
  content: string;
}

export interface CompletionRequest {
  messages: ChatMessage[];
  temperature: number;
  maxTokens: number;
  topP: number;
}

export interface CompletionTransport {
  complete(request: CompletionRequest): Promise<string | undefined>;
}

export class OpenAiTransport implements CompletionTransport {
  private readonly client: OpenAI;

  constructor(
    options: { apiKey: string; baseUrl?: string },
    private readonly model: string
  ) {
    this.client = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseUrl, maxRetries: 0 });
  }

  async complete(request: CompletionRequest): Promise<string | undefined> {
    let response: OpenAI.Chat.Completions.ChatCompletion;
    try {
      response = await this.client.chat.completions.create({
        model: this.model,
        messages: request.messages,
        temperature: request.temperature,
        max_tokens: request.maxTokens,
        top_p: request.topP
      });
    } catch (err) {
      const error = transportError('text generation', err);
      if (err instanceof OpenAI.APIError && err.status !== undefined) {
        error.details = { ...error.details, status: err.status };
      }
      throw error;
    }
    const choice = response.choices[0];
    if (!choice) {
      throw analysisFailure('Text generation returned no choices');
    }
    return choice.message.content ?? undefined;
  }
}

const BASE_PROMPT =
  'You are an AI coach specializing in self-discipline and personal growth. You analyze journal entries with wisdom, depth, and practicality. Your responses should be insightful but concise, helping the user gain clarity about their experiences and next steps.';

const RESPONSE_FORMAT = `Respond in JSON format with these fields:
{
    "summary": "2-3 sentence summary of the entry's main themes",
    "insights": ["insight 1", "insight 2", "insight 3"],
    "reflection": "A thoughtful reflection question or prompt for deeper thinking",
    "mood": estimated_mood_1_to_10,
    "suggestedTags": ["tag1", "tag2", "tag3"]
}`;

const MOOD_PROMPT = `You are an expert at analyzing emotional tone in personal writing.
Rate the overall mood of this journal entry on a scale of 1-10:
1-3: Very negative (despair, anger, severe stress)
4-5: Somewhat negative (frustration, sadness, mild stress)
6-7: Neutral to positive (calm, content, stable)
8-9: Positive (happy, motivated, optimistic)
10: Extremely positive (euphoric, deeply fulfilled, peak state)

Respond with only a single number from 1-10.`;

export const NEUTRAL_MOOD = 6;
export const DEFAULT_SUMMARY = 'No summary available';
export const DEFAULT_REFLECTION = 'What did you learn from this experience?';
export const EMPTY_REFLECTION = 'Unable to generate reflection.';

export const FALLBACK_ANALYSIS: AnalysisResult = {
  summary: 'Entry recorded successfully',
  insights: ['Reflect on your experience', 'Consider what you learned', 'Think about next steps'],
  reflection: 'What was the most significant part of this experience?',
  suggestedTags: ['reflection', 'growth']
};

const RECENT_CONTEXT_LIMIT = 3;
const RECENT_CONTEXT_CHARS = 200;

const analysisSchema = z.object({
  summary: z.string().catch(DEFAULT_SUMMARY),
  insights: z.array(z.string()).catch([]),
  reflection: z.string().catch(DEFAULT_REFLECTION),
  mood: z.number().int().min(1).max(10).optional().catch(undefined),
  suggestedTags: z.array(z.string()).catch([])
});

export interface AnalyzeRequest {
  content: string;
  path: UserPath;
  recentEntries?: string[];
  mood?: number;
}

export function buildSystemPrompt(path: UserPath): string {
  return `${BASE_PROMPT}\n\n${PATH_PROFILES[path].analysisFocus}\n\n${RESPONSE_FORMAT}`;
}

export function buildUserPrompt(request: AnalyzeRequest): string {
  let prompt = `Journal Entry:\n${request.content}`;
  if (request.mood !== undefined) {
    prompt += `\n\nUser's self-reported mood: ${request.mood}/10`;
  }
  const recent = (request.recentEntries ?? []).slice(0, RECENT_CONTEXT_LIMIT);
  if (recent.length > 0) {
    prompt += '\n\nRecent context (previous entries):\n';
    recent.forEach((entry, index) => {
      prompt += `\nEntry ${index + 1}: ${entry.slice(0, RECENT_CONTEXT_CHARS)}...`;
    });
  }
  return prompt;
}

function stripCodeFence(text: string): string {
  const fenced = /^```(?:json)?\s*([\s\S]*?)\s*```$/.exec(text);
  return fenced ? fenced[1] : text;
}

export function parseAnalysis(completion: string | undefined): AnalysisResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stripCodeFence((completion ?? '').trim()));
  } catch {
    return {
      ...FALLBACK_ANALYSIS,
      insights: [...FALLBACK_ANALYSIS.insights],
      suggestedTags: [...FALLBACK_ANALYSIS.suggestedTags]
    };
  }
  const fields =
    typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed) ? parsed : {};
  const result = analysisSchema.parse(fields);
  return {
    summary: result.summary,
    insights: normalizeList(result.insights),
    reflection: result.reflection,
    mood: result.mood,
    suggestedTags: normalizeList(result.suggestedTags)
  };
}

export function parseMood(completion: string | undefined): number {
  const text = (completion ?? '').trim();
  if (!/^\d+$/.test(text)) {
    return NEUTRAL_MOOD;
  }
  const mood = Number(text);
  return mood >= 1 && mood <= 10 ? mood : NEUTRAL_MOOD;
}

export class AiService {
  constructor(
    private readonly transport: CompletionTransport | undefined,
    private readonly logger: Logger
  ) {}

  get enabled(): boolean {
    return this.transport !== undefined;
  }

  async analyze(request: AnalyzeRequest): Promise<AnalysisResult> {
    const completion = await this.complete('analyze entry', {
      messages: [
        { role: 'system', content: buildSystemPrompt(request.path) },
        { role: 'user', content: buildUserPrompt(request) }
      ],
      temperature: 0.7,
      maxTokens: 800,
      topP: 0.9
    });
    return parseAnalysis(completion);
  }

  async analyzeMood(content: string): Promise<number> {
    const completion = await this.complete('analyze mood', {
      messages: [
        { role: 'system', content: MOOD_PROMPT },
        { role: 'user', content }
      ],
      temperature: 0.3,
      maxTokens: 10,
      topP: 0.5
    });
    return parseMood(completion);
  }

  async generateReflection(content: string, path: UserPath): Promise<string> {
    const systemPrompt = `You are a wise coach helping someone on their personal growth journey. ${PATH_PROFILES[path].reflectionFocus}

Read their journal entry and provide a brief, insightful reflection or question that helps them think deeper about their experience. Keep it concise (1-2 sentences) and actionable.`;
    const completion = await this.complete('generate reflection', {
      messages: [
        { role: 'system', content: systemPrompt },
        { role: 'user', content }
      ],
      temperature: 0.8,
      maxTokens: 200,
      topP: 0.9
    });
    const reflection = completion?.trim();
    return reflection ? reflection : EMPTY_REFLECTION;
  }

  private async complete(
    operation: string,
    request: CompletionRequest
  ): Promise<string | undefined> {
    if (!this.transport) {
      throw configurationError('OpenAI API key not configured');
    }
    try {
      return await this.transport.complete(request);
    } catch (err) {
      this.logger.warn({ err, operation }, 'text generation failed');
      throw err instanceof AppError ? err : transportError(operation, err);
    }
  }
}
