import { describe, expect, it } from 'vitest';
import { silentLogger } from '../src/logger';
import {
  AiService,
  buildUserPrompt,
  EMPTY_REFLECTION,
  FALLBACK_ANALYSIS,
  parseAnalysis,
  parseMood
} from '../src/services/aiService';
import { FakeTransport } from './support';

describe('analysis parsing', () => {
  it('reads every field of a well-formed reply', () => {
    const result = parseAnalysis(
      JSON.stringify({
        summary: 'A hard but useful day.',
        insights: ['Sleep earlier', ' Sleep earlier ', ''],
        reflection: 'What would make tomorrow easier?',
        mood: 5,
        suggestedTags: ['sleep', 'work']
      })
    );
    expect(result).toEqual({
      summary: 'A hard but useful day.',
      insights: ['Sleep earlier'],
      reflection: 'What would make tomorrow easier?',
      mood: 5,
      suggestedTags: ['sleep', 'work']
    });
  });

  it('fills per-field defaults for missing or mistyped fields', () => {
    const result = parseAnalysis('{"insights": "not a list", "mood": 14}');
    expect(result).toEqual({
      summary: 'No summary available',
      insights: [],
      reflection: 'What did you learn from this experience?',
      mood: undefined,
      suggestedTags: []
    });
  });

  it('unwraps a fenced JSON reply', () => {
    expect(parseAnalysis('```json\n{"summary": "Fenced."}\n```').summary).toBe('Fenced.');
  });

  it('falls back entirely on non-JSON output', () => {
    expect(parseAnalysis('Sure! Here is my analysis.')).toEqual(FALLBACK_ANALYSIS);
    expect(parseAnalysis(undefined)).toEqual(FALLBACK_ANALYSIS);
  });

  it('hands out a fresh fallback each time', () => {
    const first = parseAnalysis('not json');
    first.insights.push('Changed by the caller');
    first.suggestedTags.length = 0;

    const second = parseAnalysis('nope');
    expect(second.insights).toEqual([
      'Reflect on your experience',
      'Consider what you learned',
      'Think about next steps'
    ]);
    expect(second.suggestedTags).toEqual(['reflection', 'growth']);
    expect(FALLBACK_ANALYSIS.insights).toHaveLength(3);
  });

  it('reads a mood or returns the neutral default', () => {
    expect(parseMood(' 8\n')).toBe(8);
    expect(parseMood('eight')).toBe(6);
    expect(parseMood('11')).toBe(6);
    expect(parseMood('0')).toBe(6);
  });
});

describe('user prompt', () => {
  it('adds the self-reported mood and truncated recent entries', () => {
    const prompt = buildUserPrompt({
      content: 'Today went well.',
      path: 'clarity',
      mood: 7,
      recentEntries: ['x'.repeat(250), 'short', 'third', 'fourth is dropped']
    });
    expect(prompt).toBe(
      [
        'Journal Entry:\nToday went well.',
        "\n\nUser's self-reported mood: 7/10",
        '\n\nRecent context (previous entries):\n',
        `\nEntry 1: ${'x'.repeat(200)}...`,
        '\nEntry 2: short...',
        '\nEntry 3: third...'
      ].join('')
    );
  });

  it('is just the entry when there is no context', () => {
    expect(buildUserPrompt({ content: 'Only this.', path: 'discipline' })).toBe(
      'Journal Entry:\nOnly this.'
    );
  });
});

describe('ai service', () => {
  it('sends the path prompt with the analysis sampling settings', async () => {
    const transport = new FakeTransport('{"summary": "Ok."}');
    const ai = new AiService(transport, silentLogger);

    await ai.analyze({ content: 'Ran five miles.', path: 'discipline' });

    const [request] = transport.requests;
    expect(request.temperature).toBe(0.7);
    expect(request.maxTokens).toBe(800);
    expect(request.topP).toBe(0.9);
    expect(request.messages[0].role).toBe('system');
    expect(request.messages[0].content).toContain('This user is on the Discipline path');
    expect(request.messages[1]).toEqual({
      role: 'user',
      content: 'Journal Entry:\nRan five miles.'
    });
  });

  it('rates mood with its own settings', async () => {
    const transport = new FakeTransport('3');
    const ai = new AiService(transport, silentLogger);

    expect(await ai.analyzeMood('Rough day.')).toBe(3);
    expect(transport.requests[0]).toMatchObject({ temperature: 0.3, maxTokens: 10, topP: 0.5 });
  });

  it('returns a placeholder for an empty reflection', async () => {
    const transport = new FakeTransport('  ', ' Try one small step. ');
    const ai = new AiService(transport, silentLogger);

    expect(await ai.generateReflection('Stuck.', 'confidence')).toBe(EMPTY_REFLECTION);
    expect(await ai.generateReflection('Stuck.', 'confidence')).toBe('Try one small step.');
    expect(transport.requests[0]).toMatchObject({ temperature: 0.8, maxTokens: 200, topP: 0.9 });
    expect(transport.requests[0].messages[0].content).toContain(
      'Focus on self-expression, presence, and authentic connection with others.'
    );
  });

  it('fails with a configuration error without a transport', async () => {
    const ai = new AiService(undefined, silentLogger);
    expect(ai.enabled).toBe(false);
    await expect(ai.analyze({ content: 'x', path: 'clarity' })).rejects.toMatchObject({
      kind: 'configuration',
      code: 50301
    });
  });

  it('wraps transport failures', async () => {
    const ai = new AiService(new FakeTransport(new Error('socket hang up')), silentLogger);
    await expect(ai.analyzeMood('x')).rejects.toMatchObject({
      kind: 'transport',
      message: 'analyze mood failed'
    });
  });
});
