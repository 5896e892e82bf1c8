import type { UserPath } from './types';

export interface PathProfile {
  displayName: string;
  description: string;
  icon: string;
  /** Themes the analysis prompt asks the model to look for. */
  analysisFocus: string;
  reflectionFocus: string;
}

export const PATH_PROFILES: Record<UserPath, PathProfile> = {
  confidence: {
    displayName: 'Confidence',
    description: 'Self-expression, presence, charisma, social fluidity',
    icon: 'person.crop.circle.fill',
    analysisFocus: [
      'This user is on the Confidence path - focused on self-expression, presence, charisma, and social fluidity. Look for themes around:',
      '- Social interactions and relationships',
      '- Self-expression and authenticity',
      '- Presence and charisma development',
      '- Overcoming social anxiety or self-doubt',
      '- Leadership and influence opportunities',
      'Provide insights that help them show up more boldly and authentically.'
    ].join('\n'),
    reflectionFocus:
      'Focus on self-expression, presence, and authentic connection with others.'
  },
  clarity: {
    displayName: 'Clarity',
    description: 'Stillness, logic, journaling, intentional thought',
    icon: 'book.closed.fill',
    analysisFocus: [
      'This user is on the Clarity path - focused on stillness, logic, journaling, and intentional thought. Look for themes around:',
      '- Mental clarity and decision-making',
      '- Intellectual pursuits and learning',
      '- Mindfulness and present-moment awareness',
      '- Systems thinking and problem-solving',
      '- Values alignment and purpose',
      'Provide insights that help them think more clearly and act more intentionally.'
    ].join('\n'),
    reflectionFocus: 'Focus on mental clarity, intentional thinking, and values alignment.'
  },
  discipline: {
    displayName: 'Discipline',
    description: 'Willpower, endurance, challenge, grit',
    icon: 'flame.fill',
    analysisFocus: [
      'This user is on the Discipline path - focused on willpower, endurance, challenge, and grit. Look for themes around:',
      '- Physical and mental challenges',
      '- Habit formation and consistency',
      '- Overcoming resistance and procrastination',
      '- Goal achievement and milestone progress',
      '- Building mental toughness',
      'Provide insights that help them push through obstacles and build unshakeable discipline.'
    ].join('\n'),
    reflectionFocus:
      'Focus on building discipline, overcoming challenges, and consistent action.'
  }
};
