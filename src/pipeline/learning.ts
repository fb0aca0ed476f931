/**
 * Prompts and reply parsing for the study-support operations: question level
 * estimates, follow-up questions, session summaries and learning gaps
 */
import { LearnerLevel } from '../config';
import { GenerationError } from '../errors';
import { Interaction } from '../types/interaction';
import { GenerationPrompt } from '../collaborators/types';
import { validateQuestionComplexityMessage } from '../utils/schema-validator';

export const MAX_FOLLOW_UPS = 5;
export const MAX_LEARNING_GAPS = 5;

export const FALLBACK_FOLLOW_UPS: readonly string[] = Object.freeze([
  'What aspects of this topic would you like to explore further?',
]);
export const NO_CONVERSATION_SUMMARY = 'No conversation to summarize.';
export const SUMMARY_UNAVAILABLE = 'Unable to generate conversation summary.';

export interface ComplexityAnalysis {
  level: LearnerLevel;
  subjectArea: string;
  keyConcepts: string[];
  /** 0..1 as reported by the generator; 0 for a fallback */
  confidence: number;
  /** False when generation failed and `level` is the configured default */
  estimated: boolean;
}

const ANALYST_PROMPT = 'You classify student questions for a tutoring system. Reply with a single JSON object and nothing else.';

export function complexityPrompt(question: string): GenerationPrompt {
  return {
    messages: [
      { role: 'system', content: ANALYST_PROMPT },
      {
        role: 'user',
        content: [
          `Question: "${question}"`,
          'Respond with a JSON object containing:',
          '- complexity_level: "beginner", "intermediate" or "advanced"',
          '- subject_area: the main academic subject, such as "biology" or "physics"',
          '- key_concepts: list of the main concepts mentioned',
          '- confidence_score: 0.0 to 1.0',
        ].join('\n'),
      },
    ],
  };
}

/**
 * Read a level estimate out of a generated reply. Text around the JSON
 * object, such as a code fence, is ignored.
 * @throws GenerationError when the reply holds no valid estimate
 */
export function parseComplexity(text: string): ComplexityAnalysis {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start === -1 || end < start) {
    throw new GenerationError('Complexity reply held no JSON object');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text.slice(start, end + 1));
  } catch (err) {
    throw new GenerationError('Complexity reply was not valid JSON', { cause: err });
  }

  try {
    const record = validateQuestionComplexityMessage(parsed);
    return {
      level: record.complexity_level,
      subjectArea: record.subject_area,
      keyConcepts: record.key_concepts,
      confidence: record.confidence_score,
      estimated: true,
    };
  } catch (err) {
    throw new GenerationError('Complexity reply did not match the expected shape', { cause: err });
  }
}

export function fallbackComplexity(level: LearnerLevel): ComplexityAnalysis {
  return { level, subjectArea: 'general', keyConcepts: [], confidence: 0, estimated: false };
}

export function followUpPrompt(topic: string, level: LearnerLevel): GenerationPrompt {
  return {
    messages: [
      {
        role: 'user',
        content: [
          `Write 3 to 5 follow-up questions about "${topic}" for a student at the ${level} level.`,
          'They should encourage critical thinking, connect to real-world applications and be open-ended.',
          'Return only the questions, one per line.',
        ].join('\n'),
      },
    ],
  };
}

const LIST_MARKER = /^(?:[-*•]|\d+[.)])\s*/;

/**
 * Non-empty lines of a generated list, bullet and number markers removed
 */
export function parseLines(text: string, max: number): string[] {
  const lines: string[] = [];
  for (const raw of text.split('\n')) {
    const line = raw.trim().replace(LIST_MARKER, '').trim();
    if (!line) continue;
    lines.push(line);
    if (lines.length >= max) break;
  }
  return lines;
}

function transcript(interactions: readonly Interaction[]): string {
  const lines: string[] = [];
  for (const interaction of interactions) {
    if (interaction.queryText) lines.push(`Student: ${interaction.queryText}`);
    lines.push(`Tutor: ${interaction.responseText}`);
  }
  return lines.join('\n');
}

export function summaryPrompt(interactions: readonly Interaction[]): GenerationPrompt {
  return {
    messages: [
      {
        role: 'user',
        content: [
          'Summarize this tutoring conversation and give learning insights:',
          '',
          transcript(interactions),
          '',
          'Cover the main topics discussed, the key learning points, suggested next steps for the student',
          'and areas that might need more attention.',
        ].join('\n'),
      },
    ],
  };
}

export function gapsPrompt(recent: string, previous: readonly string[]): GenerationPrompt {
  const earlier = previous.length > 0 ? previous.map(question => `- ${question}`).join('\n') : '(none)';
  return {
    messages: [
      {
        role: 'user',
        content: [
          'Identify possible learning gaps or misconceptions from this student\'s questions.',
          `Most recent question: "${recent}"`,
          `Earlier questions:\n${earlier}`,
          'Return only the specific areas that need attention, one per line.',
        ].join('\n'),
      },
    ],
  };
}
