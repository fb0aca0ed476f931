/**
 * Slash commands typed at the worker prompt. Any other line is a question.
 *
 *   /recommend <question>  follow-ups, related material and activities
 *   /summary               generated summary of the session
 *   /report                insights, learning gaps and summary
 *   /level <level>         change the learner level
 */
import { LEARNER_LEVELS, LearnerLevel } from '../config';
import { TutorSession } from '../analytics/registry';
import { LearningRecommendations } from '../pipeline';
import { SessionReport } from '../types/interaction';

export type WorkerCommand =
  | { kind: 'ask'; question: string }
  | { kind: 'recommend'; question: string }
  | { kind: 'summary' }
  | { kind: 'report' }
  | { kind: 'level'; level: LearnerLevel }
  | { kind: 'invalid'; message: string };

export const COMMAND_HELP = 'Commands: /recommend <question>, /summary, /report, /level <beginner|intermediate|advanced>';

/** Null for a blank line */
export function parseCommand(line: string): WorkerCommand | null {
  const text = line.trim();
  if (!text) return null;
  if (!text.startsWith('/')) return { kind: 'ask', question: text };

  const space = text.indexOf(' ');
  const name = space === -1 ? text.slice(1) : text.slice(1, space);
  const arg = space === -1 ? '' : text.slice(space + 1).trim();

  switch (name) {
    case 'recommend':
      return arg ? { kind: 'recommend', question: arg } : { kind: 'invalid', message: 'Usage: /recommend <question>' };
    case 'summary':
      return { kind: 'summary' };
    case 'report':
      return { kind: 'report' };
    case 'level': {
      const level = LEARNER_LEVELS.find(option => option === arg);
      return level ? { kind: 'level', level } : { kind: 'invalid', message: `Unknown level "${arg}"` };
    }
    default:
      return { kind: 'invalid', message: `Unknown command /${name}. ${COMMAND_HELP}` };
  }
}

function bullets(items: readonly string[]): string[] {
  return items.map(item => `  - ${item}`);
}

export function formatRecommendations(recommendations: LearningRecommendations): string {
  const lines = [
    `Topic: ${recommendations.topic} (${recommendations.complexityLevel})`,
    'Follow-up questions:',
    ...bullets(recommendations.followUpQuestions),
  ];
  if (recommendations.relatedContent.length > 0) {
    lines.push('Related material:');
    lines.push(...bullets(recommendations.relatedContent.map(item => `${item.entity}: ${item.summary}`)));
  }
  lines.push('Activities:', ...bullets(recommendations.suggestedActivities));
  return lines.join('\n');
}

export function formatReport(report: SessionReport): string {
  const lines = [
    `Interactions: ${report.interactionCount}`,
    `Topics: ${report.topicsDiscussed.length > 0 ? report.topicsDiscussed.join(', ') : 'none'}`,
    `Complexity trend: ${report.complexityProgression.trend}`,
  ];
  if (report.knowledgeGaps.length > 0) {
    lines.push('Learning gaps:', ...bullets(report.knowledgeGaps));
  }
  if (report.recommendations.length > 0) {
    lines.push('Recommendations:', ...bullets(report.recommendations));
  }
  lines.push('Summary:', report.conversationSummary);
  return lines.join('\n');
}

/**
 * Run a non-question command and return the text to print
 */
export async function runCommand(
  session: TutorSession,
  command: Exclude<WorkerCommand, { kind: 'ask' }>,
): Promise<string> {
  switch (command.kind) {
    case 'recommend':
      return formatRecommendations(await session.pipeline.learningRecommendations(command.question));
    case 'summary':
      return session.pipeline.summarizeConversation();
    case 'report':
      return formatReport(await session.pipeline.sessionReport());
    case 'level':
      session.pipeline.setLearnerLevel(command.level);
      return `Learner level set to ${command.level}`;
    case 'invalid':
      return command.message;
  }
}
