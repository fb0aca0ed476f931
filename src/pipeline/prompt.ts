/**
 * Grounding context and prompt construction
 */
import { LearnerLevel } from '../config';
import { KnowledgeGraph } from '../knowledge-graph';
import { EntityMatch, KnowledgeNode } from '../types/knowledge';
import { Interaction } from '../types/interaction';
import { ChatMessage, GenerationPrompt } from '../collaborators/types';

export interface ContextOptions {
  /** Matches whose nodes are included, best first */
  maxEntities: number;
  /** Hops followed from each matched node */
  relatedDepth: number;
  /** Related nodes kept per matched node */
  maxRelated: number;
  /** Upper bound on the rendered context */
  maxChars: number;
}

export interface ContextEntry {
  kind: 'main_topic' | 'related_topic';
  nodeId: string;
  entity: string;
  summary: string;
  /** For related topics: the matched node and the edge label that led here */
  via?: { fromEntity: string; relationType: string };
}

export interface GroundingContext {
  entries: ContextEntry[];
  text: string;
  truncated: boolean;
}

export const EMPTY_CONTEXT: GroundingContext = Object.freeze({ entries: [], text: '', truncated: false });

function renderEntry(entry: ContextEntry): string {
  if (entry.via) {
    const relation = entry.via.relationType.replace(/_/g, ' ');
    return `- ${entry.via.fromEntity} ${relation} ${entry.entity}: ${entry.summary}`;
  }
  return `${entry.entity}: ${entry.summary}`;
}

/**
 * Collect the matched nodes and their neighbourhoods, rendered as text no
 * longer than `maxChars`. A node appears at most once.
 */
export function buildGroundingContext(
  graph: KnowledgeGraph,
  matches: readonly EntityMatch[],
  options: ContextOptions,
): GroundingContext {
  const candidates: ContextEntry[] = [];
  const seen = new Set<string>();
  const mains: KnowledgeNode[] = [];

  for (const match of matches) {
    if (mains.length >= options.maxEntities) break;
    const node = graph.getNode(match.nodeId);
    if (!node || seen.has(node.id)) continue;
    seen.add(node.id);
    mains.push(node);
  }

  for (const node of mains) {
    candidates.push({ kind: 'main_topic', nodeId: node.id, entity: node.entity, summary: node.summary });

    let kept = 0;
    for (const related of graph.relatedTo(node.id, options.relatedDepth)) {
      if (kept >= options.maxRelated) break;
      if (seen.has(related.node.id)) continue;
      seen.add(related.node.id);
      kept++;

      candidates.push({
        kind: 'related_topic',
        nodeId: related.node.id,
        entity: related.node.entity,
        summary: related.node.summary,
        via: { fromEntity: node.entity, relationType: related.relationship.relationType },
      });
    }
  }

  const entries: ContextEntry[] = [];
  const lines: string[] = [];
  let length = 0;
  let truncated = false;

  for (const entry of candidates) {
    const line = renderEntry(entry);
    const added = (lines.length > 0 ? 1 : 0) + line.length;
    if (length + added > options.maxChars) {
      truncated = true;
      break;
    }
    lines.push(line);
    entries.push(entry);
    length += added;
  }

  return { entries, text: lines.join('\n'), truncated };
}

const LEVEL_GUIDANCE: Record<LearnerLevel, string> = {
  beginner: 'The student is a beginner: use plain words, short sentences and one everyday example.',
  intermediate: 'The student has some background: explain the mechanism and connect it to related ideas.',
  advanced: 'The student is advanced: be precise, use the correct terminology and mention open questions or edge cases.',
};

export const TUTOR_SYSTEM_PROMPT = [
  'You are a patient, encouraging tutor answering a student\'s spoken or typed question.',
  'Explain clearly, check understanding with a short follow-up question, and relate ideas to real-world examples.',
  'When reference material is provided, prefer it over your own recollection. If you are unsure, say so.',
].join(' ');

export interface PromptInput {
  queryText: string;
  context: GroundingContext;
  /** Earlier interactions of the session, oldest first */
  history: readonly Interaction[];
  level: LearnerLevel;
}

export function buildPrompt(input: PromptInput): GenerationPrompt {
  const messages: ChatMessage[] = [
    { role: 'system', content: `${TUTOR_SYSTEM_PROMPT}\n${LEVEL_GUIDANCE[input.level]}` },
  ];

  for (const past of input.history) {
    if (!past.queryText) continue; // turns that were not understood
    messages.push({ role: 'user', content: past.queryText });
    messages.push({ role: 'assistant', content: past.responseText });
  }

  if (input.context.text) {
    messages.push({
      role: 'user',
      content: `Reference material from the course knowledge base:\n${input.context.text}`,
    });
  }

  messages.push({ role: 'user', content: input.queryText });
  return { messages };
}

const ACTIVITY_TEMPLATES: Record<LearnerLevel, ((topic: string) => string)[]> = {
  beginner: [
    topic => `Watch a short introductory video about ${topic}`,
    topic => `Make flashcards for the key terms of ${topic}`,
    topic => `Draw a simple labelled diagram of ${topic}`,
  ],
  intermediate: [
    topic => `Find two real-world applications of ${topic}`,
    topic => `Build a mind map linking ${topic} to related concepts`,
    topic => `Explain ${topic} in your own words to a classmate`,
  ],
  advanced: [
    topic => `Read a recent research summary on ${topic}`,
    topic => `Write a critical analysis of a common misconception about ${topic}`,
    topic => `Design a small experiment or model that tests an idea from ${topic}`,
  ],
};

/**
 * Study activities for a topic at the learner's level
 */
export function suggestActivities(topic: string, level: LearnerLevel): string[] {
  return ACTIVITY_TEMPLATES[level].map(template => template(topic));
}
