/**
 * Assistant Pipeline - answers one student turn
 *
 * transcribe -> link entities -> build grounding context -> generate
 *   -> synthesize (optional) -> record interaction
 *
 * Each collaborator step reports a tagged StepResult instead of throwing.
 * `resolveResponse` is the only place that decides what the student hears
 * when a step failed.
 *
 * The study-support operations (question analysis, follow-ups, summaries,
 * learning gaps) call the same generator under the same budgets and fall
 * back to fixed values. They do not wait for the turn queue.
 */
import { v4 as uuidv4 } from 'uuid';
import { AppConfig, LearnerLevel } from '../config';
import { KnowledgeGraph } from '../knowledge-graph';
import { EntityLinker } from '../entity-linker';
import { StudentAnalytics } from '../analytics';
import { AudioPayload } from '../types/audio';
import { EntityMatch, KnowledgeNode } from '../types/knowledge';
import { Interaction, SessionReport } from '../types/interaction';
import { Collaborators } from '../collaborators/types';
import {
  CancelledError,
  CollaboratorError,
  CollaboratorStep,
  ErrorKind,
  GenerationError,
  SynthesisError,
  TranscriptionError,
  errorKind,
} from '../errors';
import { withTimeout } from '../utils/timeout';
import { metrics } from '../metrics/metrics';
import { logger } from '../utils/logger';
import {
  ContextOptions,
  EMPTY_CONTEXT,
  GroundingContext,
  buildGroundingContext,
  buildPrompt,
  suggestActivities,
} from './prompt';
import {
  ComplexityAnalysis,
  FALLBACK_FOLLOW_UPS,
  MAX_FOLLOW_UPS,
  MAX_LEARNING_GAPS,
  NO_CONVERSATION_SUMMARY,
  SUMMARY_UNAVAILABLE,
  complexityPrompt,
  fallbackComplexity,
  followUpPrompt,
  gapsPrompt,
  parseComplexity,
  parseLines,
  summaryPrompt,
} from './learning';

export const NOT_UNDERSTOOD_RESPONSE = "I couldn't understand what you said. Please try speaking more clearly.";
export const APOLOGY_RESPONSE = "I'm sorry, I couldn't come up with an answer right now. Please try asking again.";

export type TurnOutcome = 'answered' | 'fallback_summary' | 'fallback_apology' | 'not_understood';

export interface TurnResult {
  interaction: Interaction;
  /** Synthesized answer audio, null when synthesis is off or failed */
  speech: Buffer | null;
  outcome: TurnOutcome;
  /** Collaborator steps that failed during this turn */
  degraded: CollaboratorStep[];
  context: GroundingContext;
}

export interface TurnOptions {
  /** Aborting cancels the turn; nothing is recorded */
  signal?: AbortSignal;
}

export interface QuestionAnalysis {
  complexity: ComplexityAnalysis;
  entities: EntityMatch[];
  hasKnowledgeContext: boolean;
  /** Entity names of the nodes related to the matched ones */
  suggestedTopics: string[];
}

export interface RelatedContent {
  nodeId: string;
  entity: string;
  summary: string;
  relationType: string;
  /** Matched node the relationship starts from */
  fromEntity: string;
}

export interface LearningRecommendations {
  /** Best matched entity, or "general learning" when nothing matched */
  topic: string;
  complexityLevel: LearnerLevel;
  followUpQuestions: string[];
  relatedContent: RelatedContent[];
  suggestedActivities: string[];
}

export const GENERAL_TOPIC = 'general learning';
export const MAX_REPORTED_GAPS = 3;

export type StepFailure = {
  ok: false;
  step: CollaboratorStep;
  kind: ErrorKind;
  error: CollaboratorError;
};

export type StepResult<T> = { ok: true; value: T } | StepFailure;

export interface ResolvedResponse {
  text: string;
  outcome: TurnOutcome;
}

/**
 * The degraded-response policy:
 * - transcription failed: "could not understand" message
 * - generation failed: best match's summary, or an apology when nothing matched
 */
export function resolveResponse(
  transcription: StepResult<string>,
  generation: StepResult<string> | null,
  bestMatch: KnowledgeNode | undefined,
): ResolvedResponse {
  if (!transcription.ok) {
    return { text: NOT_UNDERSTOOD_RESPONSE, outcome: 'not_understood' };
  }
  if (generation?.ok) {
    return { text: generation.value, outcome: 'answered' };
  }
  if (bestMatch) {
    return { text: bestMatch.summary, outcome: 'fallback_summary' };
  }
  return { text: APOLOGY_RESPONSE, outcome: 'fallback_apology' };
}

function stepError(step: CollaboratorStep, cause: unknown): CollaboratorError {
  const message = cause instanceof Error ? cause.message : String(cause);
  switch (step) {
    case 'transcription':
      return new TranscriptionError(message, { cause });
    case 'generation':
      return new GenerationError(message, { cause });
    case 'synthesis':
      return new SynthesisError(message, { cause });
  }
}

export interface AssistantPipelineOptions {
  /** Per-call budgets in ms */
  timeouts: Record<CollaboratorStep, number>;
  context: ContextOptions;
  historyTurns: number;
  minTranscriptionConfidence: number;
  learnerLevel: LearnerLevel;
  /** Estimate each question's level and pitch the answer to it */
  adaptLevel?: boolean;
  now?: () => Date;
}

export interface AssistantPipelineDeps {
  graph: KnowledgeGraph;
  linker?: EntityLinker;
  collaborators: Collaborators;
  analytics: StudentAnalytics;
}

export function pipelineOptionsFromConfig(config: Pick<AppConfig, 'pipeline' | 'timeouts'>): AssistantPipelineOptions {
  const { pipeline, timeouts } = config;
  return {
    timeouts: { ...timeouts },
    context: {
      maxEntities: pipeline.contextMaxEntities,
      relatedDepth: pipeline.contextRelatedDepth,
      maxRelated: pipeline.contextMaxRelated,
      maxChars: pipeline.contextMaxChars,
    },
    historyTurns: pipeline.historyTurns,
    minTranscriptionConfidence: pipeline.minTranscriptionConfidence,
    learnerLevel: pipeline.learnerLevel,
    adaptLevel: pipeline.adaptLevel,
  };
}

export class AssistantPipeline {
  private readonly graph: KnowledgeGraph;
  private readonly linker: EntityLinker;
  private readonly collaborators: Collaborators;
  private readonly analytics: StudentAnalytics;
  private readonly options: AssistantPipelineOptions;
  private readonly now: () => Date;
  private level: LearnerLevel;

  // Tail of the turn queue; turns of one session run one at a time
  private tail: Promise<unknown> = Promise.resolve();

  constructor(deps: AssistantPipelineDeps, options: AssistantPipelineOptions) {
    this.graph = deps.graph;
    this.linker = deps.linker ?? new EntityLinker(deps.graph);
    this.collaborators = deps.collaborators;
    this.analytics = deps.analytics;
    this.options = options;
    this.now = options.now ?? (() => new Date());
    this.level = options.learnerLevel;
  }

  get sessionId(): string {
    return this.analytics.sessionId;
  }

  get learnerLevel(): LearnerLevel {
    return this.level;
  }

  setLearnerLevel(level: LearnerLevel): void {
    this.level = level;
  }

  /**
   * Answer a spoken question
   * @throws CancelledError when `options.signal` aborts before the interaction is recorded
   */
  handleTurn(audio: AudioPayload, options: TurnOptions = {}): Promise<TurnResult> {
    return this.enqueue(() => this.runTurn(options.signal, async signal => {
      return this.runStep('transcription', signal, async stepSignal => {
        const result = await this.collaborators.transcriber.transcribe(audio, { signal: stepSignal });
        const text = result.text.trim();
        if (!text) {
          throw new TranscriptionError('Transcription was empty');
        }
        if (result.confidence !== undefined && result.confidence < this.options.minTranscriptionConfidence) {
          throw new TranscriptionError(
            `Transcription confidence ${result.confidence} below ${this.options.minTranscriptionConfidence}`,
          );
        }
        return text;
      });
    }));
  }

  /**
   * Answer a typed question; starts at entity linking
   * @throws CancelledError when `options.signal` aborts before the interaction is recorded
   */
  handleText(queryText: string, options: TurnOptions = {}): Promise<TurnResult> {
    const text = queryText.trim();
    return this.enqueue(() => this.runTurn(options.signal, async () => {
      if (!text) {
        return this.failure('transcription', new TranscriptionError('Question was empty'));
      }
      return { ok: true, value: text };
    }));
  }

  /**
   * Estimate a question's level and find what the knowledge base holds on it.
   * A failed estimate falls back to the learner's level.
   * @throws CancelledError when `options.signal` aborts
   */
  async analyzeQuestion(question: string, options: TurnOptions = {}): Promise<QuestionAnalysis> {
    const complexity = await this.estimateComplexity(question, options.signal);
    const entities = this.linker.link(question);
    const context = buildGroundingContext(this.graph, entities, this.options.context);

    return {
      complexity,
      entities,
      hasKnowledgeContext: context.entries.length > 0,
      suggestedTopics: context.entries
        .filter(entry => entry.kind === 'related_topic')
        .map(entry => entry.entity),
    };
  }

  /**
   * Three to five open questions about a topic; a generic one when
   * generation fails or returns nothing
   * @throws CancelledError when `options.signal` aborts
   */
  async followUpQuestions(topic: string, level: LearnerLevel = this.level, options: TurnOptions = {}): Promise<string[]> {
    const result = await this.runStep('generation', options.signal, signal =>
      this.collaborators.generator.generate(followUpPrompt(topic, level), { signal }),
    );
    const questions = result.ok ? parseLines(result.value, MAX_FOLLOW_UPS) : [];
    return questions.length > 0 ? questions : [...FALLBACK_FOLLOW_UPS];
  }

  /**
   * What to study next after a question: follow-ups, related course
   * material and activities, all at the question's estimated level
   * @throws CancelledError when `options.signal` aborts
   */
  async learningRecommendations(question: string, options: TurnOptions = {}): Promise<LearningRecommendations> {
    const analysis = await this.analyzeQuestion(question, options);
    const best = analysis.entities.length > 0 ? this.graph.getNode(analysis.entities[0].nodeId) : undefined;
    const topic = best?.entity ?? GENERAL_TOPIC;
    const level = analysis.complexity.level;

    const context = buildGroundingContext(this.graph, analysis.entities, this.options.context);
    const relatedContent: RelatedContent[] = [];
    for (const entry of context.entries) {
      if (!entry.via) continue;
      relatedContent.push({
        nodeId: entry.nodeId,
        entity: entry.entity,
        summary: entry.summary,
        relationType: entry.via.relationType,
        fromEntity: entry.via.fromEntity,
      });
    }

    return {
      topic,
      complexityLevel: level,
      followUpQuestions: await this.followUpQuestions(topic, level, options),
      relatedContent,
      suggestedActivities: suggestActivities(topic, level),
    };
  }

  /**
   * Generated summary of the session so far
   * @throws CancelledError when `options.signal` aborts
   */
  async summarizeConversation(options: TurnOptions = {}): Promise<string> {
    const interactions = this.analytics.history();
    if (interactions.length === 0) return NO_CONVERSATION_SUMMARY;

    const result = await this.runStep('generation', options.signal, signal =>
      this.collaborators.generator.generate(summaryPrompt(interactions), { signal }),
    );
    if (!result.ok) return SUMMARY_UNAVAILABLE;
    return result.value.trim() || SUMMARY_UNAVAILABLE;
  }

  /**
   * Areas that need attention, judged from the latest question against the
   * earlier ones. Empty when nothing was asked or generation fails.
   * @throws CancelledError when `options.signal` aborts
   */
  async detectLearningGaps(options: TurnOptions = {}): Promise<string[]> {
    const questions = this.analytics.history()
      .map(interaction => interaction.queryText)
      .filter(query => query !== '');
    if (questions.length === 0) return [];

    const recent = questions[questions.length - 1];
    const result = await this.runStep('generation', options.signal, signal =>
      this.collaborators.generator.generate(gapsPrompt(recent, questions.slice(0, -1)), { signal }),
    );
    return result.ok ? parseLines(result.value, MAX_LEARNING_GAPS) : [];
  }

  /**
   * Insights of the session plus its learning gaps and a generated summary
   * @throws CancelledError when `options.signal` aborts
   */
  async sessionReport(options: TurnOptions = {}): Promise<SessionReport> {
    const insights = this.analytics.insights();
    const { interactionCount, sessionDurationSeconds } = this.analytics.summary();
    const knowledgeGaps = await this.detectLearningGaps(options);
    const conversationSummary = await this.summarizeConversation(options);

    const recommendations = [...insights.recommendations];
    if (knowledgeGaps.length > 0) {
      recommendations.push(`Focus on these areas: ${knowledgeGaps.slice(0, MAX_REPORTED_GAPS).join(', ')}`);
    }

    return {
      ...insights,
      recommendations,
      interactionCount,
      sessionDurationSeconds,
      knowledgeGaps,
      conversationSummary,
    };
  }

  private async estimateComplexity(question: string, signal: AbortSignal | undefined): Promise<ComplexityAnalysis> {
    const result = await this.runStep('generation', signal, async stepSignal => {
      const reply = await this.collaborators.generator.generate(complexityPrompt(question), { signal: stepSignal });
      return parseComplexity(reply);
    });
    return result.ok ? result.value : fallbackComplexity(this.level);
  }

  private enqueue<T>(turn: () => Promise<T>): Promise<T> {
    const run = this.tail.then(turn);
    // The caller sees the failure through `run`; the queue only needs to move on
    this.tail = run.catch(() => undefined);
    return run;
  }

  private async runTurn(
    signal: AbortSignal | undefined,
    obtainQuery: (signal: AbortSignal | undefined) => Promise<StepResult<string>>,
  ): Promise<TurnResult> {
    const endTimer = metrics.turnDuration.startTimer();
    try {
      const result = await this.answer(signal, obtainQuery);
      metrics.turnsTotal.inc({ outcome: result.outcome });
      return result;
    } catch (err) {
      if (err instanceof CancelledError) {
        metrics.turnsCancelled.inc();
        logger.info({ sessionId: this.sessionId }, 'Turn cancelled, nothing recorded');
      }
      throw err;
    } finally {
      endTimer();
    }
  }

  private async answer(
    signal: AbortSignal | undefined,
    obtainQuery: (signal: AbortSignal | undefined) => Promise<StepResult<string>>,
  ): Promise<TurnResult> {
    this.throwIfCancelled(signal);
    const degraded: CollaboratorStep[] = [];

    const transcription = await obtainQuery(signal);
    let matches: EntityMatch[] = [];
    let context = EMPTY_CONTEXT;
    let generation: StepResult<string> | null = null;
    let complexity: LearnerLevel | undefined;

    if (transcription.ok) {
      if (this.options.adaptLevel) {
        // A failed estimate is logged by runStep; the answer uses the learner's level
        const estimate = await this.estimateComplexity(transcription.value, signal);
        if (estimate.estimated) complexity = estimate.level;
      }

      matches = this.linker.link(transcription.value);
      metrics.entityMatchesTotal.inc(matches.length);
      context = buildGroundingContext(this.graph, matches, this.options.context);

      const prompt = buildPrompt({
        queryText: transcription.value,
        context,
        history: this.analytics.history(this.options.historyTurns),
        level: complexity ?? this.level,
      });

      generation = await this.runStep('generation', signal, stepSignal =>
        this.collaborators.generator.generate(prompt, { signal: stepSignal }),
      );
      if (!generation.ok) degraded.push('generation');
    } else {
      degraded.push('transcription');
    }

    const bestMatch = matches.length > 0 ? this.graph.getNode(matches[0].nodeId) : undefined;
    const response = resolveResponse(transcription, generation, bestMatch);

    let speech: Buffer | null = null;
    const { synthesizer } = this.collaborators;
    if (synthesizer) {
      const synthesis = await this.runStep('synthesis', signal, stepSignal =>
        synthesizer.synthesize(response.text, { signal: stepSignal }),
      );
      if (synthesis.ok) {
        speech = synthesis.value;
      } else {
        degraded.push('synthesis');
      }
    }

    this.throwIfCancelled(signal);

    const interaction: Interaction = Object.freeze({
      id: uuidv4(),
      sessionId: this.sessionId,
      timestamp: this.now().toISOString(),
      queryText: transcription.ok ? transcription.value : '',
      matchedEntities: Object.freeze(matches.map(match => match.nodeId)),
      responseText: response.text,
      ...(complexity ? { complexity } : {}),
    });
    this.analytics.record(interaction);

    logger.info({
      sessionId: this.sessionId,
      interactionId: interaction.id,
      outcome: response.outcome,
      matchedEntities: interaction.matchedEntities,
      degraded,
    }, 'Turn answered');

    return { interaction, speech, outcome: response.outcome, degraded, context };
  }

  /**
   * Run one collaborator call under its budget. Cancellation propagates;
   * every other failure becomes a StepFailure.
   */
  private async runStep<T>(
    step: CollaboratorStep,
    signal: AbortSignal | undefined,
    call: (signal: AbortSignal) => Promise<T>,
  ): Promise<StepResult<T>> {
    try {
      const value = await withTimeout(step, this.options.timeouts[step], signal, call);
      return { ok: true, value };
    } catch (err) {
      if (err instanceof CancelledError) throw err;
      this.throwIfCancelled(signal);
      return this.failure(step, err instanceof CollaboratorError ? err : stepError(step, err));
    }
  }

  private failure(step: CollaboratorStep, error: CollaboratorError): StepFailure {
    const kind = errorKind(error);
    metrics.collaboratorFailures.inc({ step, kind });
    logger.warn({ sessionId: this.sessionId, step, kind, error }, 'Collaborator step failed, degrading response');
    return { ok: false, step, kind, error };
  }

  private throwIfCancelled(signal: AbortSignal | undefined): void {
    if (signal?.aborted) {
      throw new CancelledError();
    }
  }
}
