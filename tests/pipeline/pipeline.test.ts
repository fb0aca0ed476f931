/**
 * Tests for the assistant pipeline
 */
import {
  APOLOGY_RESPONSE,
  AssistantPipeline,
  GENERAL_TOPIC,
  AssistantPipelineOptions,
  NOT_UNDERSTOOD_RESPONSE,
  StepResult,
  pipelineOptionsFromConfig,
  resolveResponse,
} from '../../src/pipeline';
import { StudentAnalytics } from '../../src/analytics';
import { CancelledError, GenerationError, TranscriptionError } from '../../src/errors';
import { Synthesizer, Transcription } from '../../src/collaborators/types';
import {
  FALLBACK_FOLLOW_UPS,
  NO_CONVERSATION_SUMMARY,
  SUMMARY_UNAVAILABLE,
  fallbackComplexity,
} from '../../src/pipeline/learning';
import { logger } from '../../src/utils/logger';
import Config from '../../src/config';
import { fakeCollaborators, fakeSynthesizer, fixtureGraph, hangUntilAborted } from '../helpers';

const NOW = '2024-03-01T10:00:00.000Z';
const AUDIO = { pcm: new Int16Array(160), sampleRate: 16000 };
const BEGINNER_ESTIMATE = '{"complexity_level":"beginner","subject_area":"biology","key_concepts":["photosynthesis"],"confidence_score":0.8}';
const ADVANCED_ESTIMATE = '{"complexity_level":"advanced","subject_area":"biology","key_concepts":["dna"],"confidence_score":0.9}';

const options: AssistantPipelineOptions = {
  timeouts: { transcription: 1000, generation: 1000, synthesis: 1000 },
  context: { maxEntities: 3, relatedDepth: 1, maxRelated: 3, maxChars: 2000 },
  historyTurns: 5,
  minTranscriptionConfidence: 0.5,
  learnerLevel: 'intermediate',
  now: () => new Date(NOW),
};

function setup(overrides: Partial<AssistantPipelineOptions> = {}, synthesizer: Synthesizer | null = null) {
  const fakes = fakeCollaborators();
  const analytics = new StudentAnalytics('session-1');
  const pipeline = new AssistantPipeline(
    {
      graph: fixtureGraph(),
      collaborators: { ...fakes.collaborators, synthesizer },
      analytics,
    },
    { ...options, ...overrides },
  );
  return { ...fakes, analytics, pipeline };
}

function tick(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}

describe('AssistantPipeline', () => {
  describe('handleTurn', () => {
    it('should transcribe, link, generate and record the interaction', async () => {
      const { pipeline, transcribe, generate, analytics } = setup();

      const result = await pipeline.handleTurn(AUDIO);

      expect(transcribe).toHaveBeenCalledWith(AUDIO, { signal: expect.any(AbortSignal) });
      expect(generate).toHaveBeenCalledTimes(1);
      expect(result.outcome).toBe('answered');
      expect(result.degraded).toEqual([]);
      expect(result.speech).toBeNull();
      expect(result.interaction).toMatchObject({
        sessionId: 'session-1',
        timestamp: NOW,
        queryText: 'What is photosynthesis?',
        matchedEntities: ['photosynthesis'],
        responseText: 'Generated answer.',
      });
      expect(analytics.history()).toEqual([result.interaction]);
    });

    it('should ground the prompt in the matched entity and its neighbours', async () => {
      const { pipeline, generate } = setup();

      await pipeline.handleTurn(AUDIO);

      const [prompt] = generate.mock.calls[0];
      expect(prompt.messages).toHaveLength(3);
      expect(prompt.messages[0].role).toBe('system');
      expect(prompt.messages[1]).toEqual({
        role: 'user',
        content: [
          'Reference material from the course knowledge base:',
          'Photosynthesis: Plants turn light into chemical energy.',
          '- Photosynthesis occurs in Chloroplast: Organelle where photosynthesis happens.',
          '- Photosynthesis produces Glucose: A simple sugar.',
        ].join('\n'),
      });
      expect(prompt.messages[2]).toEqual({ role: 'user', content: 'What is photosynthesis?' });
    });

    it('should fall back to the best match summary when generation fails', async () => {
      const { pipeline, generate } = setup();
      generate.mockRejectedValue(new Error('quota exceeded'));

      const result = await pipeline.handleTurn(AUDIO);

      expect(result.interaction.responseText).toBe('Plants turn light into chemical energy.');
      expect(result.outcome).toBe('fallback_summary');
      expect(result.degraded).toEqual(['generation']);
      expect(logger.warn).toHaveBeenCalledWith(
        expect.objectContaining({ step: 'generation', kind: 'failure', error: expect.any(GenerationError) }),
        'Collaborator step failed, degrading response',
      );
    });

    it.each<{ label: string; transcription: Transcription }>([
      { label: 'empty', transcription: { text: '   ' } },
      { label: 'low-confidence', transcription: { text: 'photosynthesis', confidence: 0.2 } },
    ])('should answer an $label transcription with the not-understood message', async ({ transcription }) => {
      const { pipeline, transcribe, generate, analytics } = setup();
      transcribe.mockResolvedValue(transcription);

      const result = await pipeline.handleTurn(AUDIO);

      expect(result.outcome).toBe('not_understood');
      expect(result.degraded).toEqual(['transcription']);
      expect(result.interaction.queryText).toBe('');
      expect(result.interaction.matchedEntities).toEqual([]);
      expect(result.interaction.responseText).toBe(NOT_UNDERSTOOD_RESPONSE);
      expect(generate).not.toHaveBeenCalled();
      expect(analytics.interactionCount).toBe(1);
    });

    it('should treat a failing transcriber as not understood', async () => {
      const { pipeline, transcribe } = setup();
      transcribe.mockRejectedValue(new TranscriptionError('service unavailable'));

      const result = await pipeline.handleTurn(AUDIO);

      expect(result.outcome).toBe('not_understood');
      expect(result.interaction.responseText).toBe(NOT_UNDERSTOOD_RESPONSE);
    });

    it('should degrade a transcription timeout like a failure', async () => {
      const { pipeline, transcribe } = setup({ timeouts: { transcription: 20, generation: 1000, synthesis: 1000 } });
      transcribe.mockImplementation((_audio, { signal }) => hangUntilAborted(signal));

      const result = await pipeline.handleTurn(AUDIO);

      expect(result.outcome).toBe('not_understood');
      expect(logger.warn).toHaveBeenCalledWith(
        expect.objectContaining({ step: 'transcription', kind: 'timeout' }),
        'Collaborator step failed, degrading response',
      );
    });
  });

  describe('handleText', () => {
    it('should apologise when generation fails and nothing matched', async () => {
      const { pipeline, generate } = setup();
      generate.mockRejectedValue(new GenerationError('Chat completion returned no content'));

      const result = await pipeline.handleText('Tell me a joke');

      expect(result.outcome).toBe('fallback_apology');
      expect(result.interaction.matchedEntities).toEqual([]);
      expect(result.interaction.responseText).toBe(APOLOGY_RESPONSE);
    });

    it('should fall back when generation times out', async () => {
      const { pipeline, generate } = setup({ timeouts: { transcription: 1000, generation: 20, synthesis: 1000 } });
      generate.mockImplementation((_prompt, { signal }) => hangUntilAborted(signal));

      const result = await pipeline.handleText('What is DNA?');

      expect(result.outcome).toBe('fallback_summary');
      expect(result.interaction.responseText).toBe('Molecule that stores genetic information.');
      expect(logger.warn).toHaveBeenCalledWith(
        expect.objectContaining({ step: 'generation', kind: 'timeout' }),
        'Collaborator step failed, degrading response',
      );
    });

    it('should skip transcription', async () => {
      const { pipeline, transcribe } = setup();

      const result = await pipeline.handleText('  What is DNA?  ');

      expect(transcribe).not.toHaveBeenCalled();
      expect(result.interaction.queryText).toBe('What is DNA?');
      expect(result.interaction.matchedEntities).toEqual(['dna']);
    });

    it('should treat an empty question as not understood', async () => {
      const { pipeline } = setup();

      const result = await pipeline.handleText('   ');

      expect(result.outcome).toBe('not_understood');
    });

    it('should include earlier answered turns as history', async () => {
      const { pipeline, generate } = setup();
      generate.mockResolvedValueOnce('DNA stores genes.');

      await pipeline.handleText('What is DNA?');
      await pipeline.handleText('Tell me a joke');

      const [prompt] = generate.mock.calls[1];
      expect(prompt.messages.slice(1)).toEqual([
        { role: 'user', content: 'What is DNA?' },
        { role: 'assistant', content: 'DNA stores genes.' },
        { role: 'user', content: 'Tell me a joke' },
      ]);
    });

    it('should adjust the system prompt to the learner level', async () => {
      const { pipeline, generate } = setup();
      pipeline.setLearnerLevel('beginner');

      await pipeline.handleText('What is DNA?');

      const [prompt] = generate.mock.calls[0];
      expect(prompt.messages[0].content).toContain('The student is a beginner');
    });
  });

  describe('adaptive level', () => {
    it('should pitch the answer to the estimated level of the question', async () => {
      const { pipeline, generate } = setup({ adaptLevel: true });
      generate.mockResolvedValueOnce(ADVANCED_ESTIMATE);

      const result = await pipeline.handleText('What is DNA?');

      expect(generate).toHaveBeenCalledTimes(2);
      const [answerPrompt] = generate.mock.calls[1];
      expect(answerPrompt.messages[0].content).toContain('The student is advanced');
      expect(result.interaction.complexity).toBe('advanced');
      expect(result.interaction.responseText).toBe('Generated answer.');
      expect(pipeline.learnerLevel).toBe('intermediate');
    });

    it('should answer at the learner level when the estimate fails', async () => {
      const { pipeline, generate } = setup({ adaptLevel: true });
      generate.mockRejectedValueOnce(new Error('rate limited'));

      const result = await pipeline.handleText('What is DNA?');

      const [answerPrompt] = generate.mock.calls[1];
      expect(answerPrompt.messages[0].content).toContain('The student has some background');
      expect(result.outcome).toBe('answered');
      expect(result.degraded).toEqual([]);
      expect(result.interaction.complexity).toBeUndefined();
    });

    it('should not estimate unless enabled', async () => {
      const { pipeline, generate } = setup();

      const result = await pipeline.handleText('What is DNA?');

      expect(generate).toHaveBeenCalledTimes(1);
      expect(result.interaction).not.toHaveProperty('complexity');
    });
  });

  describe('analyzeQuestion', () => {
    it('should combine the level estimate with the linked entities', async () => {
      const { pipeline, generate } = setup();
      generate.mockResolvedValueOnce(BEGINNER_ESTIMATE);

      const analysis = await pipeline.analyzeQuestion('What is photosynthesis?');

      expect(analysis.complexity).toEqual({
        level: 'beginner',
        subjectArea: 'biology',
        keyConcepts: ['photosynthesis'],
        confidence: 0.8,
        estimated: true,
      });
      expect(analysis.entities.map(match => match.nodeId)).toEqual(['photosynthesis']);
      expect(analysis.hasKnowledgeContext).toBe(true);
      expect(analysis.suggestedTopics).toEqual(['Chloroplast', 'Glucose']);
    });

    it.each([
      { label: 'fails', reply: () => Promise.reject(new Error('quota exceeded')) },
      { label: 'is not JSON', reply: () => Promise.resolve('Generated answer.') },
    ])('should fall back to the learner level when generation $label', async ({ reply }) => {
      const { pipeline, generate } = setup();
      generate.mockImplementationOnce(reply);

      const analysis = await pipeline.analyzeQuestion('Tell me a joke');

      expect(analysis.complexity).toEqual(fallbackComplexity('intermediate'));
      expect(analysis.hasKnowledgeContext).toBe(false);
      expect(analysis.suggestedTopics).toEqual([]);
      expect(logger.warn).toHaveBeenCalledWith(
        expect.objectContaining({ step: 'generation', kind: 'failure' }),
        'Collaborator step failed, degrading response',
      );
    });
  });

  describe('followUpQuestions', () => {
    it('should return the generated questions for the topic and level', async () => {
      const { pipeline, generate } = setup();
      generate.mockResolvedValueOnce('1. Why is DNA a double helix?\n2. How is DNA copied?');

      const questions = await pipeline.followUpQuestions('DNA', 'advanced');

      expect(questions).toEqual(['Why is DNA a double helix?', 'How is DNA copied?']);
      const [prompt] = generate.mock.calls[0];
      expect(prompt.messages[0].content).toContain('about "DNA" for a student at the advanced level');
    });

    it.each([
      { label: 'fails', reply: () => Promise.reject(new Error('quota exceeded')) },
      { label: 'is blank', reply: () => Promise.resolve('  \n ') },
    ])('should offer a generic question when generation $label', async ({ reply }) => {
      const { pipeline, generate } = setup();
      generate.mockImplementationOnce(reply);

      await expect(pipeline.followUpQuestions('DNA')).resolves.toEqual([...FALLBACK_FOLLOW_UPS]);
    });

    it('should propagate cancellation', async () => {
      const { pipeline, generate } = setup();
      const controller = new AbortController();
      controller.abort();

      await expect(pipeline.followUpQuestions('DNA', 'beginner', { signal: controller.signal }))
        .rejects.toThrow(CancelledError);
      expect(generate).not.toHaveBeenCalled();
    });
  });

  describe('learningRecommendations', () => {
    it('should build recommendations around the best match at the estimated level', async () => {
      const { pipeline, generate } = setup();
      generate
        .mockResolvedValueOnce(BEGINNER_ESTIMATE)
        .mockResolvedValueOnce('- How do leaves capture light?\n- Why are plants green?');

      const recommendations = await pipeline.learningRecommendations('What is photosynthesis?');

      expect(recommendations).toEqual({
        topic: 'Photosynthesis',
        complexityLevel: 'beginner',
        followUpQuestions: ['How do leaves capture light?', 'Why are plants green?'],
        relatedContent: [
          {
            nodeId: 'chloroplast',
            entity: 'Chloroplast',
            summary: 'Organelle where photosynthesis happens.',
            relationType: 'occurs_in',
            fromEntity: 'Photosynthesis',
          },
          {
            nodeId: 'glucose',
            entity: 'Glucose',
            summary: 'A simple sugar.',
            relationType: 'produces',
            fromEntity: 'Photosynthesis',
          },
        ],
        suggestedActivities: [
          'Watch a short introductory video about Photosynthesis',
          'Make flashcards for the key terms of Photosynthesis',
          'Draw a simple labelled diagram of Photosynthesis',
        ],
      });
    });

    it('should fall back to general learning when nothing matched and generation fails', async () => {
      const { pipeline, generate } = setup();
      generate.mockRejectedValue(new Error('service down'));

      const recommendations = await pipeline.learningRecommendations('Tell me a joke');

      expect(recommendations.topic).toBe(GENERAL_TOPIC);
      expect(recommendations.complexityLevel).toBe('intermediate');
      expect(recommendations.followUpQuestions).toEqual([...FALLBACK_FOLLOW_UPS]);
      expect(recommendations.relatedContent).toEqual([]);
      expect(recommendations.suggestedActivities[0]).toBe('Find two real-world applications of general learning');
    });
  });

  describe('summarizeConversation', () => {
    it('should not call the generator for an empty session', async () => {
      const { pipeline, generate } = setup();

      await expect(pipeline.summarizeConversation()).resolves.toBe(NO_CONVERSATION_SUMMARY);
      expect(generate).not.toHaveBeenCalled();
    });

    it('should summarize the recorded exchanges', async () => {
      const { pipeline, generate } = setup();
      await pipeline.handleText('What is DNA?');
      generate.mockResolvedValueOnce('  Topics: DNA.  ');

      const summary = await pipeline.summarizeConversation();

      expect(summary).toBe('Topics: DNA.');
      const [prompt] = generate.mock.calls[1];
      expect(prompt.messages[0].content).toContain('Student: What is DNA?\nTutor: Generated answer.');
    });

    it('should report a failed summary', async () => {
      const { pipeline, generate } = setup();
      await pipeline.handleText('What is DNA?');
      generate.mockRejectedValueOnce(new Error('quota exceeded'));

      await expect(pipeline.summarizeConversation()).resolves.toBe(SUMMARY_UNAVAILABLE);
    });
  });

  describe('detectLearningGaps', () => {
    it('should find no gaps before any question', async () => {
      const { pipeline, generate } = setup();

      await expect(pipeline.detectLearningGaps()).resolves.toEqual([]);
      expect(generate).not.toHaveBeenCalled();
    });

    it('should judge the latest question against the earlier ones', async () => {
      const { pipeline, generate } = setup();
      await pipeline.handleText('What is DNA?');
      await pipeline.handleText('What is glucose?');
      generate.mockResolvedValueOnce('- Base pairing\n- Sugar metabolism');

      const gaps = await pipeline.detectLearningGaps();

      expect(gaps).toEqual(['Base pairing', 'Sugar metabolism']);
      const [prompt] = generate.mock.calls[2];
      expect(prompt.messages[0].content).toContain(
        'Most recent question: "What is glucose?"\nEarlier questions:\n- What is DNA?',
      );
    });

    it('should find no gaps when generation fails', async () => {
      const { pipeline, generate } = setup();
      await pipeline.handleText('What is DNA?');
      generate.mockRejectedValueOnce(new Error('quota exceeded'));

      await expect(pipeline.detectLearningGaps()).resolves.toEqual([]);
    });
  });

  describe('sessionReport', () => {
    it('should add gaps and a summary to the session insights', async () => {
      const { pipeline, generate } = setup();
      await pipeline.handleText('What is DNA?');
      generate
        .mockResolvedValueOnce('- Base pairing')
        .mockResolvedValueOnce('Summary.');

      const report = await pipeline.sessionReport();

      expect(report).toEqual({
        topicsDiscussed: ['dna'],
        averageQueryLength: 3,
        complexityProgression: { trend: 'insufficient_data' },
        recommendations: ['Focus on these areas: Base pairing'],
        interactionCount: 1,
        sessionDurationSeconds: 0,
        knowledgeGaps: ['Base pairing'],
        conversationSummary: 'Summary.',
      });
    });
  });

  describe('synthesis', () => {
    it('should return synthesized speech', async () => {
      const { synthesizer, synthesize } = fakeSynthesizer();
      const { pipeline } = setup({}, synthesizer);

      const result = await pipeline.handleText('What is DNA?');

      expect(synthesize).toHaveBeenCalledWith('Generated answer.', { signal: expect.any(AbortSignal) });
      expect(result.speech?.toString()).toBe('mp3-bytes');
    });

    it('should still answer in text when synthesis fails', async () => {
      const { synthesizer, synthesize } = fakeSynthesizer();
      synthesize.mockRejectedValue(new Error('tts down'));
      const { pipeline, analytics } = setup({}, synthesizer);

      const result = await pipeline.handleText('What is DNA?');

      expect(result.speech).toBeNull();
      expect(result.outcome).toBe('answered');
      expect(result.degraded).toEqual(['synthesis']);
      expect(result.interaction.responseText).toBe('Generated answer.');
      expect(analytics.interactionCount).toBe(1);
      expect(logger.warn).toHaveBeenCalledWith(
        expect.objectContaining({ step: 'synthesis', kind: 'failure' }),
        'Collaborator step failed, degrading response',
      );
    });
  });

  describe('cancellation', () => {
    it('should record nothing for a turn cancelled before it starts', async () => {
      const { pipeline, analytics } = setup();
      const controller = new AbortController();
      controller.abort();

      await expect(pipeline.handleText('What is DNA?', { signal: controller.signal })).rejects.toThrow(CancelledError);
      expect(analytics.interactionCount).toBe(0);
    });

    it('should record nothing for a turn cancelled during generation', async () => {
      const { pipeline, generate, analytics } = setup();
      generate.mockImplementation((_prompt, { signal }) => hangUntilAborted(signal));
      const controller = new AbortController();

      const turn = pipeline.handleText('What is DNA?', { signal: controller.signal });
      await tick();
      expect(generate).toHaveBeenCalledTimes(1);
      controller.abort();

      await expect(turn).rejects.toThrow(CancelledError);
      expect(analytics.interactionCount).toBe(0);
    });

    it('should keep serving turns after a cancelled one', async () => {
      const { pipeline, analytics } = setup();
      const controller = new AbortController();
      controller.abort();

      const cancelled = pipeline.handleText('What is DNA?', { signal: controller.signal });
      const next = pipeline.handleText('What is glucose?');

      await expect(cancelled).rejects.toThrow(CancelledError);
      await expect(next).resolves.toMatchObject({ outcome: 'answered' });
      expect(analytics.interactionCount).toBe(1);
    });
  });

  describe('serialization', () => {
    it('should answer turns of one session in arrival order', async () => {
      const { pipeline, generate, analytics } = setup();
      let finishFirst: (answer: string) => void = () => undefined;
      generate.mockImplementationOnce(() => new Promise<string>(resolve => {
        finishFirst = resolve;
      }));

      const first = pipeline.handleText('What is DNA?');
      const second = pipeline.handleText('What is glucose?');
      await tick();

      // The second turn waits for the first
      expect(generate).toHaveBeenCalledTimes(1);

      finishFirst('First answer.');
      await Promise.all([first, second]);

      expect(analytics.history().map(interaction => interaction.queryText)).toEqual([
        'What is DNA?',
        'What is glucose?',
      ]);
      const [secondPrompt] = generate.mock.calls[1];
      expect(secondPrompt.messages).toContainEqual({ role: 'assistant', content: 'First answer.' });
    });
  });
});

describe('resolveResponse', () => {
  const ok: StepResult<string> = { ok: true, value: 'Generated.' };
  const failed: StepResult<string> = {
    ok: false,
    step: 'generation',
    kind: 'failure',
    error: new GenerationError('boom'),
  };
  const dna = fixtureGraph().getNode('dna');

  it('should prefer the generated answer', () => {
    expect(resolveResponse(ok, ok, dna)).toEqual({ text: 'Generated.', outcome: 'answered' });
  });

  it('should fall back to the summary, then to an apology', () => {
    expect(resolveResponse(ok, failed, dna)).toEqual({
      text: 'Molecule that stores genetic information.',
      outcome: 'fallback_summary',
    });
    expect(resolveResponse(ok, failed, undefined)).toEqual({ text: APOLOGY_RESPONSE, outcome: 'fallback_apology' });
  });

  it('should report a failed transcription as not understood', () => {
    const notHeard: StepResult<string> = {
      ok: false,
      step: 'transcription',
      kind: 'timeout',
      error: new TranscriptionError('timed out'),
    };

    expect(resolveResponse(notHeard, null, dna)).toEqual({ text: NOT_UNDERSTOOD_RESPONSE, outcome: 'not_understood' });
  });
});

describe('pipelineOptionsFromConfig', () => {
  it('should map the pipeline and timeout settings', () => {
    const mapped = pipelineOptionsFromConfig(Config);

    expect(mapped.timeouts).toEqual(Config.timeouts);
    expect(mapped.context.maxChars).toBe(Config.pipeline.contextMaxChars);
    expect(mapped.learnerLevel).toBe(Config.pipeline.learnerLevel);
    expect(mapped.adaptLevel).toBe(false);
  });
});
