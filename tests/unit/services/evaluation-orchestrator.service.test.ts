import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
    EvaluationOrchestrator,
    SENIORITY_BARS,
    aggregate,
    groundedSpans
} from '../../../src/services/evaluation-orchestrator.service';
import { EvaluationUnavailable, NotFoundError, ProviderError } from '../../../src/errors';
import type { ILogger } from '../../../src/config/logger';
import type { CompleteOptions } from '../../../src/providers/provider-gateway.service';
import type { DimensionScore } from '../../../src/types/evaluation';
import { sleep } from '../../../src/utils/async.util';
import { tokenize } from '../../../src/utils/similarity.util';
import { createMockLogger } from '../../helpers/mock-logger';
import { ScriptedGateway } from '../../helpers/scripted-gateway';
import {
    testAnswer,
    testCache,
    testFramework,
    testJobContext,
    testQuestion,
    testQuestionSet,
    testRegistry
} from '../../helpers/fixtures';

type Reply = object | ((options: CompleteOptions) => Promise<unknown>);

function competencyOf(prompt: string): string {
    const match = /Competency: (.+)\n/.exec(prompt);
    if (!match) {
        throw new Error('prompt without competency');
    }
    return match[1];
}

function scripted(replies: Record<string, Reply>): ScriptedGateway {
    return new ScriptedGateway((prompt, options) => {
        const reply = replies[competencyOf(prompt)];
        if (reply instanceof Error) {
            throw reply;
        }
        if (typeof reply === 'function') {
            return reply(options);
        }
        return reply;
    });
}

function scoreOf(rawScore: number, confidence = 0.9): object {
    return { raw_score: rawScore, confidence, justification: `Scored ${rawScore}`, contributing_spans: [] };
}

function sectionOf(prompt: string, start: string, end: string): string {
    const from = prompt.indexOf(start) + start.length;
    return prompt.slice(from, prompt.indexOf(end, from));
}

/**
 * Deterministic evaluator: mostly the share of each expected component's
 * content words found in the answer, plus a little for length.
 */
function coverageScore(prompt: string): object {
    const answerWords = tokenize(sectionOf(prompt, 'Candidate answer:\n"""\n', '\n"""'));
    const components = sectionOf(prompt, 'A strong answer covers:\n', '\n\nScoring anchors:')
        .split('\n')
        .map(line => tokenize(line.replace(/^- /, '')));
    const coverage = components
        .map(words => Array.from(words).filter(word => answerWords.has(word)).length / words.size)
        .reduce((sum, share) => sum + share, 0) / components.length;
    return scoreOf(0.8 * coverage + 0.2 * Math.min(1, answerWords.size / 30));
}

function dimension(competencyId: string, rawScore: number): DimensionScore {
    return {
        answerId: 'answer-1',
        competencyId,
        rubricVersion: 'rubric-1',
        rawScore,
        confidence: 0.9,
        justification: '',
        contributingSpans: []
    };
}

function untilAborted(options: CompleteOptions): Promise<unknown> {
    return new Promise((_, reject) => {
        options.signal?.addEventListener('abort', () => {
            reject(new ProviderError('Cancelled', 'openai: cancelled by caller', 'openai'));
        }, { once: true });
    });
}

describe('EvaluationOrchestrator', () => {
    let logger: ILogger;

    function orchestrator(gateway: ScriptedGateway): EvaluationOrchestrator {
        return new EvaluationOrchestrator(gateway, testRegistry(logger), testCache(logger), logger, 60_000);
    }

    beforeEach(() => {
        logger = createMockLogger();
    });

    it('should score every targeted competency and combine them by weight', async () => {
        const gateway = scripted({
            'API Design': scoreOf(0.8),
            Databases: scoreOf(0.6),
            Ownership: scoreOf(0.5)
        });

        const composite = await orchestrator(gateway).evaluate(testAnswer(), testQuestionSet(), testFramework(), testJobContext());

        expect(composite.answerId).toBe('answer-1');
        expect(composite.partial).toBe(false);
        expect(composite.failures).toEqual([]);
        expect(composite.dimensions.map(d => [d.competencyId, d.rawScore])).toEqual([
            ['api-design', 0.8],
            ['databases', 0.6],
            ['ownership', 0.5]
        ]);
        expect(composite.raw).toBeCloseTo(0.68, 10);
        expect(composite.effectiveWeights['api-design']).toBeCloseTo(0.5, 10);
        expect(composite.dimensions[0].rubricVersion).toBe('rubric-1');
        expect(gateway.calls).toHaveLength(3);
        expect(gateway.calls.every(call => call.modelHint === 'quality')).toBe(true);
        expect(gateway.calls[0].options.promptName).toBe('dimension-evaluation@v1');
    });

    it('should put the seniority bar and rubric anchors into the prompt', async () => {
        const gateway = scripted({ 'API Design': scoreOf(0.8), Databases: scoreOf(0.6), Ownership: scoreOf(0.5) });

        await orchestrator(gateway).evaluate(testAnswer(), testQuestionSet(), testFramework(), testJobContext());

        expect(gateway.prompts[0]).toContain(`Expectation bar for a senior candidate: ${SENIORITY_BARS.senior}`);
        expect(gateway.prompts[0]).toContain('- 0.70-1.00: Thorough');
    });

    it('should clamp scores and keep only spans quoted from the answer', async () => {
        const gateway = scripted({
            'API Design': {
                raw_score: 1.4,
                confidence: -0.2,
                justification: 'Strong',
                contributing_spans: [
                    { text: 'IDEMPOTENCY   keys', polarity: ' Positive' },
                    { text: 'event sourcing', polarity: 'negative' },
                    { text: 'payment row', polarity: 'mixed' }
                ]
            },
            Databases: scoreOf(0.6),
            Ownership: scoreOf(0.5)
        });

        const composite = await orchestrator(gateway).evaluate(testAnswer(), testQuestionSet(), testFramework(), testJobContext());

        const [api] = composite.dimensions;
        expect(api.rawScore).toBe(1);
        expect(api.confidence).toBe(0);
        expect(api.contributingSpans).toEqual([
            { text: 'IDEMPOTENCY   keys', polarity: 'positive' },
            { text: 'payment row', polarity: 'neutral' }
        ]);
    });

    it('should redistribute the weight of failed dimensions', async () => {
        const gateway = scripted({
            'API Design': scoreOf(0.8),
            Databases: new ProviderError('AllProvidersExhausted', 'All providers exhausted for dimension-evaluation@v1'),
            Ownership: scoreOf(0.5)
        });

        const composite = await orchestrator(gateway).evaluate(testAnswer(), testQuestionSet(), testFramework(), testJobContext());

        expect(composite.partial).toBe(true);
        expect(composite.failures).toEqual([{
            competencyId: 'databases',
            reason: 'provider_error',
            message: 'All providers exhausted for dimension-evaluation@v1'
        }]);
        expect(composite.effectiveWeights['databases']).toBe(0);
        expect(composite.effectiveWeights['api-design']).toBeCloseTo(0.5 / 0.7, 10);
        expect(composite.effectiveWeights['ownership']).toBeCloseTo(0.2 / 0.7, 10);
        expect(composite.raw).toBeCloseTo(0.5 / 0.7, 10);
        expect(logger.warn).toHaveBeenCalledWith(
            expect.objectContaining({ competencyId: 'databases', reason: 'provider_error' }),
            'Dimension evaluation failed'
        );
    });

    it('should classify malformed evaluator output', async () => {
        const gateway = scripted({
            'API Design': scoreOf(0.8),
            Databases: { raw_score: 'high' },
            Ownership: scoreOf(0.5)
        });

        const composite = await orchestrator(gateway).evaluate(testAnswer(), testQuestionSet(), testFramework(), testJobContext());

        expect(composite.failures.map(f => [f.competencyId, f.reason])).toEqual([['databases', 'malformed_response']]);
    });

    it('should report dimensions still running at the deadline', async () => {
        const gateway = scripted({
            'API Design': scoreOf(0.8),
            Databases: scoreOf(0.6),
            Ownership: untilAborted
        });

        const composite = await orchestrator(gateway).evaluate(
            testAnswer(),
            testQuestionSet(),
            testFramework(),
            testJobContext(),
            { deadlineMs: 20 }
        );

        expect(composite.partial).toBe(true);
        expect(composite.failures).toEqual([{
            competencyId: 'ownership',
            reason: 'deadline_exceeded',
            message: 'Evaluation deadline of 20ms exceeded'
        }]);
        expect(composite.raw).toBeCloseTo((0.5 * 0.8 + 0.3 * 0.6) / 0.8, 10);
    });

    describe('with fake timers', () => {
        beforeEach(() => {
            vi.useFakeTimers();
        });

        afterEach(() => {
            vi.useRealTimers();
        });

        it('should settle at the deadline when no evaluator can finish in time', async () => {
            const slow = async (options: CompleteOptions) => {
                await sleep(5000, options.signal);
                return scoreOf(0.9);
            };
            const gateway = scripted({ 'API Design': slow, Databases: slow, Ownership: slow });

            const pending = orchestrator(gateway).evaluate(
                testAnswer(),
                testQuestionSet(),
                testFramework(),
                testJobContext(),
                { deadlineMs: 2000 }
            );
            const outcome = expect(pending).rejects.toMatchObject({
                code: 'evaluation_unavailable',
                failures: [
                    { competencyId: 'api-design', message: 'Evaluation deadline of 2000ms exceeded' },
                    { competencyId: 'databases', message: 'Evaluation deadline of 2000ms exceeded' },
                    { competencyId: 'ownership', message: 'Evaluation deadline of 2000ms exceeded' }
                ]
            });
            await vi.advanceTimersByTimeAsync(2000);

            await outcome;
            expect(gateway.calls).toHaveLength(3);
        });
    });

    it('should raise EvaluationUnavailable when every dimension fails', async () => {
        const failure = new ProviderError('AllProvidersExhausted', 'All providers exhausted for dimension-evaluation@v1');
        const gateway = scripted({ 'API Design': failure, Databases: failure, Ownership: failure });

        const error = await orchestrator(gateway)
            .evaluate(testAnswer(), testQuestionSet(), testFramework(), testJobContext())
            .catch((e: unknown) => e);

        expect(error).toBeInstanceOf(EvaluationUnavailable);
        if (error instanceof EvaluationUnavailable) {
            expect(error.failures.map(f => f.competencyId)).toEqual(['api-design', 'databases', 'ownership']);
        }
    });

    it('should score a blank answer zero without calling a provider', async () => {
        const gateway = scripted({});

        const composite = await orchestrator(gateway).evaluate(
            testAnswer({ text: '   \n ' }),
            testQuestionSet(),
            testFramework(),
            testJobContext()
        );

        expect(composite.raw).toBe(0);
        expect(composite.dimensions.every(d => d.rawScore === 0 && d.confidence === 1)).toBe(true);
        expect(gateway.calls).toHaveLength(0);
    });

    it('should reuse cached scores for a cosmetically different copy of the answer', async () => {
        const gateway = scripted({ 'API Design': scoreOf(0.8), Databases: scoreOf(0.6), Ownership: scoreOf(0.5) });
        const subject = orchestrator(gateway);

        const first = await subject.evaluate(testAnswer(), testQuestionSet(), testFramework(), testJobContext());
        const second = await subject.evaluate(
            testAnswer({
                id: 'answer-2',
                text: '  I would require IDEMPOTENCY keys and store them in   PostgreSQL next to the payment row. '
            }),
            testQuestionSet(),
            testFramework(),
            testJobContext()
        );

        expect(gateway.calls).toHaveLength(3);
        expect(second.raw).toBe(first.raw);
        expect(second.answerId).toBe('answer-2');
        expect(second.dimensions.every(d => d.answerId === 'answer-2')).toBe(true);
    });

    it('should not share cached scores across seniority levels', async () => {
        const gateway = scripted({ 'API Design': scoreOf(0.8), Databases: scoreOf(0.6), Ownership: scoreOf(0.5) });
        const subject = orchestrator(gateway);

        await subject.evaluate(testAnswer(), testQuestionSet(), testFramework(), testJobContext());
        await subject.evaluate(
            testAnswer(),
            testQuestionSet(),
            testFramework(),
            testJobContext({ attributes: { seniority: 'junior', domain: 'backend', cultureTags: [] } })
        );

        expect(gateway.calls).toHaveLength(6);
    });

    it('should score the same answer to different questions separately', async () => {
        const gateway = new ScriptedGateway(prompt => scoreOf(prompt.includes('rate limiter') ? 0.2 : 0.9));
        const subject = orchestrator(gateway);
        const questionSet = testQuestionSet({
            questions: [
                testQuestion({ competencyIds: ['api-design'] }),
                testQuestion({
                    id: 'question-2',
                    competencyIds: ['api-design'],
                    text: 'How would you build a distributed rate limiter for the public API?'
                })
            ]
        });

        const first = await subject.evaluate(testAnswer(), questionSet, testFramework(), testJobContext());
        const second = await subject.evaluate(
            testAnswer({ id: 'answer-2', questionId: 'question-2' }),
            questionSet,
            testFramework(),
            testJobContext()
        );

        expect(first.raw).toBe(0.9);
        expect(second.raw).toBe(0.2);
        expect(gateway.calls).toHaveLength(2);
    });

    it('should not cut short a caller that joined an evaluation started under a tighter deadline', async () => {
        const gateway = new ScriptedGateway(async (_prompt, options) => {
            await sleep(200, options.signal);
            return scoreOf(0.7);
        });
        const subject = orchestrator(gateway);
        const questionSet = testQuestionSet({ questions: [testQuestion({ competencyIds: ['api-design'] })] });

        const hurried = subject.evaluate(testAnswer(), questionSet, testFramework(), testJobContext(), { deadlineMs: 50 });
        const hurriedOutcome = expect(hurried).rejects.toMatchObject({
            code: 'evaluation_unavailable',
            failures: [{ competencyId: 'api-design', message: 'Evaluation deadline of 50ms exceeded' }]
        });
        const patient = await subject.evaluate(
            testAnswer({ id: 'answer-2' }),
            questionSet,
            testFramework(),
            testJobContext(),
            { deadlineMs: 5000 }
        );

        await hurriedOutcome;
        expect(patient.raw).toBe(0.7);
        expect(patient.answerId).toBe('answer-2');
        expect(gateway.calls).toHaveLength(1);
    });

    it('should score paraphrased answers with equivalent content alike', async () => {
        const gateway = new ScriptedGateway(prompt => coverageScore(prompt));
        const subject = orchestrator(gateway);
        const questionSet = testQuestionSet({
            questions: [testQuestion({
                text: 'How would you manage UI state in a large single-page application?',
                rubric: {
                    version: 'rubric-ui-state',
                    expectedAnswerComponents: ['state container', 'UI state', 'single source of truth', 'derived state'],
                    scoringAnchors: []
                }
            })]
        });

        const first = await subject.evaluate(
            testAnswer({ text: 'I would use a client-side state container to manage UI state, keeping a single source of truth that components subscribe to.' }),
            questionSet,
            testFramework(),
            testJobContext()
        );
        const second = await subject.evaluate(
            testAnswer({
                id: 'answer-2',
                text: 'My approach would involve a state container pattern for handling UI state, so every component reads from a single source of truth.'
            }),
            questionSet,
            testFramework(),
            testJobContext()
        );

        expect(gateway.calls).toHaveLength(6);
        expect(first.raw).toBeCloseTo(0.7933, 3);
        expect(second.raw).toBeCloseTo(0.8, 10);
        expect(Math.abs(first.raw - second.raw)).toBeLessThan(0.1);
    });

    it('should warn about question competencies missing from the framework', async () => {
        const gateway = scripted({ 'API Design': scoreOf(0.8) });
        const questionSet = testQuestionSet({ questions: [testQuestion({ competencyIds: ['api-design', 'testing'] })] });

        const composite = await orchestrator(gateway).evaluate(testAnswer(), questionSet, testFramework(), testJobContext());

        expect(composite.dimensions.map(d => d.competencyId)).toEqual(['api-design']);
        expect(composite.raw).toBe(0.8);
        expect(logger.warn).toHaveBeenCalledWith({
            answerId: 'answer-1',
            questionId: 'question-1',
            frameworkId: 'framework-1',
            competencyIds: ['testing']
        }, 'Question targets competencies missing from the framework, skipping them');
    });

    it('should reject answers to questions outside the set', async () => {
        const gateway = scripted({});

        await expect(orchestrator(gateway).evaluate(
            testAnswer({ questionId: 'question-9' }),
            testQuestionSet(),
            testFramework(),
            testJobContext()
        )).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should reject questions whose competencies left the framework', async () => {
        const gateway = scripted({});
        const framework = testFramework({
            competencies: [{ id: 'testing', name: 'Testing', category: 'technical', weight: 1, rationale: '' }]
        });

        await expect(orchestrator(gateway).evaluate(testAnswer(), testQuestionSet(), framework, testJobContext()))
            .rejects.toBeInstanceOf(EvaluationUnavailable);
    });
});

describe('groundedSpans', () => {
    it('should match quotes regardless of case and spacing', () => {
        const spans = groundedSpans([
            { text: 'Retry  WITH backoff', polarity: 'positive' },
            { text: ' ', polarity: 'neutral' },
            { text: 'circuit breaker', polarity: 'negative' }
        ], 'We retry with backoff on 503s.');

        expect(spans).toEqual([{ text: 'Retry  WITH backoff', polarity: 'positive' }]);
    });
});

describe('aggregate', () => {
    const competencies = testFramework().competencies;

    it('should use the framework weights when nothing failed', () => {
        const composite = aggregate('answer-1', competencies, [
            dimension('api-design', 1),
            dimension('databases', 0),
            dimension('ownership', 0)
        ], []);

        expect(composite.raw).toBe(0.5);
        expect(composite.partial).toBe(false);
    });

    it('should split evenly when the surviving weights sum to zero', () => {
        const zeroWeighted = competencies.map(c => ({ ...c, weight: 0 }));

        const composite = aggregate('answer-1', zeroWeighted, [dimension('api-design', 1), dimension('databases', 0)], [
            { competencyId: 'ownership', reason: 'unknown', message: 'boom' }
        ]);

        expect(composite.effectiveWeights).toEqual({ 'api-design': 0.5, databases: 0.5, ownership: 0 });
        expect(composite.raw).toBe(0.5);
        expect(composite.partial).toBe(true);
    });
});
