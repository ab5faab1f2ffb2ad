import type { PromptTemplate } from '../prompt.types';
import { DIMENSION_EVALUATION_V1 } from './dimension-evaluation.prompt';
import { QUESTION_SET_V1 } from './question-set.prompt';
import { THOUGHT_CHAIN_V1, THOUGHT_CHAIN_V2 } from './thought-chain.prompt';

export const TEMPLATE_NAMES = {
    thoughtChain: 'thought-chain',
    questionSet: 'question-set',
    dimensionEvaluation: 'dimension-evaluation'
} as const;

export const BUILT_IN_TEMPLATES: readonly PromptTemplate[] = [
    THOUGHT_CHAIN_V1,
    THOUGHT_CHAIN_V2,
    QUESTION_SET_V1,
    DIMENSION_EVALUATION_V1
];
