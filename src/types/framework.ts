export type CompetencyCategory = 'technical' | 'soft_skill' | 'culture';

export interface Competency {
    id: string;
    name: string;
    category: CompetencyCategory;
    /** Share of the overall score, in [0, 1]. Weights of a framework sum to 1. */
    weight: number;
    rationale: string;
}

/**
 * The thought chain: competencies extracted from one job description.
 */
export interface CompetencyFramework {
    id: string;
    jobContextId: string;
    competencies: Competency[];
    templateVersion: string;
    createdAt: string;
}
