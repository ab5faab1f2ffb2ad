export interface ScoreBand {
    min: number;
    max: number;
}

export interface ScoringAnchor {
    band: ScoreBand;
    description: string;
}

export interface Rubric {
    version: string;
    expectedAnswerComponents: string[];
    /** Ordered by band.min ascending. */
    scoringAnchors: ScoringAnchor[];
}

export interface Question {
    id: string;
    competencyIds: string[];
    text: string;
    rubric: Rubric;
    followUpQuestions: string[];
}

export interface QuestionSetMetadata {
    templateVersion: string;
    generatedAt: string;
    correctiveRequests: number;
}

export interface QuestionSet {
    id: string;
    jobContextId: string;
    frameworkId: string;
    questions: Question[];
    generationMetadata: QuestionSetMetadata;
    partialCoverage: boolean;
    uncoveredCompetencyIds: string[];
}
