export const SENIORITY_LEVELS = ['intern', 'junior', 'mid', 'senior', 'staff', 'principal'] as const;

export type Seniority = typeof SENIORITY_LEVELS[number];

export interface JobAttributes {
    seniority: Seniority;
    domain: string;
    companySize?: string;
    cultureTags: string[];
    /** Explicit cohort family; derived from domain and seniority when absent. */
    family?: string;
}

/**
 * Immutable description of the position being hired for. `id` is the
 * content fingerprint of the normalized description text.
 */
export interface JobContext {
    id: string;
    description: string;
    attributes: JobAttributes;
    createdAt: string;
}
