export type PromptValue = string | number | readonly string[];

export type PromptContext = Readonly<Record<string, PromptValue | undefined>>;

export interface PlaceholderSpec {
    name: string;
    required: boolean;
}

/**
 * A versioned prompt. `weight` is the variant's share of traffic while more
 * than one version of the same template is live; 0 keeps a version
 * resolvable by pinning only.
 */
export interface PromptTemplate {
    name: string;
    version: string;
    text: string;
    system?: string;
    placeholders: readonly PlaceholderSpec[];
    weight: number;
}

export interface VariantSelector {
    subjectId?: string;
    experimentId?: string;
    /** Pin an exact version, bypassing variant assignment. */
    version?: string;
}
