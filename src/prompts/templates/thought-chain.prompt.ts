import type { PromptTemplate } from '../prompt.types';

const SYSTEM = 'You are an experienced technical recruiter who designs structured interview frameworks.';

const OUTPUT_CONTRACT = `Output STRICT JSON:
{
  "competencies": [
    {
      "name": "string, short competency name",
      "category": "technical | soft_skill | culture",
      "weight": "number between 0 and 1, importance relative to the others",
      "rationale": "string, why this matters for the role, quoting the description where possible"
    }
  ]
}`;

const PLACEHOLDERS = [
    { name: 'description', required: true },
    { name: 'seniority', required: true },
    { name: 'domain', required: true },
    { name: 'companySize', required: false },
    { name: 'cultureTags', required: false },
    { name: 'correction', required: false }
] as const;

export const THOUGHT_CHAIN_V1: PromptTemplate = {
    name: 'thought-chain',
    version: 'v1',
    weight: 1,
    system: SYSTEM,
    placeholders: PLACEHOLDERS,
    text: `Build a competency framework for the job below.

Work through it in three passes:
1. Technical requirements: languages, systems, methods the role depends on.
2. Soft skills: communication, ownership, collaboration signals.
3. Culture and team fit: values and working style stated or implied.

Return between 4 and 8 competencies. Include at least one technical and at least one non-technical competency. Weights should reflect how decisive each competency is for success in the role.

Seniority: {{seniority}}
Domain: {{domain}}
Company size: {{companySize}}
Culture tags:
{{cultureTags}}

Job description:
"""
{{description}}
"""

${OUTPUT_CONTRACT}

{{correction}}`
};

export const THOUGHT_CHAIN_V2: PromptTemplate = {
    name: 'thought-chain',
    version: 'v2',
    weight: 0,
    system: SYSTEM,
    placeholders: PLACEHOLDERS,
    text: `Read the job description and list the competencies a hiring panel should score.

For each competency, first quote the evidence in the description, then decide its category and importance. Prefer fewer, sharper competencies over many overlapping ones (4 to 6). At least one must be technical and at least one must be a soft skill or culture signal.

Role context: {{seniority}} level, {{domain}} domain, company size {{companySize}}.
Culture tags:
{{cultureTags}}

Job description:
"""
{{description}}
"""

${OUTPUT_CONTRACT}

{{correction}}`
};
