import type { PromptTemplate } from '../prompt.types';

export const DIMENSION_EVALUATION_V1: PromptTemplate = {
    name: 'dimension-evaluation',
    version: 'v1',
    weight: 1,
    system: 'You are a calibrated interview assessor. Score only the competency you are given and judge what was written, not what was intended.',
    placeholders: [
        { name: 'competencyName', required: true },
        { name: 'competencyRationale', required: true },
        { name: 'seniority', required: true },
        { name: 'seniorityBar', required: true },
        { name: 'question', required: true },
        { name: 'expectedComponents', required: true },
        { name: 'scoringAnchors', required: true },
        { name: 'answer', required: true }
    ],
    text: `Score the candidate's answer on a single competency.

Competency: {{competencyName}}
Why it matters: {{competencyRationale}}

Expectation bar for a {{seniority}} candidate: {{seniorityBar}}

Question:
{{question}}

A strong answer covers:
{{expectedComponents}}

Scoring anchors:
{{scoringAnchors}}

Candidate answer:
"""
{{answer}}
"""

Instructions:
- raw_score is in [0, 1] and must fall inside the anchor band that best describes the answer.
- confidence is in [0, 1]; lower it when the answer is short, off-topic or ambiguous.
- contributing_spans quote the answer verbatim, each marked positive, negative or neutral.

Output STRICT JSON:
{
  "raw_score": 0.0,
  "confidence": 0.0,
  "justification": "string, 2-4 sentences",
  "contributing_spans": [{ "text": "verbatim quote", "polarity": "positive | negative | neutral" }]
}`
};
