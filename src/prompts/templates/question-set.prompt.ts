import type { PromptTemplate } from '../prompt.types';

export const QUESTION_SET_V1: PromptTemplate = {
    name: 'question-set',
    version: 'v1',
    weight: 1,
    system: 'You are a structured-interview designer. Questions are open-ended and answerable in a few paragraphs of free text.',
    placeholders: [
        { name: 'competencyId', required: true },
        { name: 'competencyName', required: true },
        { name: 'competencyCategory', required: true },
        { name: 'competencyRationale', required: true },
        { name: 'otherCompetencies', required: false },
        { name: 'seniority', required: true },
        { name: 'domain', required: true },
        { name: 'description', required: true },
        { name: 'correction', required: false }
    ],
    text: `Write between 1 and 3 interview questions that assess the competency below for a {{seniority}} {{domain}} role, each with a scoring rubric.

Competency id: {{competencyId}}
Competency: {{competencyName}} ({{competencyCategory}})
Why it matters: {{competencyRationale}}

Other competencies in the framework (a question may also target these, by id):
{{otherCompetencies}}

Job description:
"""
{{description}}
"""

Rubric rules:
- expected_answer_components: the concrete points a strong answer contains.
- scoring_anchors: 3 to 5 non-overlapping bands covering 0 to 1, lowest first.
- follow_up_questions: at most 2 probing follow-ups.

Output STRICT JSON:
{
  "questions": [
    {
      "text": "string",
      "competency_ids": ["{{competencyId}}", "optional other ids"],
      "expected_answer_components": ["string"],
      "scoring_anchors": [{ "min": 0, "max": 0.3, "description": "string" }],
      "follow_up_questions": ["string"]
    }
  ]
}

{{correction}}`
};
