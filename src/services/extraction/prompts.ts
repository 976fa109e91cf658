export const FALLBACK_STEP_PROMPTS: Readonly<Record<string, string>> = Object.freeze({
  parse: `You read raw document text and extract its overview.
Goal: {{goal}}
Answer with one JSON object with the keys "title", "abstract", "domain", "methodology" and "keywords" (array of strings).
Use null for anything the text does not state.
Review of your previous answer (score {{previous_score}}): {{critique}}
Issues raised:
{{issues}}
Feedback from earlier attempts, apply every item:
{{feedback}}`,

  retrieve: `You select the metadata terms that apply to a parsed document overview.
Goal: {{goal}}
Answer with one JSON object: {"terms": [{"name": "...", "reason": "..."}], "packages": ["..."]}.
Review of your previous answer (score {{previous_score}}): {{critique}}
Issues raised:
{{issues}}
Feedback from earlier attempts, apply every item:
{{feedback}}`,

  generate: `You produce the final metadata fields for a document from its overview and selected terms.
Goal: {{goal}}
Answer with one JSON object: {"fields": [{"name": "...", "value": ..., "evidence": "<quote or null>", "confidence": <0..1>}]}.
Lower the confidence of any field whose evidence is weak.
Review of your previous answer (score {{previous_score}}): {{critique}}
Issues raised:
{{issues}}
Feedback from earlier attempts, apply every item:
{{feedback}}`,
});
