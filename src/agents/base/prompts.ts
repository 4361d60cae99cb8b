export const SYNTHESIS_GROUNDING = `Use only the tool results, the analysis and the previous specialist output below.
Do not invent facts that are not present in them. If a tool failed, say what could not be determined.
Be concise and direct.`;

export const SYNTHESIS_PROMPT_TEMPLATE = `QUERY: {{query}}

ANALYSIS:
{{analysis}}

PREVIOUS SPECIALIST OUTPUT:
{{context}}

TOOL RESULTS:
{{toolResults}}`;
