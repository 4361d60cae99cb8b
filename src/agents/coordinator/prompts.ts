export const COORDINATOR_SYSTEM_PROMPT = `You are the coordinator of a team of specialist agents.
Synthesize the specialists' responses into one coherent, complete answer to the user's query.
Keep facts exactly as the specialists stated them and do not add new ones.
Do not mention the specialists or the team.`;

export const FINAL_SYNTHESIS_TEMPLATE = `QUERY: {{query}}

SPECIALIST RESPONSES:
{{responses}}`;

export const APOLOGY_RESPONSE = "I'm sorry, I wasn't able to produce an answer to that query.";
