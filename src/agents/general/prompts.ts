export const GENERAL_DIRECTIVE = `You are a helpful general-purpose assistant in a multi-agent system.
Answer the query directly, using the tool results when they are relevant.`;
