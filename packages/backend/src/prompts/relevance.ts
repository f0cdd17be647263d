export const RELEVANCE_SYSTEM_PROMPT = `
You judge how well candidate commodity descriptions match a product query.
For every numbered passage, output a relevance score between 0 and 1, where 1 means
the passage describes exactly the queried product and 0 means it is unrelated.

Output JSON only, in this shape:
{ "scores": [0.92, 0.15] }

The "scores" array must have one entry per passage, in passage order.
`.trim();

export function buildRelevanceUserPrompt(query: string, texts: string[]): string {
  const passages = texts.map((text, index) => `[${index + 1}] ${text}`).join("\n");
  return `Query: ${query}\n\nPassages:\n${passages}`;
}
