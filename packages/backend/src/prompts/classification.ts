import type { RetrievedDocument } from "@taxograph/shared";

export function buildClassificationPrompt(query: string, documents: RetrievedDocument[]): string {
  const context = documents
    .map((doc) =>
      [
        `HSN Code: ${doc.metadata.hsnCode || "N/A"}`,
        `Description: ${doc.text}`,
        `Graph Context: ${doc.graphContext ?? "N/A"}`
      ].join("\n")
    )
    .join("\n---\n");

  return `
User query: "${query}"

Based on the following retrieved HSN code information, provide a structured answer.
- Classify the user's query with the most likely HSN code.
- Provide a confidence level (High, Medium, Low).
- Explain your reasoning based on the provided context.
- List the top 3 potential matches with their descriptions.

Context:
${context}
`.trim();
}
