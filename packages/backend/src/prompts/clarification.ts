import type { DisambiguationOption, TaxonomyDocumentMetadata } from "@taxograph/shared";

export const CLARIFICATION_PROMPT = `
Broad category questions span many codes, from raw materials to finished goods.

To help me find the correct code, could you describe the product itself? For example:
- What is it made of (e.g. **natural rubber**, **cotton**, **steel**)?
- What form is it in (raw material, semi-finished sheet or yarn, finished article)?
- What is it used for (e.g. **vehicle tyres**, **conveyor belts**, **apparel**)?
`.trim();

export const NO_RESULT_LOW_CONFIDENCE =
  "I'm sorry, but I couldn't find any relevant HSN codes for your query in my knowledge base.";

export const INVALID_SELECTION_UNPARSABLE = "I'm sorry, I didn't understand that selection.";

export const INVALID_SELECTION_OUT_OF_RANGE = "That's not a valid option number.";

export function buildDirectLookupSummary(hsnCode: string, meta: TaxonomyDocumentMetadata): string {
  return [
    `**Information for HSN Code ${hsnCode}:**`,
    "",
    `- **Description:** ${meta.itemDescription || "N/A"}`,
    "",
    "**Hierarchy:**",
    `- **Chapter (${meta.chapter}):** ${meta.chapterDescription || "N/A"}`,
    `- **Heading (${meta.heading}):** ${meta.headingDescription || "N/A"}`,
    `- **Subheading (${meta.subheading}):** ${meta.subheadingDescription || "N/A"}`
  ].join("\n");
}

export function buildDisambiguationPrompt(options: DisambiguationOption[]): string {
  const blocks = options.map((option, index) =>
    [
      `**Option ${index + 1}: HSN Code ${option.metadata.hsnCode || "N/A"}**`,
      `- Description: ${option.metadata.itemDescription || "N/A"}`,
      `- Context: This code is for products under the category of '${option.graphContext ?? "No additional context."}'.`
    ].join("\n")
  );

  return [
    "I found a few possible matches. To give you the most accurate HSN code, please help me clarify:",
    "",
    blocks.join("\n\n"),
    "",
    "Which option best describes your product? Please enter the option number (e.g., '1')."
  ].join("\n");
}

export function buildSelectionConfirmation(hsnCode: string): string {
  return `Thank you for clarifying. Based on your selection, the correct classification is HSN Code ${hsnCode}.`;
}
