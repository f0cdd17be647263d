import type {
  RetrievedDocument,
  TaxonomyDocument,
  TaxonomyDocumentMetadata
} from "@taxograph/shared";

const chapterNames: Record<string, string> = {
  "40": "Rubber and articles thereof",
  "52": "Cotton"
};

export function makeDocument(
  hsnCode: string,
  itemDescription: string,
  overrides: Partial<TaxonomyDocumentMetadata> = {}
): TaxonomyDocument {
  const chapter = hsnCode.slice(0, 2);
  const metadata: TaxonomyDocumentMetadata = {
    hsnCode,
    chapter,
    heading: hsnCode.slice(0, 4),
    subheading: hsnCode.slice(0, 6),
    itemDescription,
    chapterDescription: chapterNames[chapter] ?? `Chapter ${chapter}`,
    headingDescription: `Heading ${hsnCode.slice(0, 4)}`,
    subheadingDescription: `Subheading ${hsnCode.slice(0, 6)}`,
    ...overrides
  };

  return {
    id: `hsn_${hsnCode}`,
    text: `Product: ${itemDescription}. HSN Code is ${hsnCode}.`,
    metadata
  };
}

export function retrieved(
  document: TaxonomyDocument,
  score: number,
  graphContext?: string
): RetrievedDocument {
  const result: RetrievedDocument = {
    id: document.id,
    text: document.text,
    metadata: { ...document.metadata },
    score
  };
  if (graphContext !== undefined) {
    result.graphContext = graphContext;
  }
  return result;
}

export const latexPrevulcanised = makeDocument("40011010", "Prevulcanised natural rubber latex", {
  headingDescription: "Natural rubber in primary forms",
  subheadingDescription: "Natural rubber latex"
});
export const latexOther = makeDocument("40011020", "Other natural rubber latex", {
  headingDescription: "Natural rubber in primary forms",
  subheadingDescription: "Natural rubber latex"
});
export const smokedSheets = makeDocument("40012100", "Smoked sheets of natural rubber", {
  headingDescription: "Natural rubber in primary forms",
  subheadingDescription: "Smoked sheets"
});
export const rawCotton = makeDocument("52010011", "Raw cotton, short staple", {
  headingDescription: "Cotton, not carded or combed",
  subheadingDescription: "Raw cotton"
});

export const FIXTURE_DOCUMENTS: TaxonomyDocument[] = [
  latexPrevulcanised,
  latexOther,
  smokedSheets,
  rawCotton
];
