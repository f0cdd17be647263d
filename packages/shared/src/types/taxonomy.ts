/**
 * One flat row of the commodity taxonomy, as produced by the ingestion pipeline.
 * `chapter`, `heading` and `subheading` are the 2/4/6-digit prefixes of `hsnCode`.
 */
export interface TaxonomyRecord {
  hsnCode: string;
  chapter: string;
  heading: string;
  subheading: string;
  itemDescription: string;
  chapterDescription: string;
  headingDescription: string;
  subheadingDescription: string;
}

export interface TaxonomyDocumentMetadata extends TaxonomyRecord {
  source?: string;
}

export interface TaxonomyDocument {
  id: string;
  text: string;
  metadata: TaxonomyDocumentMetadata;
}

export interface RetrievedDocument {
  id: string;
  text: string;
  metadata: TaxonomyDocumentMetadata;
  score: number;
  graphContext?: string;
}
