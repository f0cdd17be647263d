import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { z } from "zod";
import type { TaxonomyDocument, TaxonomyDocumentMetadata, TaxonomyRecord } from "@taxograph/shared";
import { childLogger } from "../utils/logger.js";

const log = childLogger("documents");

/** Vector stores key documents by code so direct lookups can fetch them by id. */
export const documentIdForCode = (hsnCode: string) => `hsn_${hsnCode}`;

const digits = (length: number) =>
  z.string().regex(new RegExp(`^\\d{${length}}$`), `expected ${length} digits`);

const descriptionField = z
  .string()
  .nullish()
  .transform((value) => (value && value.trim().length > 0 ? value : "Not specified"));

const rawMetadataSchema = z.object({
  hsn_code: digits(8),
  chapter: digits(2),
  heading: digits(4),
  subheading: digits(6),
  item_description: descriptionField,
  chapter_description: descriptionField,
  heading_description: descriptionField,
  subheading_description: descriptionField,
  source: z.string().optional()
});

const rawDocumentSchema = z
  .object({
    document_id: z.string().min(1),
    text: z.string().min(1),
    metadata: rawMetadataSchema
  })
  .superRefine((doc, ctx) => {
    const { hsn_code: code, chapter, heading, subheading } = doc.metadata;
    if (!code.startsWith(subheading) || !subheading.startsWith(heading) || !heading.startsWith(chapter)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["metadata", "hsn_code"],
        message: `hierarchy prefixes do not match code ${code}`
      });
    }
    if (doc.document_id !== documentIdForCode(code)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["document_id"],
        message: `document_id must be ${documentIdForCode(code)}`
      });
    }
  })
  .transform(
    (doc): TaxonomyDocument => ({
      id: doc.document_id,
      text: doc.text,
      metadata: toMetadata(doc.metadata)
    })
  );

export const ingestionFileSchema = z.array(rawDocumentSchema);

/** Camel-cased metadata as stored by the vector backends. */
export const taxonomyMetadataSchema = z.object({
  hsnCode: z.string(),
  chapter: z.string(),
  heading: z.string(),
  subheading: z.string(),
  itemDescription: z.string(),
  chapterDescription: z.string(),
  headingDescription: z.string(),
  subheadingDescription: z.string(),
  source: z.string().optional()
});

function toMetadata(raw: z.infer<typeof rawMetadataSchema>): TaxonomyDocumentMetadata {
  const metadata: TaxonomyDocumentMetadata = {
    hsnCode: raw.hsn_code,
    chapter: raw.chapter,
    heading: raw.heading,
    subheading: raw.subheading,
    itemDescription: raw.item_description,
    chapterDescription: raw.chapter_description,
    headingDescription: raw.heading_description,
    subheadingDescription: raw.subheading_description
  };
  if (raw.source !== undefined) {
    metadata.source = raw.source;
  }
  return metadata;
}

export function parseMetadata(value: unknown): TaxonomyDocumentMetadata {
  const parsed = taxonomyMetadataSchema.parse(value);
  const metadata: TaxonomyDocumentMetadata = {
    hsnCode: parsed.hsnCode,
    chapter: parsed.chapter,
    heading: parsed.heading,
    subheading: parsed.subheading,
    itemDescription: parsed.itemDescription,
    chapterDescription: parsed.chapterDescription,
    headingDescription: parsed.headingDescription,
    subheadingDescription: parsed.subheadingDescription
  };
  if (parsed.source !== undefined) {
    metadata.source = parsed.source;
  }
  return metadata;
}

export function parseDocuments(input: unknown): TaxonomyDocument[] {
  return ingestionFileSchema.parse(input);
}

export async function loadDocuments(filePath: string): Promise<TaxonomyDocument[]> {
  const target = resolve(filePath);
  log.info({ filePath: target }, "Loading taxonomy documents");
  const content = await readFile(target, "utf8");
  const documents = parseDocuments(JSON.parse(content));
  log.info({ count: documents.length }, "Loaded taxonomy documents");
  return documents;
}

export function toRecords(documents: TaxonomyDocument[]): TaxonomyRecord[] {
  return documents.map(({ metadata }) => ({
    hsnCode: metadata.hsnCode,
    chapter: metadata.chapter,
    heading: metadata.heading,
    subheading: metadata.subheading,
    itemDescription: metadata.itemDescription,
    chapterDescription: metadata.chapterDescription,
    headingDescription: metadata.headingDescription,
    subheadingDescription: metadata.subheadingDescription
  }));
}
