import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { afterEach, describe, expect, it } from "vitest";
import { ZodError } from "zod";
import {
  ingestionFileSchema,
  loadDocuments,
  parseDocuments,
  parseMetadata,
  toRecords
} from "../../../src/ingest/documents.js";

function rawDocument(overrides: Record<string, unknown> = {}) {
  return {
    document_id: "hsn_40011010",
    text: "Product: Prevulcanised latex. HSN Code is 40011010.",
    metadata: {
      hsn_code: "40011010",
      chapter: "40",
      heading: "4001",
      subheading: "400110",
      item_description: "Prevulcanised latex",
      chapter_description: "Rubber",
      heading_description: "Natural rubber",
      subheading_description: "Latex",
      ...overrides
    }
  };
}

describe("document ingestion", () => {
  let dir: string | null = null;

  afterEach(async () => {
    if (dir) {
      await rm(dir, { recursive: true, force: true });
      dir = null;
    }
  });

  it("converts snake_case records into taxonomy documents", () => {
    const [document] = parseDocuments([rawDocument({ source: "sample" })]);

    expect(document).toEqual({
      id: "hsn_40011010",
      text: "Product: Prevulcanised latex. HSN Code is 40011010.",
      metadata: {
        hsnCode: "40011010",
        chapter: "40",
        heading: "4001",
        subheading: "400110",
        itemDescription: "Prevulcanised latex",
        chapterDescription: "Rubber",
        headingDescription: "Natural rubber",
        subheadingDescription: "Latex",
        source: "sample"
      }
    });
  });

  it("requires the document id to follow the code", () => {
    const mismatched = { ...rawDocument(), document_id: "doc-0001" };

    const result = ingestionFileSchema.safeParse([mismatched]);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues.map((issue) => [issue.path.join("."), issue.message])).toEqual([
        ["0.document_id", "document_id must be hsn_40011010"]
      ]);
    }
  });

  it("fills missing descriptions with a placeholder", () => {
    const [document] = parseDocuments([rawDocument({ item_description: null, heading_description: "  " })]);

    expect(document?.metadata.itemDescription).toBe("Not specified");
    expect(document?.metadata.headingDescription).toBe("Not specified");
  });

  it("rejects codes whose prefixes disagree with the hierarchy", () => {
    expect(() => parseDocuments([rawDocument({ heading: "4002" })])).toThrow(ZodError);
    expect(() => parseDocuments([rawDocument({ hsn_code: "4001101" })])).toThrow(ZodError);
  });

  it("projects documents onto graph records", () => {
    const records = toRecords(parseDocuments([rawDocument({ source: "sample" })]));

    expect(records).toEqual([
      {
        hsnCode: "40011010",
        chapter: "40",
        heading: "4001",
        subheading: "400110",
        itemDescription: "Prevulcanised latex",
        chapterDescription: "Rubber",
        headingDescription: "Natural rubber",
        subheadingDescription: "Latex"
      }
    ]);
  });

  it("round-trips stored camelCase metadata", () => {
    const [document] = parseDocuments([rawDocument()]);

    expect(parseMetadata(JSON.parse(JSON.stringify(document?.metadata)))).toEqual(document?.metadata);
    expect(() => parseMetadata({ hsnCode: "1" })).toThrow(ZodError);
  });

  it("loads documents from a JSON file", async () => {
    dir = await mkdtemp(join(tmpdir(), "taxonomy-docs-"));
    const file = join(dir, "documents.json");
    await writeFile(file, JSON.stringify([rawDocument()]), "utf8");

    const documents = await loadDocuments(file);

    expect(documents.map((doc) => doc.id)).toEqual(["hsn_40011010"]);
  });

  it("accepts the bundled sample dataset", async () => {
    const documents = await loadDocuments(
      fileURLToPath(new URL("../../../data/sample_documents.json", import.meta.url))
    );

    expect(documents).toHaveLength(26);
    expect(new Set(documents.map((doc) => doc.id)).size).toBe(26);
  });
});
