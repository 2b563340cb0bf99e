import { describe, it, expect } from "vitest";
import { JsonContextExtractor } from "../src/extraction/json_extractor.js";
import { ExtractionFailedError } from "../src/shared/errors.js";
import { sha256Bytes } from "../src/shared/hash.js";
import { ingestTemplateDefinition } from "../src/templates/ingest.js";
import { signatureOfStyle } from "../src/verify/signature.js";

const minimalContext = {
  name: "Normal",
  context: { elementType: "paragraph", contextKey: "p1" },
};

function bytes(value: unknown): Buffer {
  return Buffer.from(JSON.stringify(value));
}

describe("JsonContextExtractor", () => {
  const extractor = new JsonContextExtractor();

  it("accepts a bare context list and applies defaults", async () => {
    const [ctx] = await extractor.extractContexts(bytes([minimalContext]));
    expect(ctx.styleType).toBe("paragraph");
    expect(ctx.properties).toEqual({});
    expect(ctx.tabStops).toEqual([]);
    expect(ctx.directFormatPatterns).toEqual([]);
    expect(ctx.context).toEqual({
      elementType: "paragraph",
      contextKey: "p1",
      structuralRole: "",
      contentControlProperties: {},
    });
  });

  it("accepts the wrapped export form", async () => {
    const contexts = await extractor.extractContexts(
      bytes({ documentName: "a.docx", contexts: [minimalContext, minimalContext] }),
    );
    expect(contexts).toHaveLength(2);
  });

  it("defaults a tab stop leader to none", async () => {
    const [ctx] = await extractor.extractContexts(
      bytes([{ ...minimalContext, tabStops: [{ alignment: "right", position: 72 }] }]),
    );
    expect(ctx.tabStops).toEqual([{ alignment: "right", leader: "none", position: 72 }]);
  });

  it("tolerates a UTF-8 byte order mark", async () => {
    const withBom = Buffer.concat([Buffer.from([0xef, 0xbb, 0xbf]), bytes([minimalContext])]);
    await expect(extractor.extractContexts(withBom)).resolves.toHaveLength(1);
  });

  it("raises ExtractionFailedError for malformed JSON", async () => {
    await expect(extractor.extractContexts(Buffer.from("{"))).rejects.toThrow(
      ExtractionFailedError,
    );
  });

  it("raises ExtractionFailedError for records that fail validation", async () => {
    const bad = bytes({ contexts: [{ name: "Normal", context: { elementType: "paragraph" } }] });
    await expect(extractor.extractContexts(bad)).rejects.toThrow(
      "Document export failed validation: contexts.0.context.contextKey: Required",
    );
  });
});

describe("ingestTemplateDefinition", () => {
  const definition = {
    name: "Letter",
    styles: [
      { ...minimalContext, fontFamily: "Georgia", fontSize: 12, properties: { IsBold: true } },
    ],
  };

  it("builds a draft with hash, size and signatures", () => {
    const raw = bytes(definition);
    const draft = ingestTemplateDefinition(raw, "letter.json", "tester", { filePath: "/defs/letter.json" });

    expect(draft.name).toBe("Letter");
    expect(draft.description).toBe("");
    expect(draft.fileName).toBe("letter.json");
    expect(draft.filePath).toBe("/defs/letter.json");
    expect(draft.fileHash).toBe(sha256Bytes(raw));
    expect(draft.fileSize).toBe(raw.byteLength);
    expect(draft.createdBy).toBe("tester");

    const [style] = draft.textStyles;
    expect(style.signature).toBe('bold=true;fontFamily="Georgia";fontSize=12;styleType="paragraph"');
    expect(style.signature).toBe(signatureOfStyle(style).value);
    expect(style.signatureTruncated).toBe(false);
  });

  it("rejects a definition without styles", () => {
    expect(() => ingestTemplateDefinition(bytes({ name: "Empty", styles: [] }), "e.json", "tester")).toThrow(
      ExtractionFailedError,
    );
  });
});
