import type {
  ExtractedContext,
  FormattingContext,
  StyleSnapshot,
  Template,
  TextStyle,
} from "../src/shared/types.js";
import type { PreparedStyle } from "../src/verify/comparators/types.js";
import { signatureOfStyle, type SignatureOptions } from "../src/verify/signature.js";

export const FIXED_NOW = new Date("2026-01-15T10:00:00.000Z");
export const fixedClock = () => FIXED_NOW;

export function context(
  contextKey: string,
  overrides: Partial<FormattingContext> = {},
): FormattingContext {
  return {
    elementType: "paragraph",
    contextKey,
    structuralRole: "Body",
    contentControlProperties: {},
    ...overrides,
  };
}

export function docStyle(
  contextKey: string,
  overrides: Partial<StyleSnapshot> = {},
  contextOverrides: Partial<FormattingContext> = {},
): ExtractedContext {
  return {
    name: "Body",
    styleType: "paragraph",
    fontFamily: "Calibri",
    fontSize: 11,
    color: "#000000",
    alignment: "left",
    properties: {},
    directFormatPatterns: [],
    tabStops: [],
    context: context(contextKey, contextOverrides),
    ...overrides,
  };
}

export function textStyle(
  id: number,
  contextKey: string,
  overrides: Partial<StyleSnapshot> = {},
  contextOverrides: Partial<FormattingContext> = {},
): TextStyle {
  const snapshot = docStyle(contextKey, overrides, contextOverrides);
  const signature = signatureOfStyle(snapshot);
  return {
    ...snapshot,
    id,
    templateId: 1,
    signature: signature.value,
    signatureTruncated: signature.truncated,
    version: 1,
  };
}

export function template(textStyles: TextStyle[], overrides: Partial<Template> = {}): Template {
  return {
    id: 1,
    name: "Report",
    description: "",
    fileName: "report.json",
    filePath: "",
    fileHash: "0".repeat(64),
    fileSize: 0,
    status: "Active",
    version: 1,
    createdBy: "tester",
    createdOn: FIXED_NOW,
    textStyles,
    ...overrides,
  };
}

export function prepare(style: StyleSnapshot, options: SignatureOptions = {}): PreparedStyle {
  return { style, signature: signatureOfStyle(style, options) };
}
