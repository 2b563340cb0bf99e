import { describe, it, expect } from "vitest";
import { matchContexts } from "../src/verify/matcher.js";
import { docStyle, textStyle } from "./helpers.js";

describe("Context matcher", () => {
  it("pairs by context key before falling back to element type and role", () => {
    const heading = textStyle(2, "h1", {}, { structuralRole: "Heading1" });
    const body = textStyle(1, "p1");
    const outcome = matchContexts(
      [heading, body],
      [docStyle("p1"), docStyle("x7", {}, { structuralRole: "Heading1" })],
    );

    expect(outcome.matched.map((m) => [m.template.id, m.documentIndex, m.matchedBy])).toEqual([
      [1, 0, "contextKey"],
      [2, 1, "elementRole"],
    ]);
    expect(outcome.missing).toEqual([]);
    expect(outcome.unexpected).toEqual([]);
  });

  it("lets an earlier template claim by role before a later template's key", () => {
    const a = textStyle(1, "a");
    const b = textStyle(2, "b");
    const outcome = matchContexts([b, a], [docStyle("b")]);

    expect(outcome.matched.map((m) => [m.template.id, m.documentIndex, m.matchedBy])).toEqual([
      [1, 0, "elementRole"],
    ]);
    expect(outcome.missing.map((t) => t.id)).toEqual([2]);
    expect(outcome.unexpected).toEqual([]);
  });

  it("prefers a key match over a role match for the same template", () => {
    const outcome = matchContexts([textStyle(1, "p5")], [docStyle("x1"), docStyle("p5")]);
    expect(outcome.matched[0].documentIndex).toBe(1);
    expect(outcome.matched[0].matchedBy).toBe("contextKey");
    expect(outcome.unexpected.map((u) => u.documentIndex)).toEqual([0]);
  });

  it("breaks ties by document insertion order", () => {
    const outcome = matchContexts([textStyle(1, "p1")], [docStyle("p1"), docStyle("p1")]);
    expect(outcome.matched[0].documentIndex).toBe(0);
    expect(outcome.unexpected.map((u) => u.documentIndex)).toEqual([1]);
  });

  it("compares element type and role case-insensitively", () => {
    const outcome = matchContexts(
      [textStyle(1, "t1", {}, { elementType: "Paragraph", structuralRole: "HEADING1" })],
      [docStyle("d1", {}, { elementType: "paragraph", structuralRole: " heading1 " })],
    );
    expect(outcome.matched).toHaveLength(1);
    expect(outcome.matched[0].matchedBy).toBe("elementRole");
  });

  it("does not pair different roles", () => {
    const outcome = matchContexts(
      [textStyle(1, "p9", {}, { structuralRole: "Footer" })],
      [docStyle("c3", {}, { structuralRole: "Caption" })],
    );
    expect(outcome.matched).toEqual([]);
    expect(outcome.missing.map((t) => t.context.contextKey)).toEqual(["p9"]);
    expect(outcome.unexpected.map((u) => u.document.context.contextKey)).toEqual(["c3"]);
  });

  it("accounts for every context exactly once on both sides", () => {
    const templates = [
      textStyle(3, "p3"),
      textStyle(1, "p1"),
      textStyle(2, "h1", {}, { structuralRole: "Heading1" }),
      textStyle(4, "t1", {}, { elementType: "table", structuralRole: "Grid" }),
    ];
    const documents = [
      docStyle("p1"),
      docStyle("p2"),
      docStyle("h9", {}, { structuralRole: "Heading1" }),
      docStyle("p3"),
      docStyle("c1", {}, { structuralRole: "Caption" }),
    ];
    const outcome = matchContexts(templates, documents);

    const templateIds = [
      ...outcome.matched.map((m) => m.template.id),
      ...outcome.missing.map((t) => t.id),
    ].sort();
    expect(templateIds).toEqual([1, 2, 3, 4]);

    const documentIndices = [
      ...outcome.matched.map((m) => m.documentIndex),
      ...outcome.unexpected.map((u) => u.documentIndex),
    ].sort();
    expect(documentIndices).toEqual([0, 1, 2, 3, 4]);
    expect(outcome.missing.map((t) => t.id)).toEqual([4]);
  });
});
