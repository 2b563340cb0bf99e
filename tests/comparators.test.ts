import { describe, it, expect } from "vitest";
import {
  DirectFormatComparator,
  SignatureComparator,
  TabStopComparator,
  createDefaultComparators,
  describeTabStop,
} from "../src/verify/comparators/index.js";
import { docStyle, prepare } from "./helpers.js";

describe("SignatureComparator", () => {
  const comparator = new SignatureComparator();

  it("reports nothing for equal signatures", () => {
    expect(comparator.compare(prepare(docStyle("p1")), prepare(docStyle("p1")))).toEqual([]);
  });

  it("reports one tuple per differing canonical property", () => {
    const template = prepare(docStyle("p1", { color: "#000000" }));
    const document = prepare(docStyle("p1", { color: "#ff0000", properties: { IsBold: true } }));
    expect(comparator.compare(template, document)).toEqual([
      { field: "bold", expected: null, actual: true },
      { field: "color", expected: "#000000", actual: "#FF0000" },
    ]);
  });

  it("treats explicit defaults as equal to omitted values", () => {
    const template = prepare(docStyle("p1", { properties: {} }));
    const document = prepare(docStyle("p1", { properties: { italic: false, lineSpacing: 1 } }));
    expect(comparator.compare(template, document)).toEqual([]);
  });

  it("reports the signature itself when only truncation differs", () => {
    const style = docStyle("p1", { properties: { note: "n".repeat(600) } });
    const template = prepare(style, { maxLength: 80 });
    const document = prepare(style);
    const [tuple] = comparator.compare(template, document);
    expect(tuple.field).toBe("signature");
    expect(tuple.expected).toBe(template.signature.value);
    expect(tuple.actual).toBe(document.signature.value);
  });
});

describe("DirectFormatComparator", () => {
  const comparator = new DirectFormatComparator();
  const boldRun = { patternName: "BoldRun", context: "run", properties: { bold: true } };

  it("accepts an equivalent pattern in the same context", () => {
    const template = prepare(docStyle("p1", { directFormatPatterns: [boldRun] }));
    const document = prepare(
      docStyle("p1", {
        directFormatPatterns: [{ patternName: "Other", context: " run ", properties: { IsBold: true } }],
      }),
    );
    expect(comparator.compare(template, document)).toEqual([]);
  });

  it("reports a missing pattern with a null actual", () => {
    const template = prepare(docStyle("p1", { directFormatPatterns: [boldRun] }));
    const document = prepare(docStyle("p1"));
    expect(comparator.compare(template, document)).toEqual([
      { field: "DirectFormat:BoldRun", expected: "bold=true", actual: null },
    ]);
  });

  it("reports a differing pattern with both signatures", () => {
    const template = prepare(docStyle("p1", { directFormatPatterns: [boldRun] }));
    const document = prepare(
      docStyle("p1", {
        directFormatPatterns: [{ ...boldRun, properties: { bold: true, italic: true } }],
      }),
    );
    expect(comparator.compare(template, document)).toEqual([
      { field: "DirectFormat:BoldRun", expected: "bold=true", actual: "bold=true;italic=true" },
    ]);
  });

  it("reports document patterns in undeclared contexts", () => {
    const template = prepare(docStyle("p1"));
    const document = prepare(
      docStyle("p1", {
        directFormatPatterns: [
          { patternName: "LinkColor", context: "hyperlink", properties: { color: "0000ff" } },
        ],
      }),
    );
    expect(comparator.compare(template, document)).toEqual([
      { field: "UnexpectedDirectFormat:LinkColor", expected: null, actual: 'color="#0000FF"' },
    ]);
  });
});

describe("TabStopComparator", () => {
  const comparator = new TabStopComparator();

  it("reports a length difference once", () => {
    const template = prepare(
      docStyle("p1", {
        tabStops: [
          { alignment: "left", leader: "none" },
          { alignment: "right", leader: "dot" },
        ],
      }),
    );
    const document = prepare(docStyle("p1", { tabStops: [{ alignment: "left", leader: "none" }] }));
    expect(comparator.compare(template, document)).toEqual([
      { field: "TabStopCountMismatch", expected: 2, actual: 1 },
    ]);
  });

  it("compares stops index by index", () => {
    const template = prepare(
      docStyle("p1", { tabStops: [{ alignment: "left", leader: "none", position: 36 }] }),
    );
    const document = prepare(
      docStyle("p1", { tabStops: [{ alignment: "right", leader: "dot", position: 36 }] }),
    );
    expect(comparator.compare(template, document)).toEqual([
      { field: "TabStopMismatch", expected: "left/none@36", actual: "right/dot@36", index: 0 },
    ]);
  });

  it("treats order as significant", () => {
    const a = { alignment: "left" as const, leader: "none" as const };
    const b = { alignment: "right" as const, leader: "dot" as const };
    const result = comparator.compare(
      prepare(docStyle("p1", { tabStops: [a, b] })),
      prepare(docStyle("p1", { tabStops: [b, a] })),
    );
    expect(result.map((r) => r.index)).toEqual([0, 1]);
  });

  it("ignores positions unless both sides define one", () => {
    const template = prepare(
      docStyle("p1", { tabStops: [{ alignment: "center", leader: "none", position: 72 }] }),
    );
    const document = prepare(docStyle("p1", { tabStops: [{ alignment: "center", leader: "none" }] }));
    expect(comparator.compare(template, document)).toEqual([]);
  });

  it("describes stops as alignment/leader[@position]", () => {
    expect(describeTabStop({ alignment: "decimal", leader: "hyphen", position: 12.346 })).toBe(
      "decimal/hyphen@12.35",
    );
    expect(describeTabStop({ alignment: "bar", leader: "none", position: null })).toBe("bar/none");
  });
});

describe("createDefaultComparators", () => {
  it("returns the signature, direct-format and tab-stop comparators in order", () => {
    expect(createDefaultComparators().map((c) => c.name)).toEqual([
      "signature",
      "directFormat",
      "tabStops",
    ]);
  });
});
