import { describe, it, expect } from "vitest";
import {
  ComparatorDefectError,
  ConfigError,
  TemplateInactiveError,
} from "../src/shared/errors.js";
import type { DimensionComparator } from "../src/verify/comparators/index.js";
import { verify } from "../src/verify/orchestrator.js";
import { docStyle, fixedClock, template, textStyle } from "./helpers.js";

describe("verify — scenarios", () => {
  it("reports a heading color change as one High mismatch", async () => {
    const t = template([
      textStyle(1, "p1", { name: "Heading1", color: "#000000" }, { structuralRole: "Heading1" }),
    ]);
    const doc = [docStyle("p1", { name: "Heading1", color: "#FF0000" }, { structuralRole: "Heading1" })];

    const result = await verify(t, doc, { now: fixedClock });

    expect(result.status).toBe("Completed");
    expect(result.mismatches).toHaveLength(1);
    const [m] = result.mismatches;
    expect(m.contextKey).toBe("p1");
    expect(m.fields).toEqual(["color"]);
    expect(m.severity).toBe("High");
    expect(m.category).toBe("StyleMismatch");
    expect(m.expected).toEqual({ color: "#000000" });
    expect(m.actual).toEqual({ color: "#FF0000" });
  });

  it("reports a missing trailing tab stop as a count mismatch", async () => {
    const t = template([
      textStyle(1, "p1", {
        tabStops: [
          { alignment: "left", leader: "none" },
          { alignment: "right", leader: "dot" },
        ],
      }),
    ]);
    const doc = [docStyle("p1", { tabStops: [{ alignment: "left", leader: "none" }] })];

    const result = await verify(t, doc, { now: fixedClock });

    expect(result.mismatches).toHaveLength(1);
    expect(result.mismatches[0].mismatchFields).toBe("TabStopCountMismatch");
    expect(result.mismatches[0].category).toBe("TabStopMismatch");
    expect(result.mismatches[0].severity).toBe("Medium");
  });

  it("escalates tab-stop and direct-format mismatches on headings to High", async () => {
    const heading = { structuralRole: "Heading1" };
    const t = template([
      textStyle(
        1,
        "h1",
        {
          tabStops: [
            { alignment: "left", leader: "none" },
            { alignment: "right", leader: "dot" },
          ],
          directFormatPatterns: [{ patternName: "Accent", context: "run", properties: { bold: true } }],
        },
        heading,
      ),
    ]);
    const doc = [docStyle("h1", { tabStops: [{ alignment: "left", leader: "none" }] }, heading)];

    const result = await verify(t, doc, { now: fixedClock });

    expect(result.mismatches.map((m) => `${m.severity}:${m.category}:${m.mismatchFields}`)).toEqual([
      "High:DirectFormatMismatch:DirectFormat:Accent",
      "High:TabStopMismatch:TabStopCountMismatch",
    ]);
  });

  it("reports a template context absent from the document as MissingInDocument", async () => {
    const t = template([textStyle(1, "p1"), textStyle(2, "p9", { name: "Closing" })]);
    const result = await verify(t, [docStyle("p1")], { now: fixedClock });

    expect(result.mismatches).toHaveLength(1);
    const [m] = result.mismatches;
    expect(m.contextKey).toBe("p9");
    expect(m.category).toBe("MissingInDocument");
    expect(m.severity).toBe("Medium");
    expect(m.location).toBe("paragraph p9");
    expect(m.expected).toEqual({ MissingInDocument: "Closing" });
  });

  it("leaves ignored style types out of matching on both sides", async () => {
    const t = template([textStyle(1, "p1", { color: "#FF0000" }), textStyle(2, "t1", { styleType: "table" })]);
    const doc = [docStyle("p1"), docStyle("c1", { styleType: "character" })];

    const result = await verify(t, doc, { now: fixedClock, ignoreStyleTypes: ["table", "character"] });

    expect(result.status).toBe("Completed");
    expect(result.mismatches.map((m) => `${m.severity}:${m.contextKey}:${m.mismatchFields}`)).toEqual([
      "High:p1:color",
    ]);
    expect(result.mismatches[0].recommendedAction).toBe("Correct the color property to match the template");
  });

  it("completes when every document context is of an ignored type", async () => {
    const t = template([textStyle(1, "p1")]);
    const doc = [docStyle("c1", { styleType: "character" })];

    const result = await verify(t, doc, { now: fixedClock, ignoreStyleTypes: ["character"] });

    expect(result.status).toBe("Completed");
    expect(result.mismatches.map((m) => `${m.category}:${m.contextKey}`)).toEqual([
      "MissingInDocument:p1",
    ]);
  });

  it("returns an empty Completed result for identical formatting", async () => {
    const t = template([textStyle(1, "p1"), textStyle(2, "p2", { fontSize: 14 })]);
    const result = await verify(t, [docStyle("p1"), docStyle("p2", { fontSize: 14 })], {
      now: fixedClock,
    });

    expect(result.status).toBe("Completed");
    expect(result.mismatches).toEqual([]);
    expect(result.totalMismatches).toBe(0);
    expect(result.errorMessage).toBe("");
  });

  it("orders a mixed report by severity, then context key", async () => {
    const t = template([
      textStyle(1, "b1", { color: "#FF0000" }),
      textStyle(2, "a1", {
        tabStops: [
          { alignment: "left", leader: "none" },
          { alignment: "right", leader: "dot" },
        ],
      }),
      textStyle(3, "z9", {}, { structuralRole: "Footer" }),
    ]);
    const doc = [
      docStyle("b1"),
      docStyle("a1", { tabStops: [{ alignment: "left", leader: "none" }] }),
      docStyle("c3", { name: "Caption" }, { structuralRole: "Caption" }),
    ];

    const result = await verify(t, doc, { now: fixedClock });

    expect(result.mismatches.map((m) => `${m.severity}:${m.contextKey}:${m.category}`)).toEqual([
      "High:b1:StyleMismatch",
      "Medium:a1:TabStopMismatch",
      "Medium:c3:UnexpectedInDocument",
      "Medium:z9:MissingInDocument",
    ]);
    expect(result.totalMismatches).toBe(4);
  });
});

describe("verify — run contract", () => {
  const t = template([
    textStyle(1, "p1", { color: "#FF0000" }),
    textStyle(2, "p2", { fontSize: 12 }),
    textStyle(3, "p3", { alignment: "center" }),
  ]);
  const doc = [docStyle("p1"), docStyle("p2"), docStyle("p3"), docStyle("p4")];

  it("is idempotent for identical inputs", async () => {
    const first = await verify(t, doc, { now: fixedClock, runId: "run-a" });
    const second = await verify(t, doc, { now: fixedClock, runId: "run-b" });
    expect(JSON.stringify(second.mismatches)).toBe(JSON.stringify(first.mismatches));
    expect(second.reportDigest).toBe(first.reportDigest);
  });

  it("does not depend on the worker count", async () => {
    const serial = await verify(t, doc, { now: fixedClock, concurrency: 1 });
    const parallel = await verify(t, doc, { now: fixedClock, concurrency: 8 });
    expect(parallel.mismatches).toEqual(serial.mismatches);
  });

  it("freezes the terminal result", async () => {
    const result = await verify(t, doc, { now: fixedClock });
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.mismatches)).toBe(true);
  });

  it("stamps run metadata", async () => {
    const result = await verify(t, doc, {
      now: fixedClock,
      runId: "run-1",
      documentName: "draft.json",
      createdBy: "tester",
    });
    expect(result.runId).toBe("run-1");
    expect(result.templateId).toBe(1);
    expect(result.templateVersion).toBe(1);
    expect(result.documentName).toBe("draft.json");
    expect(result.verifiedAt).toBe(fixedClock());
    expect(result.createdBy).toBe("tester");
  });

  it("fails an empty document without mismatches", async () => {
    const result = await verify(t, [], { now: fixedClock });
    expect(result.status).toBe("Failed");
    expect(result.errorMessage).toBe("Document contains no formatting contexts");
    expect(result.mismatches).toEqual([]);
    expect(result.totalMismatches).toBe(0);
  });

  it("fails a run cancelled before it starts", async () => {
    const controller = new AbortController();
    controller.abort();
    const result = await verify(t, doc, { now: fixedClock, signal: controller.signal });
    expect(result.status).toBe("Failed");
    expect(result.errorMessage).toBe("Verification cancelled");
    expect(result.mismatches).toEqual([]);
  });

  it("stops at the next pair boundary when cancelled mid-run", async () => {
    const controller = new AbortController();
    let calls = 0;
    const cancelling: DimensionComparator = {
      name: "cancelling",
      category: "StyleMismatch",
      compare: () => {
        calls++;
        controller.abort();
        return [{ field: "x", expected: 1, actual: 2 }];
      },
    };

    const result = await verify(t, doc, {
      now: fixedClock,
      signal: controller.signal,
      comparators: [cancelling],
      concurrency: 1,
    });

    expect(calls).toBe(1);
    expect(result.status).toBe("Failed");
    expect(result.errorMessage).toBe("Verification cancelled");
    expect(result.mismatches).toEqual([]);
  });

  it("aborts the run on a comparator defect", async () => {
    const broken: DimensionComparator = {
      name: "broken",
      category: "StyleMismatch",
      compare: () => {
        throw new Error("boom");
      },
    };

    const error = await verify(t, doc, { now: fixedClock, comparators: [broken] }).catch(
      (err: unknown) => err,
    );

    expect(error).toBeInstanceOf(ComparatorDefectError);
    if (!(error instanceof ComparatorDefectError)) return;
    expect(error.message).toBe('Comparator "broken" failed on context "p1": boom');
    expect(error.result?.status).toBe("Failed");
    expect(error.result?.mismatches).toEqual([]);
  });

  it("rejects a worker count that is not a positive number", async () => {
    for (const concurrency of [Number.NaN, 0, Number.POSITIVE_INFINITY]) {
      await expect(verify(t, doc, { now: fixedClock, concurrency })).rejects.toThrow(ConfigError);
    }
  });

  it("refuses an archived template before starting", async () => {
    await expect(verify({ ...t, status: "Archived" }, doc)).rejects.toThrow(TemplateInactiveError);
  });

  it("warns when signatures are truncated", async () => {
    const long = { note: "n".repeat(100) };
    const result = await verify(
      template([textStyle(1, "p1", { properties: long })]),
      [docStyle("p1", { properties: long })],
      { now: fixedClock, signatureMaxLength: 80 },
    );
    expect(result.status).toBe("Completed");
    expect(result.mismatches).toEqual([]);
    expect(result.warnings.map((w) => `${w.side}:${w.contextKey}:${w.code}`)).toEqual([
      "document:p1:SignatureTruncated",
      "template:p1:SignatureTruncated",
    ]);
  });
});
