import { describe, it, expect } from "vitest";
import { recommendAction } from "../src/verify/recommendation.js";

describe("recommendAction", () => {
  it("asks for the expected style on a missing context", () => {
    expect(
      recommendAction("MissingInDocument", [
        { field: "MissingInDocument", expected: "Signature", actual: null },
      ]),
    ).toBe("Apply the expected style 'Signature' to this location");
  });

  it("asks to remove an unexpected style", () => {
    expect(
      recommendAction("UnexpectedInDocument", [
        { field: "UnexpectedInDocument", expected: null, actual: "Caption" },
      ]),
    ).toBe("Remove the unexpected style 'Caption' from this location");
  });

  it("names a single differing property", () => {
    expect(
      recommendAction("StyleMismatch", [{ field: "color", expected: "#1F3864", actual: "#FF0000" }]),
    ).toBe("Correct the color property to match the template");
  });

  it("lists several differing properties in field order", () => {
    expect(
      recommendAction("StyleMismatch", [
        { field: "fontSize", expected: 11, actual: 12 },
        { field: "bold", expected: true, actual: null },
      ]),
    ).toBe("Correct the following properties to match the template: bold, fontSize");
  });

  it("covers each direct formatting pattern", () => {
    expect(
      recommendAction("DirectFormatMismatch", [
        { field: "UnexpectedDirectFormat:Loud", expected: null, actual: "bold=true" },
        { field: "DirectFormat:Accent", expected: "bold=true", actual: null },
        { field: "DirectFormat:Emphasis", expected: "italic=true", actual: "bold=true" },
      ]),
    ).toBe(
      "Apply the missing direct formatting pattern 'Accent'; " +
        "Correct the direct formatting pattern 'Emphasis' to match the template; " +
        "Remove the unexpected direct formatting pattern 'Loud'",
    );
  });

  it("separates tab stop count from tab stop detail", () => {
    expect(
      recommendAction("TabStopMismatch", [
        { field: "TabStopCountMismatch", expected: 2, actual: 1 },
      ]),
    ).toBe("Add or remove tab stops so the count matches the template");
    expect(
      recommendAction("TabStopMismatch", [
        { field: "TabStopMismatch", expected: "left/dot@72", actual: "left/none@72", index: 0 },
      ]),
    ).toBe("Correct the tab stop alignment, leader and position to match the template");
  });
});
