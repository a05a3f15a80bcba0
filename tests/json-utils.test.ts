import { describe, expect, it } from "vitest";

import { parseJsonFromText } from "@/lib/utils/json";

describe("parseJsonFromText", () => {
  it("parses fenced JSON with single quotes and trailing commas", () => {
    const input = [
      "```json",
      "{",
      "  'extractions': [",
      "    { 'extraction_class': 'grade', 'extraction_text': 'III', },",
      "  ],",
      "}",
      "```",
    ].join("\n");

    expect(parseJsonFromText(input)).toEqual({
      extractions: [{ extraction_class: "grade", extraction_text: "III" }],
    });
  });

  it("closes a truncated response", () => {
    const input = '{"extractions":[{"extraction_class":"grade","extraction_text":"III"}]';

    expect(parseJsonFromText(input)).toEqual({
      extractions: [{ extraction_class: "grade", extraction_text: "III" }],
    });
  });

  it("picks the first JSON value out of surrounding prose", () => {
    const input = 'Here you go: [{"extraction_class":"grade","extraction_text":"II"}] Hope this helps.';

    expect(parseJsonFromText(input)).toEqual([{ extraction_class: "grade", extraction_text: "II" }]);
  });

  it("ignores brackets inside strings", () => {
    const input = '{"extraction_text":"ER (-) [focal]","note":"a } b"}';

    expect(parseJsonFromText(input)).toEqual({ extraction_text: "ER (-) [focal]", note: "a } b" });
  });

  it("rejects empty and non-JSON output", () => {
    expect(() => parseJsonFromText("   ")).toThrow("Empty model output");
    expect(() => parseJsonFromText("no structure at all")).toThrow("Failed to parse JSON from model output");
  });
});
