import { ModelOutputInvalidError } from "@/lib/errors";
import { modelOutputSchema } from "@/lib/schemas";
import type { Extraction, LocatedExtraction } from "@/lib/types";
import { parseJsonFromText } from "@/lib/utils/json";

export function parseExtractions(output: string): Extraction[] {
  let raw: unknown;
  try {
    raw = parseJsonFromText(output);
  } catch (error) {
    throw new ModelOutputInvalidError("Model output is not valid JSON", {
      reason: error instanceof Error ? error.message : "Unknown parse failure",
      outputSnippet: output.slice(0, 800),
    });
  }

  const parsed = modelOutputSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ModelOutputInvalidError("Model output does not match the extraction shape", {
      issues: parsed.error.issues,
      outputSnippet: output.slice(0, 800),
    });
  }

  return parsed.data.extractions.map((record) => ({
    extractionClass: record.extraction_class,
    extractionText: record.extraction_text,
    attributes: record.attributes,
  }));
}

/**
 * Attaches the offset of each extraction's text in `source`. Records whose text is not a
 * verbatim substring keep `charInterval: null`; nothing is dropped. Repeated spans are
 * matched left to right.
 */
export function locateExtractions(
  source: string,
  extractions: readonly Extraction[],
): LocatedExtraction[] {
  const cursors = new Map<string, number>();

  return extractions.map((extraction) => {
    const needle = extraction.extractionText;
    if (!needle) {
      return { ...extraction, charInterval: null };
    }

    const from = cursors.get(needle) ?? 0;
    let start = source.indexOf(needle, from);
    if (start === -1 && from > 0) {
      start = source.indexOf(needle);
    }

    if (start === -1) {
      return { ...extraction, charInterval: null };
    }

    cursors.set(needle, start + needle.length);
    return { ...extraction, charInterval: { start, end: start + needle.length } };
  });
}
