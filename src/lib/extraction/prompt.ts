import type { ExampleAnnotation, Extraction } from "@/lib/types";

const OUTPUT_INSTRUCTIONS = [
  'Respond with a JSON object of the form {"extractions": [{"extraction_class": "...", "extraction_text": "...", "attributes": {}}]}.',
  "Use exact text from the input for extraction_text. Do not paraphrase or overlap entities.",
].join("\n");

export function toWireExtractions(extractions: readonly Extraction[]): string {
  return JSON.stringify({
    extractions: extractions.map((extraction) => ({
      extraction_class: extraction.extractionClass,
      extraction_text: extraction.extractionText,
      attributes: extraction.attributes,
    })),
  });
}

export function buildExtractionPrompt(
  description: string,
  examples: readonly ExampleAnnotation[],
  text: string,
): string {
  const sections = [description.trim(), OUTPUT_INSTRUCTIONS];

  examples.forEach((example, index) => {
    sections.push(
      [`Example ${index + 1}`, `Q: ${example.text}`, `A: ${toWireExtractions(example.extractions)}`].join("\n"),
    );
  });

  sections.push(`Q: ${text}\nA:`);
  return sections.join("\n\n");
}
