import { z } from "zod";

const attributeValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const extractionSchema = z.object({
  extractionClass: z.string().trim().min(1),
  extractionText: z.string(),
  attributes: z.record(z.string(), z.string()).default({}),
});

export const exampleAnnotationSchema = z.object({
  text: z.string(),
  extractions: z.array(extractionSchema),
});

export const exampleAnnotationListSchema = z.array(exampleAnnotationSchema);

export const inferenceParamsSchema = z
  .object({
    temperature: z.number().min(0).max(2).optional(),
    maxTokens: z.number().int().positive().optional(),
    topP: z.number().min(0).max(1).optional(),
    frequencyPenalty: z.number().min(-2).max(2).optional(),
    presencePenalty: z.number().min(-2).max(2).optional(),
  })
  .strict();

export const chatCompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string(),
        }),
      }),
    )
    .min(1),
});

/** One record as the model writes it, in the wire naming used by the prompt. */
export const modelExtractionSchema = z.object({
  extraction_class: z.string().trim().min(1),
  extraction_text: z.union([z.string(), z.number()]).transform((value) => String(value)),
  attributes: z
    .record(z.string(), attributeValueSchema)
    .nullish()
    .transform((attributes) => {
      const normalized: Record<string, string> = {};
      for (const [key, value] of Object.entries(attributes ?? {})) {
        if (value !== null) {
          normalized[key] = String(value);
        }
      }
      return normalized;
    }),
});

export const modelOutputSchema = z.union([
  z.object({ extractions: z.array(modelExtractionSchema) }),
  z.array(modelExtractionSchema).transform((extractions) => ({ extractions })),
]);

export type ModelExtraction = z.infer<typeof modelExtractionSchema>;
