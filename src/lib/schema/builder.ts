import { AppError } from "@/lib/errors";
import { exampleAnnotationListSchema } from "@/lib/schemas";
import type { ExampleAnnotation } from "@/lib/types";

export interface JsonSchema {
  readonly type: "object" | "array" | "string";
  readonly properties?: Readonly<Record<string, JsonSchema>>;
  readonly items?: JsonSchema;
  readonly enum?: readonly string[];
  readonly required?: readonly string[];
  readonly additionalProperties?: boolean;
}

export interface ProviderSchemaConfig {
  structuredOutputEnabled: boolean;
  responseSchema: SchemaConstraint;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

function permissiveShape(): JsonSchema {
  return {
    type: "object",
    properties: {
      extractions: {
        type: "array",
        items: { type: "object" },
      },
    },
  };
}

function constrainedShape(classes: string[], attributeKeys: string[]): JsonSchema {
  return {
    type: "object",
    properties: {
      extractions: {
        type: "array",
        items: {
          type: "object",
          properties: {
            extraction_class: { type: "string", enum: classes },
            extraction_text: { type: "string" },
            attributes: {
              type: "object",
              properties: Object.fromEntries(
                attributeKeys.map((key): [string, JsonSchema] => [key, { type: "string" }]),
              ),
              additionalProperties: false,
            },
          },
          required: ["extraction_class", "extraction_text"],
          additionalProperties: false,
        },
      },
    },
    required: ["extractions"],
    additionalProperties: false,
  };
}

/**
 * Structural constraint inferred from few-shot examples. Attribute keys are pooled
 * across every class rather than scoped per class.
 */
export class SchemaConstraint {
  readonly classes: ReadonlySet<string>;
  readonly attributeKeys: ReadonlySet<string>;
  readonly jsonSchema: JsonSchema;
  readonly supportsStrictMode = true;

  constructor(classes: Iterable<string>, attributeKeys: Iterable<string>) {
    this.classes = new Set(classes);
    this.attributeKeys = new Set(attributeKeys);
    this.jsonSchema = deepFreeze(
      this.classes.size === 0
        ? permissiveShape()
        : constrainedShape([...this.classes].sort(), [...this.attributeKeys].sort()),
    );
  }

  get isPermissive(): boolean {
    return this.classes.size === 0;
  }

  toProviderConfig(): ProviderSchemaConfig {
    return {
      structuredOutputEnabled: true,
      responseSchema: this,
    };
  }
}

export function buildSchemaConstraint(examples: readonly ExampleAnnotation[]): SchemaConstraint {
  const parsed = exampleAnnotationListSchema.safeParse(examples);
  if (!parsed.success) {
    throw new AppError({
      code: "BAD_REQUEST",
      message: "Example annotations are malformed",
      status: 400,
      details: parsed.error.issues,
    });
  }

  const classes = new Set<string>();
  const attributeKeys = new Set<string>();

  for (const example of parsed.data) {
    for (const extraction of example.extractions) {
      classes.add(extraction.extractionClass);
      for (const key of Object.keys(extraction.attributes)) {
        attributeKeys.add(key);
      }
    }
  }

  return new SchemaConstraint(classes, attributeKeys);
}
