import { describe, expect, it } from "vitest";

import { buildSchemaConstraint } from "@/lib/schema/builder";
import type { ExampleAnnotation } from "@/lib/types";

const examples: ExampleAnnotation[] = [
  {
    text: "Specimen: left breast excision. Tumor size 2.0x2.0x1.3cm.",
    extractions: [
      {
        extractionClass: "specimen_type",
        extractionText: "left breast excision",
        attributes: { location: "left breast", procedure: "excision" },
      },
      {
        extractionClass: "tumor_size",
        extractionText: "2.0x2.0x1.3cm",
        attributes: { dimensions: "2.0x2.0x1.3cm", unit: "cm" },
      },
    ],
  },
  {
    text: "Tumor size 1.7x1.5x0.8cm, single focus. Grade III.",
    extractions: [
      {
        extractionClass: "tumor_size",
        extractionText: "1.7x1.5x0.8cm",
        attributes: { unit: "cm", foci: "single" },
      },
      {
        extractionClass: "histologic_grade",
        extractionText: "Grade III",
        attributes: {},
      },
    ],
  },
];

describe("buildSchemaConstraint", () => {
  it("collects the distinct classes across all examples", () => {
    const schema = buildSchemaConstraint(examples);

    expect([...schema.classes].sort()).toEqual(["histologic_grade", "specimen_type", "tumor_size"]);
    expect(schema.isPermissive).toBe(false);
  });

  it("pools attribute keys across classes", () => {
    const schema = buildSchemaConstraint(examples);

    expect([...schema.attributeKeys].sort()).toEqual([
      "dimensions",
      "foci",
      "location",
      "procedure",
      "unit",
    ]);
  });

  it("is independent of example order", () => {
    const forward = buildSchemaConstraint(examples);
    const reversed = buildSchemaConstraint([...examples].reverse());

    expect(reversed.jsonSchema).toEqual(forward.jsonSchema);
  });

  it("builds a strict record shape with sorted enums and keys", () => {
    const schema = buildSchemaConstraint(examples);
    const items = schema.jsonSchema.properties?.extractions.items;

    expect(schema.jsonSchema.required).toEqual(["extractions"]);
    expect(items?.required).toEqual(["extraction_class", "extraction_text"]);
    expect(items?.additionalProperties).toBe(false);
    expect(items?.properties?.extraction_class.enum).toEqual([
      "histologic_grade",
      "specimen_type",
      "tumor_size",
    ]);
    expect(Object.keys(items?.properties?.attributes.properties ?? {})).toEqual([
      "dimensions",
      "foci",
      "location",
      "procedure",
      "unit",
    ]);
    expect(items?.properties?.attributes.additionalProperties).toBe(false);
  });

  it("falls back to a permissive shape when no examples are given", () => {
    const schema = buildSchemaConstraint([]);

    expect(schema.isPermissive).toBe(true);
    expect(schema.classes.size).toBe(0);
    expect(schema.jsonSchema).toEqual({
      type: "object",
      properties: {
        extractions: {
          type: "array",
          items: { type: "object" },
        },
      },
    });
  });

  it("falls back to a permissive shape when examples carry no extractions", () => {
    const schema = buildSchemaConstraint([{ text: "nothing here", extractions: [] }]);

    expect(schema.isPermissive).toBe(true);
  });

  it("freezes every level of the JSON shape", () => {
    const schema = buildSchemaConstraint(examples);
    const items = schema.jsonSchema.properties?.extractions.items;
    const classEnum = items?.properties?.extraction_class.enum;

    const nested = [
      schema.jsonSchema,
      schema.jsonSchema.properties,
      items,
      items?.properties,
      items?.properties?.attributes.properties,
      items?.required,
      classEnum,
    ];
    for (const node of nested) {
      expect(node).toBeDefined();
      expect(Object.isFrozen(node)).toBe(true);
    }

    expect(() => Reflect.apply(Array.prototype.push, classEnum, ["injected"])).toThrow(TypeError);
    expect(Reflect.set(items ?? {}, "additionalProperties", true)).toBe(false);
    expect(classEnum).toEqual(["histologic_grade", "specimen_type", "tumor_size"]);
    expect(items?.additionalProperties).toBe(false);
  });

  it("exposes provider config pointing back at itself", () => {
    const schema = buildSchemaConstraint(examples);
    const config = schema.toProviderConfig();

    expect(config.structuredOutputEnabled).toBe(true);
    expect(config.responseSchema).toBe(schema);
  });

  it("rejects malformed examples with BAD_REQUEST", () => {
    const malformed = [{ text: "x", extractions: [{ extractionClass: "", extractionText: "x", attributes: {} }] }];

    let caught: unknown;
    try {
      buildSchemaConstraint(malformed);
    } catch (error) {
      caught = error;
    }

    expect(caught).toMatchObject({ code: "BAD_REQUEST", status: 400 });
  });
});
