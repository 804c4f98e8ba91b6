import { describe, it, expect } from "vitest";
import {
    SchemaError,
    describeFieldType,
    extractFieldSchemas,
    toParametersSchema,
    toSnakeCaseKey,
    squashKey,
} from "ledgertools/tools";
import { AccountInfo, Payment } from "ledgertools/models";
import {
    CollidingModel,
    EmptyModel,
    Gadget,
    NoSchemaModel,
    StringSchemaModel,
    Widget,
} from "../../helpers/index.js";

describe("Schema extraction", () => {
    // ---------------------------------------------------------------------------
    // Key casing
    // ---------------------------------------------------------------------------

    describe("toSnakeCaseKey", () => {
        it("converts PascalCase domain keys", () => {
            expect(toSnakeCaseKey("DestinationTag")).toBe("destination_tag");
            expect(toSnakeCaseKey("LastLedgerSequence")).toBe("last_ledger_sequence");
        });

        it("splits acronym runs", () => {
            expect(toSnakeCaseKey("NFTokenID")).toBe("nf_token_id");
            expect(toSnakeCaseKey("InvoiceID")).toBe("invoice_id");
        });

        it("leaves snake_case keys unchanged", () => {
            expect(toSnakeCaseKey("mpt_issuance_id")).toBe("mpt_issuance_id");
            expect(toSnakeCaseKey("account")).toBe("account");
        });
    });

    describe("squashKey", () => {
        it("drops underscores and case", () => {
            expect(squashKey("Destination_Tag")).toBe("destinationtag");
            expect(squashKey("destinationTag")).toBe("destinationtag");
        });
    });

    // ---------------------------------------------------------------------------
    // extractFieldSchemas
    // ---------------------------------------------------------------------------

    describe("extractFieldSchemas", () => {
        it("lists fields in declaration order with caller keys", () => {
            const fields = extractFieldSchemas(Widget);
            expect(fields.map((f) => f.name)).toEqual([
                "WidgetName", "Count", "Amount", "Enabled", "Mode", "Ratio", "Tags", "Extra",
            ]);
            expect(fields.map((f) => f.param)).toEqual([
                "widget_name", "count", "amount", "enabled", "mode", "ratio", "tags", "extra",
            ]);
        });

        it("marks optional fields as not required", () => {
            const required = extractFieldSchemas(Widget).filter((f) => f.required).map((f) => f.name);
            expect(required).toEqual(["WidgetName", "Count"]);
        });

        it("treats a field with a default as not required and keeps the default", () => {
            const level = extractFieldSchemas(Gadget).find((f) => f.name === "Level");
            expect(level?.required).toBe(false);
            expect(level?.default).toBe(1);
        });

        it("keeps field descriptions", () => {
            const count = extractFieldSchemas(Widget).find((f) => f.name === "Count");
            expect(count?.description).toBe("How many.");
        });

        it("projects each field kind", () => {
            const byName = new Map(extractFieldSchemas(Widget).map((f) => [f.name, f.type]));
            expect(byName.get("WidgetName")).toEqual({ kind: "primitive", primitive: "string" });
            expect(byName.get("Count")).toEqual({ kind: "primitive", primitive: "integer" });
            expect(byName.get("Ratio")).toEqual({ kind: "primitive", primitive: "number" });
            expect(byName.get("Enabled")).toEqual({ kind: "primitive", primitive: "boolean" });
            expect(byName.get("Mode")).toEqual({ kind: "enum", values: ["fast", "slow"] });
            expect(byName.get("Tags")).toEqual({ kind: "sequence", items: { kind: "primitive", primitive: "string" } });
            expect(byName.get("Extra")).toEqual({ kind: "opaque" });
        });

        it("projects nested object schemas as models", () => {
            const part = extractFieldSchemas(Gadget).find((f) => f.name === "Part");
            expect(part?.type.kind).toBe("model");
            if (part?.type.kind === "model") {
                expect(part.type.name).toBe("Part");
                expect(part.type.fields.map((f) => f.param)).toEqual(["part_name", "weight"]);
            }
        });

        it("returns the cached array on repeated calls", () => {
            expect(extractFieldSchemas(Payment)).toBe(extractFieldSchemas(Payment));
        });

        it("requires exactly account, amount and destination for Payment", () => {
            const required = extractFieldSchemas(Payment).filter((f) => f.required).map((f) => f.param);
            expect(required).toEqual(["account", "amount", "destination"]);
        });

        it("throws SchemaError for a class without a schema", () => {
            expect(() => extractFieldSchemas(NoSchemaModel)).toThrow(SchemaError);
            expect(() => extractFieldSchemas(NoSchemaModel)).toThrow("NoSchemaModel: declares no schema");
        });

        it("throws SchemaError for a non-object schema", () => {
            expect(() => extractFieldSchemas(StringSchemaModel)).toThrow("StringSchemaModel: schema is not an object schema");
        });

        it("throws SchemaError for a model without fields", () => {
            expect(() => extractFieldSchemas(EmptyModel)).toThrow("EmptyModel: declares no fields");
        });

        it("throws SchemaError when two fields share a caller key", () => {
            expect(() => extractFieldSchemas(CollidingModel)).toThrow(
                'CollidingModel: fields "DestTag" and "dest_tag" map to the same parameter',
            );
        });
    });

    // ---------------------------------------------------------------------------
    // Rendering
    // ---------------------------------------------------------------------------

    describe("describeFieldType", () => {
        it("renders unions of models and primitives", () => {
            const amount = extractFieldSchemas(Payment).find((f) => f.name === "Amount");
            expect(amount && describeFieldType(amount.type)).toBe("IssuedCurrencyAmount | MPTAmount | string");
        });

        it("renders mixed unions with literals", () => {
            const ledger = extractFieldSchemas(AccountInfo).find((f) => f.name === "ledger_index");
            expect(ledger && describeFieldType(ledger.type)).toBe('integer | "validated" | "closed" | "current"');
        });

        it("renders sequences and opaque values", () => {
            expect(describeFieldType({ kind: "sequence", items: { kind: "model", name: "MemoWrapper", fields: [] } })).toBe("MemoWrapper[]");
            expect(describeFieldType({ kind: "sequence", items: { kind: "enum", values: [1, 2] } })).toBe("(1 | 2)[]");
            expect(describeFieldType({ kind: "opaque" })).toBe("any");
        });
    });

    describe("toParametersSchema", () => {
        it("produces an object schema keyed by caller keys", () => {
            const schema = toParametersSchema(extractFieldSchemas(Widget));
            expect(schema.type).toBe("object");
            expect(schema.required).toEqual(["widget_name", "count"]);
            expect(schema.properties).toMatchObject({
                widget_name: { type: "string", minLength: 1, description: "Display name." },
                count: { type: "integer", description: "How many." },
            });
        });

        it("omits required when every field is optional", () => {
            const schema = toParametersSchema(extractFieldSchemas(Widget).filter((f) => !f.required));
            expect(schema).not.toHaveProperty("required");
        });

        it("produces plain JSON", () => {
            const schema = toParametersSchema(extractFieldSchemas(Payment));
            expect(JSON.parse(JSON.stringify(schema))).toEqual(schema);
        });
    });
});
