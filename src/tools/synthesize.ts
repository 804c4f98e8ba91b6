/**
 * Tool synthesis: wraps one model class as a callable tool with a name, a
 * parameter schema, a generated description and an invoke pipeline of
 * normalize, validate and construct.
 *
 * @module
 */

import type {
    FieldSchema,
    FieldType,
    InvokeResult,
    LiteralValue,
    ModelClass,
    SchemaReport,
    SynthesizedTool,
} from "../types.js";
import {
    isAmountField,
    isCurrencyField,
    normalizeInput,
    toFieldMapping,
    type NormalizeOptions,
} from "./normalize.js";
import { describeFieldType, extractFieldSchemas, modelNameOf, squashKey, toParametersSchema } from "./schema.js";
import {
    buildSchemaReport,
    constructionError,
    enumViolationError,
    findEnumViolations,
    findMissingFields,
    missingFieldsError,
} from "./validate.js";

export type SynthesizeOptions = NormalizeOptions;

/** `<category>_<model>`, lower-cased: `transaction_payment`. */
export function toolNameFor(category: string, model: string): string {
    return `${category}_${model}`.toLowerCase();
}

// =============================================================================
// Description
// =============================================================================

/** Representative value for a field, shown in tool descriptions. */
export function exampleValue(name: string, type: FieldType): unknown {
    if (isAmountField(name, type)) return "1000000";
    if (isCurrencyField(name) && type.kind !== "enum") return "USD";

    switch (type.kind) {
        case "primitive":
            switch (type.primitive) {
                case "string":
                    return "example";
                case "integer":
                    return 1;
                case "number":
                    return 1.5;
                case "boolean":
                    return true;
                default:
                    return null;
            }
        case "enum":
            return type.values[0];
        case "model": {
            const example: Record<string, unknown> = {};
            for (const field of type.fields) {
                if (field.required) example[field.param] = exampleValue(field.name, field.type);
            }
            return example;
        }
        case "union":
            return exampleValue(name, type.candidates[0]);
        case "sequence":
            return [exampleValue(name, type.items)];
        case "opaque":
            return {};
    }
}

/** `1 (asfRequireDest)`; the name is left out when it only restates the value. */
function formatEnumValue(value: LiteralValue, label: string | undefined): string {
    const text = JSON.stringify(value);
    if (label === undefined || squashKey(label) === squashKey(String(value))) return text;
    return `${text} (${label})`;
}

function describeField(field: FieldSchema): string {
    const head = `  - ${field.param} (${describeFieldType(field.type)})`;
    const text = field.description !== undefined ? `${head}: ${field.description}` : head;
    if (field.type.kind === "enum") {
        const { values, labels } = field.type;
        return `${text} Valid values: ${values.map((value, index) => formatEnumValue(value, labels?.[index])).join(", ")}`;
    }
    return `${text} Example: ${JSON.stringify(exampleValue(field.name, field.type))}`;
}

/**
 * Generated tool description: purpose line, the model's own description,
 * then required and optional fields with types and example values.
 */
export function composeDescription(modelClass: ModelClass, category: string, fields: readonly FieldSchema[]): string {
    const required = fields.filter((field) => field.required);
    const optional = fields.filter((field) => !field.required);

    const lines = [`Create a ${modelNameOf(modelClass)} ${category} model and return its canonical JSON form.`];
    if (modelClass.description) lines.push("", modelClass.description);

    lines.push("", "Required fields:");
    if (required.length === 0) lines.push("  (none)");
    else lines.push(...required.map(describeField));

    if (optional.length > 0) {
        lines.push("", "Optional fields:", ...optional.map(describeField));
    }

    lines.push(
        "",
        "Keys may be snake_case or the ledger's own casing. Amounts are kept as strings; currency codes longer than 3 characters are hex-encoded.",
    );
    return lines.join("\n");
}

// =============================================================================
// Synthesis
// =============================================================================

function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

/**
 * Synthesize the tool for one model class.
 *
 * @throws SchemaError if the class's schema cannot be extracted.
 */
export function synthesizeTool(
    modelClass: ModelClass,
    category: string,
    options: SynthesizeOptions = {},
): SynthesizedTool {
    const fields = extractFieldSchemas(modelClass);
    const model = modelNameOf(modelClass);
    const name = toolNameFor(category, model);

    const invoke = (raw?: Readonly<Record<string, unknown>> | null): InvokeResult => {
        const input = toFieldMapping(raw);
        const report = (): SchemaReport => buildSchemaReport(model, fields, Object.keys(input));
        try {
            const normalized = normalizeInput(input, fields, options);

            const missing = findMissingFields(fields, normalized.value);
            if (missing.length > 0) {
                return { ok: false, error: missingFieldsError(name, missing, normalized.ignored, report()) };
            }

            const violations = findEnumViolations(fields, normalized.value);
            if (violations.length > 0) {
                return { ok: false, error: enumViolationError(name, violations, report()) };
            }

            const instance = new modelClass(normalized.value);
            return { ok: true, tool: name, value: instance.toJSON() };
        } catch (err) {
            return { ok: false, error: constructionError(name, errorMessage(err), report()) };
        }
    };

    return Object.freeze({
        name,
        model,
        category,
        description: composeDescription(modelClass, category, fields),
        fields,
        parameters: toParametersSchema(fields),
        invoke,
    });
}
