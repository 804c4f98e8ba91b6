/**
 * Pre-construction validation and diagnostic builders.
 *
 * Every diagnostic carries enough of the model's schema for the caller to
 * correct its next attempt without a separate lookup.
 *
 * @module
 */

import type {
    Diagnostic,
    EnumIssue,
    FieldSchema,
    FieldSummary,
    FieldType,
    LiteralValue,
    SchemaReport,
} from "../types.js";
import { describeFieldType } from "./schema.js";

// =============================================================================
// Checks
// =============================================================================

function isMissing(value: unknown): boolean {
    return value === undefined || value === null || value === "";
}

/**
 * Caller keys of required fields absent from a normalized mapping, in
 * declaration order. Empty strings count as absent.
 */
export function findMissingFields(fields: readonly FieldSchema[], value: Readonly<Record<string, unknown>>): string[] {
    return fields
        .filter((field) => field.required && isMissing(value[field.name]))
        .map((field) => field.param);
}

function isLegal(value: unknown, legal: readonly LiteralValue[]): boolean {
    return legal.some((candidate) => candidate === value);
}

/**
 * Literal values a union admits for a string, or `undefined` when some
 * candidate takes any string.
 */
function unionLiterals(type: FieldType): LiteralValue[] | undefined {
    if (type.kind !== "union") return undefined;
    const legal: LiteralValue[] = [];
    for (const candidate of type.candidates) {
        if (candidate.kind === "enum") legal.push(...candidate.values);
        else if (candidate.kind === "opaque") return undefined;
        else if (candidate.kind === "primitive" && candidate.primitive === "string") return undefined;
    }
    return legal.length > 0 ? legal : undefined;
}

/**
 * Enum fields, sequences of enums, and strings given to unions of literals
 * and non-string types, whose values are outside the legal set. Nested
 * models are checked by construction instead.
 */
export function findEnumViolations(fields: readonly FieldSchema[], value: Readonly<Record<string, unknown>>): EnumIssue[] {
    const issues: EnumIssue[] = [];
    for (const field of fields) {
        const supplied = value[field.name];
        if (supplied === undefined) continue;

        if (field.type.kind === "enum") {
            if (!isLegal(supplied, field.type.values)) {
                issues.push({ field: field.param, value: supplied, legal: field.type.values });
            }
        } else if (field.type.kind === "sequence" && field.type.items.kind === "enum" && Array.isArray(supplied)) {
            const legal = field.type.items.values;
            supplied.forEach((item: unknown, index) => {
                if (!isLegal(item, legal)) {
                    issues.push({ field: `${field.param}[${index}]`, value: item, legal });
                }
            });
        } else if (typeof supplied === "string") {
            const legal = unionLiterals(field.type);
            if (legal && !isLegal(supplied, legal)) {
                issues.push({ field: field.param, value: supplied, legal });
            }
        }
    }
    return issues;
}

// =============================================================================
// Schema report
// =============================================================================

export function summarizeField(field: FieldSchema): FieldSummary {
    const summary: FieldSummary = {
        param: field.param,
        field: field.name,
        required: field.required,
        type: describeFieldType(field.type),
    };
    if (field.type.kind === "enum") {
        summary.enum = field.type.values;
        if (field.type.labels) summary.labels = field.type.labels;
    }
    if (field.description !== undefined) summary.description = field.description;
    return summary;
}

export function buildSchemaReport(model: string, fields: readonly FieldSchema[], supplied: readonly string[]): SchemaReport {
    return {
        model,
        required: fields.filter((field) => field.required).map((field) => field.param),
        optional: fields.filter((field) => !field.required).map((field) => field.param),
        supplied: [...supplied],
        fields: fields.map(summarizeField),
    };
}

// =============================================================================
// Diagnostics
// =============================================================================

export function unknownToolError(tool: string, available: readonly string[]): Diagnostic {
    return {
        kind: "UnknownTool",
        tool,
        message: `Unknown tool: ${tool}`,
        available: [...available],
    };
}

export function missingFieldsError(
    tool: string,
    missing: string[],
    ignored: string[],
    schema: SchemaReport,
): Diagnostic {
    return {
        kind: "ValidationError",
        tool,
        message: `Missing required fields: ${missing.join(", ")}`,
        missing,
        ignored,
        schema,
    };
}

function formatLiteral(value: unknown): string {
    return typeof value === "string" ? `"${value}"` : String(value);
}

/**
 * @param violations - at least one issue; the first is promoted to the
 *   diagnostic's top-level `field`/`value`/`legal`.
 */
export function enumViolationError(tool: string, violations: EnumIssue[], schema: SchemaReport): Diagnostic {
    const [first] = violations;
    const message = violations
        .map((issue) => `Invalid value ${formatLiteral(issue.value)} for ${issue.field}; valid values: ${issue.legal.map(formatLiteral).join(", ")}`)
        .join("\n");
    return {
        kind: "EnumViolation",
        tool,
        message,
        field: first.field,
        value: first.value,
        legal: first.legal,
        violations,
        schema,
    };
}

export function constructionError(tool: string, message: string, schema: SchemaReport): Diagnostic {
    return { kind: "ModelConstructionError", tool, message, schema };
}
