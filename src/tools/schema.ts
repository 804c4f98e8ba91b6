/**
 * Schema extraction. Projects a model class's TypeBox schema into the
 * engine's {@link FieldSchema} list, and renders that list back out as a
 * JSON Schema for tool parameters.
 *
 * @module
 */

import { TypeGuard, type TObject, type TSchema } from "@sinclair/typebox";
import { ENUM_NAMES_KEYWORD } from "../models/base.js";
import type { FieldSchema, FieldType, LiteralValue, ModelClass } from "../types.js";
import { SchemaError } from "./errors.js";

// =============================================================================
// Key helpers
// =============================================================================

/**
 * Caller-side key of a domain field: `DestinationTag` → `destination_tag`,
 * `NFTokenID` → `nf_token_id`. Already snake_case keys are unchanged.
 */
export function toSnakeCaseKey(key: string): string {
    return key
        .replace(/([A-Z]+)([A-Z][a-z])/g, "$1_$2")
        .replace(/([a-z0-9])([A-Z])/g, "$1_$2")
        .toLowerCase();
}

/** Case- and underscore-insensitive form of a key. */
export function squashKey(key: string): string {
    return key.replace(/_/g, "").toLowerCase();
}

// =============================================================================
// Extraction
// =============================================================================

const cache = new WeakMap<object, readonly FieldSchema[]>();

/** Name of a model: the `title` of its schema, else the class name. */
export function modelNameOf(modelClass: ModelClass): string {
    const schema = modelClass.schema;
    if (TypeGuard.IsObject(schema) && typeof schema.title === "string" && schema.title.length > 0) {
        return schema.title;
    }
    return modelClass.name;
}

/**
 * Extract the field schema of a model class, in declaration order.
 *
 * Results are cached per class, so repeated calls return the same array.
 *
 * @throws SchemaError if the class has no object schema, declares no
 *   fields, or two fields collide onto the same caller key.
 */
export function extractFieldSchemas(modelClass: ModelClass): readonly FieldSchema[] {
    const cached = cache.get(modelClass);
    if (cached) return cached;

    const schema = modelClass.schema;
    if (schema === undefined) {
        throw new SchemaError(modelClass.name, "declares no schema");
    }
    if (!TypeGuard.IsObject(schema)) {
        throw new SchemaError(modelClass.name, "schema is not an object schema");
    }

    const model = modelNameOf(modelClass);
    const fields = extractObjectFields(schema, model);
    if (fields.length === 0) {
        throw new SchemaError(model, "declares no fields");
    }

    cache.set(modelClass, fields);
    return fields;
}

function extractObjectFields(schema: TObject, owner: string): FieldSchema[] {
    const fields: FieldSchema[] = [];
    const claimed = new Map<string, string>();

    for (const [name, property] of Object.entries(schema.properties)) {
        const squashed = squashKey(name);
        const other = claimed.get(squashed);
        if (other !== undefined) {
            throw new SchemaError(owner, `fields "${other}" and "${name}" map to the same parameter`);
        }
        claimed.set(squashed, name);

        const nullable = TypeGuard.IsUnion(property) && property.anyOf.some((member) => TypeGuard.IsNull(member));
        const defaultValue: unknown = property.default;
        const field: FieldSchema = {
            name,
            param: toSnakeCaseKey(name),
            required: !TypeGuard.IsOptional(property) && defaultValue === undefined && !nullable,
            type: projectType(property, name),
            schema: property,
        };
        if (typeof property.description === "string") field.description = property.description;
        if (defaultValue !== undefined) field.default = defaultValue;
        fields.push(field);
    }

    return fields;
}

function enumType(values: LiteralValue[], schema: TSchema): FieldType {
    const names: unknown = schema[ENUM_NAMES_KEYWORD];
    if (
        Array.isArray(names)
        && names.length === values.length
        && names.every((name): name is string => typeof name === "string")
    ) {
        return { kind: "enum", values, labels: names };
    }
    return { kind: "enum", values };
}

/**
 * Project a TypeBox schema into a {@link FieldType}. Shapes the engine has
 * no rule for become `opaque` instead of failing.
 */
function projectType(schema: TSchema, owner: string): FieldType {
    if (TypeGuard.IsLiteral(schema)) {
        return { kind: "enum", values: [schema.const] };
    }
    if (TypeGuard.IsUnion(schema)) {
        const members = schema.anyOf.filter((member) => !TypeGuard.IsNull(member));
        if (members.length > 0 && members.every(TypeGuard.IsLiteral)) {
            return enumType(members.map((member) => member.const), schema);
        }
        if (members.length === 1) return projectType(members[0], owner);
        return { kind: "union", candidates: members.map((member) => projectType(member, owner)) };
    }
    if (TypeGuard.IsObject(schema)) {
        const name = schema.title ?? owner;
        return { kind: "model", name, fields: extractObjectFields(schema, name) };
    }
    if (TypeGuard.IsArray(schema)) {
        return { kind: "sequence", items: projectType(schema.items, owner) };
    }
    if (TypeGuard.IsString(schema)) return { kind: "primitive", primitive: "string" };
    if (TypeGuard.IsInteger(schema)) return { kind: "primitive", primitive: "integer" };
    if (TypeGuard.IsNumber(schema)) return { kind: "primitive", primitive: "number" };
    if (TypeGuard.IsBoolean(schema)) return { kind: "primitive", primitive: "boolean" };
    if (TypeGuard.IsNull(schema)) return { kind: "primitive", primitive: "null" };
    return { kind: "opaque" };
}

// =============================================================================
// Rendering
// =============================================================================

/** Human-readable type text, e.g. `IssuedCurrencyAmount | MPTAmount | string`. */
export function describeFieldType(type: FieldType): string {
    switch (type.kind) {
        case "primitive":
            return type.primitive;
        case "enum":
            return type.values.map((value) => JSON.stringify(value)).join(" | ");
        case "model":
            return type.name;
        case "union":
            return type.candidates.map(describeFieldType).join(" | ");
        case "sequence": {
            const items = describeFieldType(type.items);
            return type.items.kind === "union" || type.items.kind === "enum" ? `(${items})[]` : `${items}[]`;
        }
        case "opaque":
            return "any";
    }
}

function toPlainSchema(schema: TSchema): Record<string, unknown> {
    // Round-tripping through JSON drops TypeBox's symbol-keyed metadata.
    const plain: unknown = JSON.parse(JSON.stringify(schema));
    return typeof plain === "object" && plain !== null && !Array.isArray(plain)
        ? { ...plain }
        : {};
}

/**
 * JSON Schema for a tool's parameters, keyed by caller keys.
 *
 * The root is always `type: "object"`; `required` is omitted when empty.
 */
export function toParametersSchema(fields: readonly FieldSchema[]): Record<string, unknown> {
    const properties: Record<string, unknown> = {};
    for (const field of fields) {
        properties[field.param] = toPlainSchema(field.schema);
    }
    const required = fields.filter((field) => field.required).map((field) => field.param);
    return required.length > 0
        ? { type: "object", properties, required }
        : { type: "object", properties };
}
