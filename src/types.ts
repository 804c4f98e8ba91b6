/**
 * Core type definitions for ledgertools.
 *
 * Field schemas, synthesized tools, invocation results and diagnostics, plus
 * the minimal agent-tool shape that LLM runtimes consume.
 *
 * @module
 */

import type { TSchema } from "@sinclair/typebox";
import type { BaseModel } from "./models/base.js";

// =============================================================================
// Model classes and modules
// =============================================================================

/**
 * A concrete domain-model class: constructible from a field mapping, with a
 * TypeBox object schema describing its fields.
 *
 * `schema` is `unknown` at this seam; the extractor checks it and raises
 * `SchemaError` when it is missing or malformed.
 */
export interface ModelClass<M extends BaseModel = BaseModel> {
    new (fields: Readonly<Record<string, unknown>>): M;
    readonly name: string;
    readonly schema?: unknown;
    readonly description?: string;
}

/** A source module scanned by discovery, with the category its tools get. */
export interface ModelModule {
    /** Category label, e.g. "transaction". Lower-cased into tool names. */
    category: string;
    /** Human-readable label for catalogue display. */
    label?: string;
    /** The module namespace (`import * as mod`) or any export map. */
    exports: object;
}

// =============================================================================
// Field schema
// =============================================================================

export type PrimitiveKind = "string" | "number" | "integer" | "boolean" | "null";

export type LiteralValue = string | number | boolean;

/** Declared type of a field, projected from its TypeBox schema. */
export type FieldType =
    | { kind: "primitive"; primitive: PrimitiveKind }
    | { kind: "enum"; values: readonly LiteralValue[]; labels?: readonly string[] }
    | { kind: "model"; name: string; fields: readonly FieldSchema[] }
    | { kind: "union"; candidates: readonly FieldType[] }
    | { kind: "sequence"; items: FieldType }
    | { kind: "opaque" };

/** One field of a model, as seen by the engine. */
export interface FieldSchema {
    /** Domain key, e.g. `DestinationTag`. */
    name: string;
    /** Caller key, e.g. `destination_tag`. */
    param: string;
    required: boolean;
    type: FieldType;
    /** The source TypeBox schema (used for the JSON parameter schema). */
    schema: TSchema;
    description?: string;
    default?: unknown;
}

// =============================================================================
// Diagnostics
// =============================================================================

/** Human-oriented projection of one field, embedded in every diagnostic. */
export interface FieldSummary {
    param: string;
    field: string;
    required: boolean;
    type: string;
    enum?: readonly LiteralValue[];
    /** Member names, parallel to `enum`, where the enum declares them. */
    labels?: readonly string[];
    description?: string;
}

/** The complete field schema of a model plus what the caller supplied. */
export interface SchemaReport {
    model: string;
    required: string[];
    optional: string[];
    supplied: string[];
    fields: FieldSummary[];
}

export interface EnumIssue {
    field: string;
    value: unknown;
    legal: readonly LiteralValue[];
}

export type Diagnostic =
    | {
        kind: "UnknownTool";
        tool: string;
        message: string;
        available: string[];
    }
    | {
        kind: "ValidationError";
        tool: string;
        message: string;
        missing: string[];
        ignored: string[];
        schema: SchemaReport;
    }
    | {
        kind: "EnumViolation";
        tool: string;
        message: string;
        field: string;
        value: unknown;
        legal: readonly LiteralValue[];
        violations: EnumIssue[];
        schema: SchemaReport;
    }
    | {
        kind: "ModelConstructionError";
        tool: string;
        message: string;
        schema: SchemaReport;
    };

export type DiagnosticKind = Diagnostic["kind"];

/** Outcome of a single invocation. Invocation never throws. */
export type InvokeResult =
    | { ok: true; tool: string; value: Record<string, unknown> }
    | { ok: false; error: Diagnostic };

// =============================================================================
// Synthesized tools
// =============================================================================

/** A callable operation wrapping one model class. Immutable once built. */
export interface SynthesizedTool {
    /** `<category>_<model>`, lower-cased. */
    readonly name: string;
    readonly model: string;
    readonly category: string;
    readonly description: string;
    readonly fields: readonly FieldSchema[];
    /** JSON Schema of the tool's parameters, keyed by caller keys. */
    readonly parameters: Record<string, unknown>;
    /** Input that is not a plain object is treated as an empty mapping. */
    invoke(input?: Readonly<Record<string, unknown>> | null): InvokeResult;
}

/** Catalogue entry for external discovery. */
export interface ToolSummary {
    name: string;
    description: string;
}

/** Catalogue entries grouped by category. */
export interface ToolCategory {
    category: string;
    label: string;
    count: number;
    tools: ToolSummary[];
}

/** Detailed schema of one model, for callers that want to self-correct. */
export interface ModelSchemaInfo {
    model: string;
    category: string;
    tool: string;
    description: string;
    fields: FieldSummary[];
}

// =============================================================================
// Agent tool (transport boundary)
// =============================================================================

/** A text content block returned by a tool. */
export interface TextContent {
    type: "text";
    text: string;
}

/** Union of all content block types a tool can return. */
export type ContentBlock = TextContent;

/**
 * The result returned by an agent tool's `execute` method.
 *
 * @typeParam TDetails - Type of the structured details payload.
 */
export interface ToolResult<TDetails = unknown> {
    content: ContentBlock[];
    details?: TDetails;
}

/**
 * A tool in the shape LLM agent runtimes consume: JSON Schema parameters
 * and an async `execute`.
 */
export interface Tool<TDetails = unknown> {
    /** Canonical tool name (e.g., "transaction_payment"). */
    name: string;
    /** Human-readable display label. */
    label?: string;
    /** Description of what the tool does (shown to the LLM). */
    description: string;
    /** JSON Schema describing the tool's input parameters. */
    parameters: Record<string, unknown>;
    execute: (
        toolCallId: string,
        params: Record<string, unknown>,
    ) => Promise<ToolResult<TDetails>>;
}
