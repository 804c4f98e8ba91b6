/**
 * Base classes for the domain-model catalogue.
 *
 * A model class pairs a TypeBox object schema (its ordered field
 * declarations) with a constructor that checks a field mapping against it.
 * The schema is the metadata the tool engine inspects; the constructor is
 * the domain's own last word on whether a combination of fields is valid.
 *
 * @module
 */

import { Type, type SchemaOptions, type TObject } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

// =============================================================================
// Markers and errors
// =============================================================================

/**
 * Static marker for classes that must never be registered as tools
 * (abstract bases). Discovery only honours it as an *own* property, so
 * subclasses do not inherit it.
 */
export const NON_MODEL: unique symbol = Symbol.for("ledgertools.non-model");

/** One problem found while constructing a model. */
export interface ModelIssue {
    /** JSON pointer of the offending field, e.g. `/Destination`. */
    path: string;
    message: string;
}

/**
 * Thrown by a model constructor when the supplied fields do not form a
 * valid instance.
 */
export class ModelError extends Error {
    readonly model: string;
    readonly issues: readonly ModelIssue[];

    constructor(model: string, issues: readonly ModelIssue[]) {
        super(
            `Invalid ${model}: ${issues.map((issue) => `${issue.path}: ${issue.message}`).join("; ")}`,
        );
        this.name = "ModelError";
        this.model = model;
        this.issues = issues;
    }
}

// =============================================================================
// Shared schema fragments
// =============================================================================

/** Three-character code or 160-bit hex code. */
export const CURRENCY_CODE_PATTERN = "^(.{3}|[0-9A-Fa-f]{40})$";

/** Whole drops of XRP as a decimal string. */
export const DROPS_PATTERN = "^\\d+$";

export const AccountAddress = (description: string) =>
    Type.String({ minLength: 1, description });

export const CurrencyCode = (description: string) =>
    Type.String({ pattern: CURRENCY_CODE_PATTERN, description });

export const Drops = (description: string) =>
    Type.String({ pattern: DROPS_PATTERN, description });

export const Hash256 = (description: string) =>
    Type.String({ pattern: "^[0-9A-Fa-f]{64}$", description });

export const UInt32 = (description: string) =>
    Type.Integer({ minimum: 0, maximum: 4294967295, description });

/**
 * Schema keyword listing an enum's member names, parallel to the members
 * of its `anyOf`.
 */
export const ENUM_NAMES_KEYWORD = "x-enum-names";

/**
 * `Type.Enum` that keeps the member names of a TypeScript enum, so callers
 * may pass `"asfRequireDest"` where the ledger expects `1`.
 */
export function NamedEnum<T extends Record<string, string | number>>(members: T, options: SchemaOptions = {}) {
    const names = Object.keys(members).filter((key) => Number.isNaN(Number(key)));
    return Type.Enum(members, { ...options, [ENUM_NAMES_KEYWORD]: names });
}

// =============================================================================
// BaseModel
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Base of every model. Subclasses declare `static readonly schema` and
 * `static readonly description`, and pass their schema to `super`.
 *
 * Construction keeps only declared keys, applies schema defaults, checks
 * the result against the schema and finally runs {@link getErrors} for
 * cross-field rules. Any issue throws {@link ModelError}.
 */
export abstract class BaseModel {
    static readonly [NON_MODEL] = true;

    readonly fields: Readonly<Record<string, unknown>>;

    /** Schema title of the concrete model, else its class name. */
    readonly modelName: string;

    protected constructor(schema: TObject, input: Readonly<Record<string, unknown>>) {
        this.modelName = schema.title ?? this.constructor.name;

        const picked: Record<string, unknown> = {};
        for (const key of Object.keys(schema.properties)) {
            const value = input[key];
            if (value !== undefined) picked[key] = Value.Clone(value);
        }
        const filled = Value.Default(schema, picked);
        this.fields = isRecord(filled) ? filled : picked;

        const issues: ModelIssue[] = [];
        for (const error of Value.Errors(schema, this.fields)) {
            issues.push({ path: error.path || "/", message: error.message });
        }
        if (issues.length === 0) issues.push(...this.getErrors());
        if (issues.length > 0) throw new ModelError(this.modelName, issues);
    }

    /**
     * Cross-field rules the schema cannot express. Runs only after the
     * fields passed the schema check.
     */
    protected getErrors(): ModelIssue[] {
        return [];
    }

    protected has(key: string): boolean {
        return this.fields[key] !== undefined;
    }

    protected text(key: string): string | undefined {
        const value = this.fields[key];
        return typeof value === "string" ? value : undefined;
    }

    protected int(key: string): number | undefined {
        const value = this.fields[key];
        return typeof value === "number" ? value : undefined;
    }

    /** Canonical external representation. */
    toJSON(): Record<string, unknown> {
        return { ...this.fields };
    }
}
