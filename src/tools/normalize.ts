/**
 * Input normalization: maps caller keys onto domain keys and coerces values
 * toward the declared field types before the model is constructed.
 *
 * Normalization never fails. Anything it cannot fix is passed through for
 * the validator or the model constructor to reject.
 *
 * @module
 */

import type { FieldSchema, FieldType, LiteralValue } from "../types.js";
import { normalizeCurrencyCode } from "./currency.js";
import { squashKey } from "./schema.js";

export interface NormalizeOptions {
    /** Native-currency sentinel passed through by the currency rule. Default "XRP". */
    nativeCurrency?: string;
}

export interface NormalizedInput {
    /** Field mapping keyed by domain keys. */
    value: Record<string, unknown>;
    /** Domain key → the key the caller used for it. */
    keys: Record<string, string>;
    /** Supplied keys (dotted paths for nested ones) that matched no field. */
    ignored: string[];
}

// =============================================================================
// Field semantics
// =============================================================================

const AMOUNT_FIELDS = new Set([
    "amount",
    "balance",
    "limit",
    "limitamount",
    "fee",
    "sendmax",
    "delivermin",
    "delivermax",
    "takergets",
    "takerpays",
    "value",
    "destinationamount",
]);

/**
 * Whether a field carries an amount. Amounts are kept as exact decimal
 * strings, so the rule only applies where the declared type admits a string.
 */
export function isAmountField(name: string, type: FieldType): boolean {
    const squashed = squashKey(name);
    if (!AMOUNT_FIELDS.has(squashed) && !squashed.endsWith("amount")) return false;
    return admitsString(type);
}

export function isCurrencyField(name: string): boolean {
    return squashKey(name) === "currency";
}

function admitsString(type: FieldType): boolean {
    switch (type.kind) {
        case "primitive":
            return type.primitive === "string";
        case "union":
            return type.candidates.some(admitsString);
        case "opaque":
            return true;
        default:
            return false;
    }
}

// =============================================================================
// Key resolution
// =============================================================================

interface KeyIndex {
    byName: Map<string, FieldSchema>;
    byParam: Map<string, FieldSchema>;
    bySquashed: Map<string, FieldSchema>;
}

const indexCache = new WeakMap<readonly FieldSchema[], KeyIndex>();

function indexFields(fields: readonly FieldSchema[]): KeyIndex {
    const cached = indexCache.get(fields);
    if (cached) return cached;
    const index: KeyIndex = { byName: new Map(), byParam: new Map(), bySquashed: new Map() };
    for (const field of fields) {
        index.byName.set(field.name, field);
        index.byParam.set(field.param, field);
        index.bySquashed.set(squashKey(field.name), field);
    }
    indexCache.set(fields, index);
    return index;
}

/**
 * Resolve a supplied key to a declared field: exact domain key, then exact
 * caller key, then a case- and underscore-insensitive match.
 */
export function resolveFieldKey(key: string, fields: readonly FieldSchema[]): FieldSchema | undefined {
    const index = indexFields(fields);
    return index.byName.get(key) ?? index.byParam.get(key) ?? index.bySquashed.get(squashKey(key));
}

/** Generic domain casing for keys with no declared field: `source_tag` → `SourceTag`. */
export function toDomainKey(key: string): string {
    const converted = key
        .split("_")
        .filter((part) => part.length > 0)
        .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
        .join("");
    return converted.length > 0 ? converted : key;
}

// =============================================================================
// Value coercion
// =============================================================================

type Coerced = { ok: true; value: unknown } | { ok: false };

const NO_MATCH: Coerced = { ok: false };
const TRUE_WORDS = new Set(["true", "yes", "on", "1"]);
const FALSE_WORDS = new Set(["false", "no", "off", "0"]);
const INTEGER_TEXT = /^-?\d+$/;

/**
 * Decimal text of a number whose digits are exact: a safe integer or a
 * finite fraction. Larger integers have already lost precision.
 */
function exactDecimal(value: number): string | undefined {
    if (Number.isSafeInteger(value)) return String(value);
    if (Number.isFinite(value) && !Number.isInteger(value)) return String(value);
    return undefined;
}

function fits(value: unknown, type: FieldType): boolean {
    switch (type.kind) {
        case "primitive":
            switch (type.primitive) {
                case "string":
                    return typeof value === "string";
                case "integer":
                    return typeof value === "number" && Number.isInteger(value);
                case "number":
                    return typeof value === "number" && Number.isFinite(value);
                case "boolean":
                    return typeof value === "boolean";
                default:
                    return value === null;
            }
        case "enum":
            return type.values.some((legal) => legal === value);
        case "union":
            return type.candidates.some((candidate) => fits(value, candidate));
        default:
            return false;
    }
}

function coercePrimitive(value: unknown, type: FieldType): Coerced {
    if (type.kind === "enum") return coerceEnum(value, type.values, type.labels);
    if (type.kind !== "primitive") return NO_MATCH;

    switch (type.primitive) {
        case "string": {
            const text = typeof value === "number" ? exactDecimal(value) : undefined;
            if (text !== undefined) return { ok: true, value: text };
            if (typeof value === "bigint") return { ok: true, value: value.toString() };
            return NO_MATCH;
        }
        case "integer":
            if (typeof value === "string" && INTEGER_TEXT.test(value.trim())) {
                const parsed = Number(value.trim());
                if (Number.isSafeInteger(parsed)) return { ok: true, value: parsed };
            }
            return NO_MATCH;
        case "number":
            if (typeof value === "string" && value.trim().length > 0) {
                const parsed = Number(value.trim());
                if (Number.isFinite(parsed)) return { ok: true, value: parsed };
            }
            return NO_MATCH;
        case "boolean":
            if (typeof value === "string") {
                const word = value.trim().toLowerCase();
                if (TRUE_WORDS.has(word)) return { ok: true, value: true };
                if (FALSE_WORDS.has(word)) return { ok: true, value: false };
            }
            if (value === 1 || value === 0) return { ok: true, value: value === 1 };
            return NO_MATCH;
        default:
            return NO_MATCH;
    }
}

/** Member names match exactly, then ignoring case and underscores. */
function enumByName(name: string, legal: readonly LiteralValue[], labels: readonly string[]): Coerced {
    let index = labels.indexOf(name);
    if (index < 0) {
        const squashed = squashKey(name);
        index = labels.findIndex((label) => squashKey(label) === squashed);
    }
    return index >= 0 && index < legal.length ? { ok: true, value: legal[index] } : NO_MATCH;
}

function coerceEnum(value: unknown, legal: readonly LiteralValue[], labels?: readonly string[]): Coerced {
    if (typeof value === "string" && labels) {
        const named = enumByName(value.trim(), legal, labels);
        if (named.ok) return named;
    }
    if (typeof value === "string" && value.trim().length > 0) {
        const parsed = Number(value.trim());
        if (legal.some((candidate) => candidate === parsed)) return { ok: true, value: parsed };
    }
    if (typeof value === "number") {
        const text = String(value);
        if (legal.some((candidate) => candidate === text)) return { ok: true, value: text };
    }
    return NO_MATCH;
}

/**
 * Coerce a scalar toward its declared type. A value that already fits any
 * candidate is kept; otherwise union candidates are tried left to right.
 */
function coerceScalar(value: unknown, type: FieldType): unknown {
    if (fits(value, type)) return value;
    const candidates = type.kind === "union" ? type.candidates : [type];
    for (const candidate of candidates) {
        const coerced = coercePrimitive(value, candidate);
        if (coerced.ok) return coerced.value;
    }
    return value;
}

// =============================================================================
// Structure
// =============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
    if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
    const proto: unknown = Object.getPrototypeOf(value);
    return proto === Object.prototype || proto === null;
}

/** Caller input as a field mapping; anything but a plain object is empty. */
export function toFieldMapping(input: unknown): Readonly<Record<string, unknown>> {
    return isPlainObject(input) ? input : {};
}

function itemType(type: FieldType): FieldType {
    if (type.kind === "sequence") return type.items;
    if (type.kind === "union") {
        const sequence = type.candidates.find((candidate) => candidate.kind === "sequence");
        if (sequence && sequence.kind === "sequence") return sequence.items;
    }
    return { kind: "opaque" };
}

/**
 * Fields to normalize a nested mapping against. For a union, the first model
 * candidate that recognizes every supplied key wins; failing that, the one
 * recognizing the most keys.
 */
function nestedFields(type: FieldType, value: Record<string, unknown>): readonly FieldSchema[] | undefined {
    if (type.kind === "model") return type.fields;
    if (type.kind !== "union") return undefined;

    const keys = Object.keys(value);
    let best: readonly FieldSchema[] | undefined;
    let bestCount = -1;
    for (const candidate of type.candidates) {
        if (candidate.kind !== "model") continue;
        const count = keys.filter((key) => resolveFieldKey(key, candidate.fields) !== undefined).length;
        if (count === keys.length) return candidate.fields;
        if (count > bestCount) {
            best = candidate.fields;
            bestCount = count;
        }
    }
    return best;
}

function joinPath(path: string, key: string): string {
    return path.length > 0 ? `${path}.${key}` : key;
}

/**
 * Normalize one value against its field name and declared type.
 * Returns `undefined` for null or absent values so the caller can drop them.
 */
export function normalizeValue(
    value: unknown,
    name: string,
    type: FieldType,
    options: NormalizeOptions = {},
    path = name,
    ignored: string[] = [],
): unknown {
    if (value === null || value === undefined) return undefined;

    if (Array.isArray(value)) {
        const items = itemType(type);
        return value.map((item, index) =>
            item === null ? null : normalizeValue(item, name, items, options, `${path}[${index}]`, ignored),
        );
    }

    if (isPlainObject(value)) {
        const fields = nestedFields(type, value);
        if (fields) return normalizeObject(value, fields, options, path, ignored).value;

        const converted: Record<string, unknown> = {};
        for (const [key, inner] of Object.entries(value)) {
            const domainKey = toDomainKey(key);
            const normalized = normalizeValue(inner, domainKey, { kind: "opaque" }, options, joinPath(path, key), ignored);
            if (normalized !== undefined) converted[domainKey] = normalized;
        }
        return converted;
    }

    if (isAmountField(name, type)) {
        if (typeof value === "number") return exactDecimal(value) ?? value;
        if (typeof value === "bigint") return value.toString();
        return value;
    }
    if (isCurrencyField(name) && typeof value === "string") {
        return normalizeCurrencyCode(value, options.nativeCurrency);
    }
    return coerceScalar(value, type);
}

function normalizeObject(
    input: Readonly<Record<string, unknown>>,
    fields: readonly FieldSchema[],
    options: NormalizeOptions,
    path: string,
    ignored: string[],
): Omit<NormalizedInput, "ignored"> {
    const value: Record<string, unknown> = {};
    const keys: Record<string, string> = {};

    for (const [key, raw] of Object.entries(input)) {
        const keyPath = joinPath(path, key);
        const field = resolveFieldKey(key, fields);
        if (!field) {
            ignored.push(keyPath);
            continue;
        }
        if (raw === null || raw === undefined) continue;

        // Two keys for one field: an exact domain key wins, else the first.
        const previous = keys[field.name];
        if (previous !== undefined) {
            if (previous === field.name || key !== field.name) {
                ignored.push(keyPath);
                continue;
            }
            ignored.push(joinPath(path, previous));
        }

        const normalized = normalizeValue(raw, field.name, field.type, options, keyPath, ignored);
        if (normalized === undefined) continue;
        value[field.name] = normalized;
        keys[field.name] = key;
    }

    return { value, keys };
}

/**
 * Normalize a caller-supplied mapping against a model's fields.
 *
 * @example
 * ```ts
 * normalizeInput({ destination_tag: "12", amount: 1000 }, fields);
 * // → { value: { DestinationTag: 12, Amount: "1000" }, keys: {...}, ignored: [] }
 * ```
 */
export function normalizeInput(
    input: Readonly<Record<string, unknown>>,
    fields: readonly FieldSchema[],
    options: NormalizeOptions = {},
): NormalizedInput {
    const ignored: string[] = [];
    const { value, keys } = normalizeObject(input, fields, options, "", ignored);
    return { value, keys, ignored };
}
