/**
 * Model discovery: scans model modules for concrete model classes and
 * registers a synthesized tool for each.
 *
 * ## Exclusion rules
 *
 * An export is not a model when any of these hold:
 * - it is not a class extending `BaseModel`;
 * - it carries its own `NON_MODEL` marker (abstract bases);
 * - its export name starts with `_`, or ends in `Flag` or `Interface`.
 *
 * A class re-exported under several names yields one tool.
 *
 * @module
 */

import { BaseModel, NON_MODEL } from "../models/base.js";
import type { ModelClass, ModelModule, SynthesizedTool } from "../types.js";
import { SchemaError } from "./errors.js";
import { ToolRegistry } from "./registry.js";
import { modelNameOf } from "./schema.js";
import { synthesizeTool, toolNameFor, type SynthesizeOptions } from "./synthesize.js";

// =============================================================================
// Discovery Options
// =============================================================================

export interface DiscoveryOptions extends SynthesizeOptions {
    /**
     * Tool names to include. If undefined, all tools are included.
     * Supports "category:" prefixes (e.g., "category:request").
     */
    include?: string[];
    /**
     * Tool names to exclude. Supports "category:" prefixes.
     */
    exclude?: string[];
    /**
     * Called for each model skipped because its schema could not be
     * extracted. If not provided, warnings are discarded.
     */
    onWarning?: (message: string) => void;
}

/** A model class found in a module, with the first name it was exported as. */
export interface DiscoveredModel {
    exportName: string;
    modelClass: ModelClass;
}

// =============================================================================
// Classification
// =============================================================================

/** Whether a value is a class extending {@link BaseModel}. */
export function isModelClass(value: unknown): value is ModelClass {
    return typeof value === "function" && value.prototype instanceof BaseModel;
}

function isExcludedExport(exportName: string, modelClass: ModelClass): boolean {
    return (
        exportName.startsWith("_") ||
        exportName.endsWith("Flag") ||
        exportName.endsWith("Interface") ||
        Object.hasOwn(modelClass, NON_MODEL)
    );
}

/**
 * Concrete model classes exported by a module, in export order, with
 * duplicates (re-exports of the same class) removed.
 */
export function discoverModelClasses(module: ModelModule): DiscoveredModel[] {
    const seen = new Set<ModelClass>();
    const found: DiscoveredModel[] = [];
    for (const [exportName, value] of Object.entries(module.exports)) {
        if (!isModelClass(value) || isExcludedExport(exportName, value)) continue;
        if (seen.has(value)) continue;
        seen.add(value);
        found.push({ exportName, modelClass: value });
    }
    return found;
}

// =============================================================================
// Filters
// =============================================================================

type ToolFilter = (name: string, category: string) => boolean;

function matches(patterns: readonly string[], name: string, category: string): boolean {
    return patterns.some((pattern) =>
        pattern.startsWith("category:") ? pattern.slice("category:".length) === category : pattern === name,
    );
}

function createFilter(options: DiscoveryOptions): ToolFilter {
    const { include, exclude } = options;
    return (name, category) => {
        if (include && !matches(include, name, category)) return false;
        if (exclude && matches(exclude, name, category)) return false;
        return true;
    };
}

// =============================================================================
// Discovery API
// =============================================================================

function trySynthesize(
    modelClass: ModelClass,
    category: string,
    options: SynthesizeOptions,
    onSkip: (err: SchemaError) => void,
): SynthesizedTool | undefined {
    try {
        return synthesizeTool(modelClass, category, options);
    } catch (err) {
        if (!(err instanceof SchemaError)) throw err;
        onSkip(err);
        return undefined;
    }
}

/**
 * Discover models in the given modules and register their tools.
 *
 * Models whose schema cannot be extracted are skipped with a warning.
 *
 * @throws RegistryConflictError if two models produce the same tool name.
 */
export function discoverModels(
    registry: ToolRegistry,
    modules: readonly ModelModule[],
    options: DiscoveryOptions = {},
): void {
    const accept = createFilter(options);
    let skipped = 0;

    for (const module of modules) {
        registry.registerCategory(module.category, module.label ?? module.category);

        for (const { exportName, modelClass } of discoverModelClasses(module)) {
            if (!accept(toolNameFor(module.category, modelNameOf(modelClass)), module.category)) continue;

            const tool = trySynthesize(modelClass, module.category, options, (err) => {
                skipped++;
                options.onWarning?.(`Skipping ${module.category} model "${exportName}": ${err.message}`);
            });
            if (tool) registry.register(tool);
        }
    }

    if (skipped > 0) {
        options.onWarning?.(`${skipped} model(s) could not be turned into tools`);
    }
}

/**
 * Build a sealed registry from the given modules.
 *
 * @example
 * ```ts
 * import { buildRegistry } from "ledgertools/tools";
 * import { MODEL_MODULES } from "ledgertools/models";
 *
 * const registry = buildRegistry(MODEL_MODULES, { include: ["category:request"] });
 * ```
 */
export function buildRegistry(modules: readonly ModelModule[], options: DiscoveryOptions = {}): ToolRegistry {
    const registry = new ToolRegistry();
    discoverModels(registry, modules, options);
    registry.seal();
    return registry;
}
