/**
 * ledgertools: turns a catalogue of ledger domain models into tools that an
 * LLM agent can call with loosely-typed input.
 *
 * Each model class becomes one tool. Invoking a tool normalizes the input
 * (key casing, amounts, currency codes, primitive coercion), validates it,
 * and constructs the model; the result is either the model's canonical JSON
 * or a structured diagnostic the caller can act on.
 *
 * ## Quick Start
 *
 * ```ts
 * import { createLedgerTools } from "ledgertools";
 *
 * const lt = createLedgerTools();
 *
 * // List all available tools
 * for (const { name } of lt.listTools()) {
 *   console.log(name);
 * }
 *
 * const result = lt.invoke("transaction_payment", {
 *   account: "rSender",
 *   destination: "rReceiver",
 *   amount: 1000000,
 * });
 * if (result.ok) console.log(result.value);
 * else console.error(result.error.kind, result.error.message);
 * ```
 *
 * ## Architecture
 *
 * - **models/**: The domain-model catalogue (transactions, requests,
 *   amounts, currencies and shared objects).
 * - **tools/**: Schema extraction, normalization, validation, synthesis,
 *   registry and discovery.
 *
 * @module
 */

// =============================================================================
// Re-exports: Types
// =============================================================================

export type {
    ModelClass,
    ModelModule,
    FieldSchema,
    FieldType,
    PrimitiveKind,
    LiteralValue,
    FieldSummary,
    SchemaReport,
    EnumIssue,
    Diagnostic,
    DiagnosticKind,
    InvokeResult,
    SynthesizedTool,
    ToolSummary,
    ToolCategory,
    ModelSchemaInfo,
    Tool,
    ToolResult,
    ContentBlock,
    TextContent,
} from "./types.js";

// =============================================================================
// Re-exports: Tool system
// =============================================================================

export {
    ToolRegistry,
    buildRegistry,
    discoverModels,
    synthesizeTool,
    toolNameFor,
    extractFieldSchemas,
    normalizeInput,
    normalizeCurrencyCode,
    encodeCurrencyCode,
    decodeCurrencyCode,
    SchemaError,
    RegistryConflictError,
    RegistrySealedError,
    jsonResult,
    errorResult,
    toAgentTool,
    toAgentTools,
} from "./tools/index.js";
export type { DiscoveryOptions, NormalizeOptions, AgentToolDetails } from "./tools/index.js";

// =============================================================================
// Re-exports: Models
// =============================================================================

export { BaseModel, ModelError, NON_MODEL, MODEL_MODULES } from "./models/index.js";
export type { ModelIssue } from "./models/index.js";

// =============================================================================
// Convenience: Pre-configured instance
// =============================================================================

import type { InvokeResult, ModelModule, ModelSchemaInfo, Tool, ToolCategory, ToolSummary } from "./types.js";
import { MODEL_MODULES } from "./models/index.js";
import type { ToolRegistry } from "./tools/registry.js";
import { buildRegistry, type DiscoveryOptions } from "./tools/discovery.js";
import { toAgentTools, type AgentToolDetails } from "./tools/adapter.js";

/**
 * Options for creating a ledgertools instance.
 */
export interface LedgerToolsOptions extends DiscoveryOptions {
    /**
     * Model modules to scan. Defaults to the built-in catalogue.
     */
    modules?: readonly ModelModule[];
}

/**
 * A ledgertools instance: a sealed registry plus the operations callers use.
 */
export interface LedgerTools {
    /** The sealed tool registry. */
    tools: ToolRegistry;
    /** Name and description of every tool. */
    listTools(): ToolSummary[];
    /** Tools grouped by category. */
    listCategories(): ToolCategory[];
    /** Invoke a tool by name. Never throws. */
    invoke(name: string, input?: Readonly<Record<string, unknown>> | null): InvokeResult;
    /** Detailed schema of a model by model or tool name. */
    describeModel(model: string): ModelSchemaInfo | undefined;
    /** The catalogue as agent tools. */
    agentTools(): Tool<AgentToolDetails>[];
}

function defaultWarning(message: string): void {
    console.warn(`[ledgertools] ${message}`);
}

/**
 * Create a ledgertools instance.
 *
 * Models whose schema cannot be extracted are skipped and reported through
 * `onWarning` (default: `console.warn`).
 *
 * @throws RegistryConflictError if two models produce the same tool name.
 *
 * @example
 * ```ts
 * import { createLedgerTools } from "ledgertools";
 *
 * const lt = createLedgerTools({ include: ["category:request"] });
 * console.log(lt.describeModel("AccountInfo")?.fields.map((f) => f.param));
 * ```
 */
export function createLedgerTools(options: LedgerToolsOptions = {}): LedgerTools {
    const { modules = MODEL_MODULES, ...discovery } = options;
    const registry = buildRegistry(modules, {
        ...discovery,
        onWarning: discovery.onWarning ?? defaultWarning,
    });

    return {
        tools: registry,
        listTools: () => registry.list(),
        listCategories: () => registry.listByCategory(),
        invoke: (name, input) => registry.invoke(name, input),
        describeModel: (model) => registry.describeModel(model),
        agentTools: () => toAgentTools(registry),
    };
}

let shared: LedgerTools | undefined;

/**
 * The process-wide instance over the built-in catalogue, built on first use.
 */
export function getLedgerTools(): LedgerTools {
    shared ??= createLedgerTools();
    return shared;
}
