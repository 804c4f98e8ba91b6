/**
 * Tool engine: schema extraction, normalization, validation, synthesis,
 * registry and discovery.
 *
 * @example
 * ```ts
 * import { buildRegistry, toAgentTools } from "ledgertools/tools";
 * import { MODEL_MODULES } from "ledgertools/models";
 *
 * const registry = buildRegistry(MODEL_MODULES);
 *
 * for (const { name } of registry.list()) {
 *   console.log(name);
 * }
 *
 * const result = registry.invoke("request_accountinfo", { account: "rExample" });
 * if (!result.ok) console.error(result.error.message);
 *
 * // Hand the catalogue to an agent runtime
 * const tools = toAgentTools(registry);
 * ```
 *
 * @module
 */

export { ToolRegistry } from "./registry.js";
export {
    buildRegistry,
    discoverModels,
    discoverModelClasses,
    isModelClass,
    type DiscoveredModel,
    type DiscoveryOptions,
} from "./discovery.js";
export {
    synthesizeTool,
    toolNameFor,
    composeDescription,
    exampleValue,
    type SynthesizeOptions,
} from "./synthesize.js";
export {
    extractFieldSchemas,
    modelNameOf,
    toParametersSchema,
    describeFieldType,
    toSnakeCaseKey,
    squashKey,
} from "./schema.js";
export {
    normalizeInput,
    normalizeValue,
    toFieldMapping,
    resolveFieldKey,
    toDomainKey,
    isAmountField,
    isCurrencyField,
    type NormalizeOptions,
    type NormalizedInput,
} from "./normalize.js";
export {
    normalizeCurrencyCode,
    encodeCurrencyCode,
    decodeCurrencyCode,
    isHexCurrencyCode,
    HEX_CURRENCY_WIDTH,
} from "./currency.js";
export {
    findMissingFields,
    findEnumViolations,
    buildSchemaReport,
    summarizeField,
} from "./validate.js";
export { SchemaError, RegistryConflictError, RegistrySealedError } from "./errors.js";
export { jsonResult, errorResult, type ErrorPayload } from "./helpers.js";
export { toAgentTool, toAgentTools, type AgentToolDetails } from "./adapter.js";
