/**
 * Adapter from synthesized tools to the agent-tool shape (JSON Schema
 * parameters plus an async `execute`) that LLM runtimes consume.
 *
 * @module
 */

import type { SynthesizedTool, Tool } from "../types.js";
import { errorResult, jsonResult, type ErrorPayload } from "./helpers.js";
import type { ToolRegistry } from "./registry.js";

export type AgentToolDetails = Record<string, unknown> | ErrorPayload;

/**
 * Wrap a synthesized tool for an agent runtime. `execute` resolves with
 * the canonical value, or with an error result carrying the diagnostic; it
 * never rejects.
 */
export function toAgentTool(tool: SynthesizedTool): Tool<AgentToolDetails> {
    return {
        name: tool.name,
        label: `${tool.model} (${tool.category})`,
        description: tool.description,
        parameters: tool.parameters,
        execute: async (_toolCallId, params) => {
            const result = tool.invoke(params);
            return result.ok ? jsonResult(result.value) : errorResult(tool.name, result.error);
        },
    };
}

/** Every tool in a registry, in registration order, as agent tools. */
export function toAgentTools(registry: ToolRegistry): Tool<AgentToolDetails>[] {
    return registry.tools().map(toAgentTool);
}
