/**
 * Tool result helpers: wrap invocation outcomes as agent tool results.
 *
 * @module
 */

import type { Diagnostic, ToolResult } from "../types.js";

/**
 * Create a tool result containing JSON text.
 *
 * The payload is serialized as pretty-printed JSON and also kept as
 * structured `details`.
 */
export function jsonResult<T>(payload: T): ToolResult<T> {
    return {
        content: [{ type: "text", text: JSON.stringify(payload, null, 2) }],
        details: payload,
    };
}

/** Error payload as the model sees it. */
export interface ErrorPayload {
    status: "error";
    tool: string;
    error: Diagnostic;
}

/**
 * Create a tool result containing a diagnostic.
 *
 * Error results are a JSON object with `status: "error"` so the LLM can
 * distinguish errors from normal results.
 */
export function errorResult(toolName: string, error: Diagnostic): ToolResult<ErrorPayload> {
    const payload: ErrorPayload = { status: "error", tool: toolName, error };
    return {
        content: [{ type: "text", text: JSON.stringify(payload) }],
        details: payload,
    };
}
