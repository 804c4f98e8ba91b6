/**
 * Tool Registry: the catalogue of synthesized tools, keyed by tool name.
 *
 * Built once by discovery and then sealed; after that it is read-only and
 * safe to share between concurrent callers.
 *
 * @module
 */

import type {
    InvokeResult,
    ModelSchemaInfo,
    SynthesizedTool,
    ToolCategory,
    ToolSummary,
} from "../types.js";
import { RegistryConflictError, RegistrySealedError } from "./errors.js";
import { summarizeField, unknownToolError } from "./validate.js";

/**
 * Catalogue of synthesized tools.
 *
 * @example
 * ```ts
 * import { ToolRegistry, synthesizeTool } from "ledgertools/tools";
 * import { Payment } from "ledgertools/models";
 *
 * const registry = new ToolRegistry();
 * registry.register(synthesizeTool(Payment, "transaction"));
 * registry.seal();
 *
 * const result = registry.invoke("transaction_payment", {
 *   account: "rSender",
 *   destination: "rReceiver",
 *   amount: 1000000,
 * });
 * ```
 */
export class ToolRegistry {
    private entries = new Map<string, SynthesizedTool>();
    private categories = new Map<string, string>(); // category → label
    private sealed = false;

    // ---------------------------------------------------------------------------
    // Registration
    // ---------------------------------------------------------------------------

    /**
     * Register a display label for a category, used by `listByCategory()`.
     */
    registerCategory(category: string, label: string): void {
        this.assertOpen(category);
        this.categories.set(category, label);
    }

    /**
     * Add a tool.
     *
     * @throws RegistryConflictError if a tool of the same name exists.
     * @throws RegistrySealedError once the registry is sealed.
     */
    register(tool: SynthesizedTool): void {
        this.assertOpen(tool.name);
        const existing = this.entries.get(tool.name);
        if (existing) {
            throw new RegistryConflictError(tool.name, existing.model, tool.model);
        }
        this.entries.set(tool.name, tool);
    }

    /** Freeze the registry against further registration. */
    seal(): void {
        this.sealed = true;
    }

    get isSealed(): boolean {
        return this.sealed;
    }

    // ---------------------------------------------------------------------------
    // Lookup
    // ---------------------------------------------------------------------------

    get(name: string): SynthesizedTool | undefined {
        return this.entries.get(name);
    }

    has(name: string): boolean {
        return this.entries.has(name);
    }

    /** Tool names in registration order. */
    names(): string[] {
        return Array.from(this.entries.keys());
    }

    /** All tools in registration order. */
    tools(): SynthesizedTool[] {
        return Array.from(this.entries.values());
    }

    get size(): number {
        return this.entries.size;
    }

    // ---------------------------------------------------------------------------
    // Catalog Queries
    // ---------------------------------------------------------------------------

    /**
     * Name and description of every tool, in registration order.
     */
    list(): ToolSummary[] {
        return Array.from(this.entries.values(), (tool) => ({
            name: tool.name,
            description: tool.description,
        }));
    }

    /**
     * Tools grouped by category, in the order categories first appear.
     */
    listByCategory(): ToolCategory[] {
        const grouped = new Map<string, ToolSummary[]>();
        for (const tool of this.entries.values()) {
            const summaries = grouped.get(tool.category) ?? [];
            summaries.push({ name: tool.name, description: tool.description });
            grouped.set(tool.category, summaries);
        }
        return Array.from(grouped.entries(), ([category, tools]) => ({
            category,
            label: this.categories.get(category) ?? category,
            count: tools.length,
            tools,
        }));
    }

    /**
     * Detailed schema of a model, looked up by model name
     * (case-insensitive) or by tool name.
     */
    describeModel(model: string): ModelSchemaInfo | undefined {
        const wanted = model.toLowerCase();
        const tool = this.entries.get(model)
            ?? this.tools().find((candidate) => candidate.model.toLowerCase() === wanted);
        if (!tool) return undefined;
        return {
            model: tool.model,
            category: tool.category,
            tool: tool.name,
            description: tool.description,
            fields: tool.fields.map(summarizeField),
        };
    }

    // ---------------------------------------------------------------------------
    // Invocation
    // ---------------------------------------------------------------------------

    /**
     * Invoke a tool by name. Never throws: an unknown name yields an
     * `UnknownTool` diagnostic listing the available tools.
     */
    invoke(name: string, input?: Readonly<Record<string, unknown>> | null): InvokeResult {
        const tool = this.entries.get(name);
        if (!tool) {
            return { ok: false, error: unknownToolError(name, this.names()) };
        }
        return tool.invoke(input);
    }

    // ---------------------------------------------------------------------------
    // Internal
    // ---------------------------------------------------------------------------

    private assertOpen(name: string): void {
        if (this.sealed) throw new RegistrySealedError(name);
    }
}
