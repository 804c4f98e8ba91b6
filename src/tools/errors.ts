/**
 * Build-time error types of the tool engine.
 *
 * Invocation never throws; these are raised while extracting schemas and
 * building the registry.
 *
 * @module
 */

/**
 * Thrown when a model class cannot be projected into a field schema.
 * Discovery skips the class and carries on with the rest of the catalogue.
 */
export class SchemaError extends Error {
    readonly model: string;

    constructor(model: string, message: string) {
        super(`${model}: ${message}`);
        this.name = "SchemaError";
        this.model = model;
    }
}

/**
 * Thrown when two model classes synthesize to the same tool name.
 * Fatal: the registry is never returned.
 */
export class RegistryConflictError extends Error {
    readonly tool: string;
    readonly models: readonly [string, string];

    constructor(tool: string, existing: string, incoming: string) {
        super(`Tool name "${tool}" is produced by both ${existing} and ${incoming}`);
        this.name = "RegistryConflictError";
        this.tool = tool;
        this.models = [existing, incoming];
    }
}

/**
 * Thrown when registering into a registry that has already been sealed.
 */
export class RegistrySealedError extends Error {
    constructor(tool: string) {
        super(`Cannot register "${tool}": the registry is sealed`);
        this.name = "RegistrySealedError";
    }
}
