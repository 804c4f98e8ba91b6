/**
 * Integration tests: the built-in catalogue end to end.
 *
 * Each test builds the registry from the real model modules and drives it
 * through `invoke` the way an agent would, with loosely-typed input.
 */

import { describe, it, expect } from "vitest";
import { Type } from "@sinclair/typebox";
import { BaseModel, MODEL_MODULES } from "ledgertools/models";
import {
    RegistryConflictError,
    buildRegistry,
    normalizeCurrencyCode,
    resolveFieldKey,
} from "ledgertools/tools";
import type { Diagnostic, InvokeResult } from "ledgertools";
import { catalogueRegistry } from "../helpers/index.js";

const USDC_HEX = "5553444300000000000000000000000000000000";

function expectValue(result: InvokeResult): Record<string, unknown> {
    if (!result.ok) throw new Error(`expected success, got ${result.error.kind}: ${result.error.message}`);
    return result.value;
}

function expectError(result: InvokeResult): Diagnostic {
    if (result.ok) throw new Error(`expected a diagnostic, got ${JSON.stringify(result.value)}`);
    return result.error;
}

function impostorPayment() {
    return class Payment extends BaseModel {
        static readonly schema = Type.Object({ Account: Type.String() }, { title: "Payment" });

        constructor(fields: Readonly<Record<string, unknown>>) {
            super(Payment.schema, fields);
        }
    };
}

const registry = catalogueRegistry();

// ---------------------------------------------------------------------------
// Payments
// ---------------------------------------------------------------------------

describe("transaction_payment", () => {
    it("keeps a digit-only amount as the literal string", () => {
        const value = expectValue(
            registry.invoke("transaction_payment", { account: "rSender", destination: "rReceiver", amount: "1000000" }),
        );
        expect(value.Amount).toBe("1000000");
        expect(value).toEqual({
            TransactionType: "Payment",
            Account: "rSender",
            Destination: "rReceiver",
            Amount: "1000000",
            Flags: 0,
        });
    });

    it("preserves every digit-only amount exactly", () => {
        for (const amount of ["1", "000123", "99999999999999999999"]) {
            const value = expectValue(
                registry.invoke("transaction_payment", { account: "rSender", destination: "rReceiver", amount }),
            );
            expect(value.Amount).toBe(amount);
        }
    });

    it("lists every missing required field", () => {
        const error = expectError(registry.invoke("transaction_payment", { account: "rSender" }));
        expect(error.kind).toBe("ValidationError");
        if (error.kind !== "ValidationError") return;
        expect(error.missing).toEqual(["amount", "destination"]);
        expect(error.schema.supplied).toEqual(["account"]);
        expect(error.schema.required).toEqual(["account", "amount", "destination"]);
    });

    it("reports every required field when called without input", () => {
        const error = expectError(registry.invoke("transaction_payment"));
        expect(error.kind).toBe("ValidationError");
        if (error.kind !== "ValidationError") return;
        expect(error.missing).toEqual(["account", "amount", "destination"]);
        expect(error.schema.supplied).toEqual([]);
    });

    it("rejects an amount too large to hold exactly as a number", () => {
        const error = expectError(
            registry.invoke("transaction_payment", {
                account: "rSender",
                destination: "rReceiver",
                amount: 12345678901234567890,
            }),
        );
        expect(error.kind).toBe("ModelConstructionError");
        expect(error.message).toMatch(/^Invalid Payment: \/Amount: /);
    });

    it("surfaces the model's own rejection verbatim", () => {
        const error = expectError(
            registry.invoke("transaction_payment", { account: "rSender", destination: "rSender", amount: "10" }),
        );
        expect(error.kind).toBe("ModelConstructionError");
        expect(error.message).toBe(
            "Invalid Payment: /Destination: An XRP payment transaction cannot have the same sender and destination",
        );
        if (error.kind === "ModelConstructionError") {
            expect(error.schema.supplied).toEqual(["account", "destination", "amount"]);
        }
    });
});

// ---------------------------------------------------------------------------
// Currency codes
// ---------------------------------------------------------------------------

describe("currency codes", () => {
    it("hex-encodes long codes and leaves the result alone", () => {
        expect(normalizeCurrencyCode("USDC")).toBe(USDC_HEX);
        expect(normalizeCurrencyCode(USDC_HEX)).toBe(USDC_HEX);
    });

    it("passes three-character codes through", () => {
        expect(normalizeCurrencyCode("USD")).toBe("USD");
    });

    it("encodes currency fields inside a trust line limit", () => {
        const input = {
            account: "rSender",
            limit_amount: { currency: "USDC", issuer: "rIssuer", value: "100" },
        };
        const first = expectValue(registry.invoke("transaction_trustset", input));
        expect(first).toEqual({
            TransactionType: "TrustSet",
            Account: "rSender",
            Flags: 0,
            LimitAmount: { currency: USDC_HEX, issuer: "rIssuer", value: "100" },
        });

        const again = expectValue(
            registry.invoke("transaction_trustset", { account: "rSender", limit_amount: first.LimitAmount }),
        );
        expect(again).toEqual(first);
    });
});

// ---------------------------------------------------------------------------
// Account settings
// ---------------------------------------------------------------------------

describe("transaction_accountset", () => {
    it("accepts flag names", () => {
        const value = expectValue(
            registry.invoke("transaction_accountset", { account: "rSender", set_flag: "asfRequireDest" }),
        );
        expect(value).toEqual({ TransactionType: "AccountSet", Account: "rSender", Flags: 0, SetFlag: 1 });
    });

    it("lists flag names in its description", () => {
        const info = registry.describeModel("AccountSet");
        const setFlag = info?.fields.find((field) => field.param === "set_flag");
        expect(setFlag?.labels?.[0]).toBe("asfRequireDest");
        expect(setFlag?.enum?.[0]).toBe(1);
    });
});

// ---------------------------------------------------------------------------
// Requests
// ---------------------------------------------------------------------------

describe("requests", () => {
    it("builds a query with coerced parameters", () => {
        const value = expectValue(
            registry.invoke("request_accountinfo", { account: "rSender", ledger_index: "validated", strict: "true" }),
        );
        expect(value).toEqual({ method: "account_info", account: "rSender", ledger_index: "validated", strict: true });
    });

    it("rejects a ledger name outside the known set before construction", () => {
        const error = expectError(registry.invoke("request_accountinfo", { account: "rSender", ledger_index: "latest" }));
        expect(error.kind).toBe("EnumViolation");
        expect(error.message).toBe('Invalid value "latest" for ledger_index; valid values: "validated", "closed", "current"');
    });

    it("reports an illegal enum value with the legal set", () => {
        const error = expectError(registry.invoke("request_noripplecheck", { account: "rSender", role: "admin" }));
        expect(error.kind).toBe("EnumViolation");
        expect(error.message).toBe('Invalid value "admin" for role; valid values: "gateway", "user"');
    });
});

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

describe("registry", () => {
    it("returns UnknownTool for an unregistered name", () => {
        const error = expectError(registry.invoke("transaction_teleport", {}));
        expect(error).toMatchObject({ kind: "UnknownTool", message: "Unknown tool: transaction_teleport" });
        if (error.kind === "UnknownTool") expect(error.available).toHaveLength(43);
    });

    it("aborts on two models with the same tool name", () => {
        const clash = { category: "transaction", exports: { Payment: impostorPayment() } };
        expect(() => buildRegistry([...MODEL_MODULES, clash])).toThrow(RegistryConflictError);
    });

    it("builds identical catalogues from the same modules", () => {
        expect(catalogueRegistry().list()).toEqual(catalogueRegistry().list());
    });

    it("builds without warnings", () => {
        const warnings: string[] = [];
        catalogueRegistry(warnings);
        expect(warnings).toEqual([]);
    });

    it("maps every caller key back to exactly its own field", () => {
        for (const tool of registry.tools()) {
            for (const field of tool.fields) {
                expect(resolveFieldKey(field.param, tool.fields)?.name).toBe(field.name);
                expect(resolveFieldKey(field.name, tool.fields)?.name).toBe(field.name);
            }
        }
    });

    it("handles calls in parallel without interference", async () => {
        const calls = ["rOne", "rTwo", "rThree"].map(async (destination) =>
            registry.invoke("transaction_payment", { account: "rSender", destination, amount: 5 }),
        );
        const values = (await Promise.all(calls)).map(expectValue);
        expect(values.map((v) => v.Destination)).toEqual(["rOne", "rTwo", "rThree"]);
        expect(values.map((v) => v.Amount)).toEqual(["5", "5", "5"]);
    });
});
