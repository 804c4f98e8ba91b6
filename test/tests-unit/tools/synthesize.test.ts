import { describe, it, expect } from "vitest";
import {
    composeDescription,
    exampleValue,
    extractFieldSchemas,
    synthesizeTool,
    toParametersSchema,
    toolNameFor,
} from "ledgertools/tools";
import { AccountSet, NoRippleCheck, Payment } from "ledgertools/models";
import type { Diagnostic, InvokeResult } from "ledgertools";
import { Gadget, ThrowingModel, Widget, makeShortNamedSprocket } from "../../helpers/index.js";

function expectError(result: InvokeResult): Diagnostic {
    if (result.ok) throw new Error(`expected a diagnostic, got ${JSON.stringify(result.value)}`);
    return result.error;
}

describe("Tool synthesis", () => {
    const tool = synthesizeTool(Widget, "widgets");

    // ---------------------------------------------------------------------------
    // Shape
    // ---------------------------------------------------------------------------

    describe("shape", () => {
        it("names tools <category>_<model> in lower case", () => {
            expect(tool.name).toBe("widgets_widget");
            expect(toolNameFor("Transaction", "Payment")).toBe("transaction_payment");
        });

        it("exposes the model, category, fields and parameter schema", () => {
            expect(tool.model).toBe("Widget");
            expect(tool.category).toBe("widgets");
            expect(tool.fields).toBe(extractFieldSchemas(Widget));
            expect(tool.parameters).toEqual(toParametersSchema(tool.fields));
        });

        it("is immutable", () => {
            expect(Object.isFrozen(tool)).toBe(true);
        });

        it("takes the model name from the schema title, not the class name", () => {
            const sprocket = synthesizeTool(makeShortNamedSprocket(), "parts");
            expect(sprocket.name).toBe("parts_sprocket");
            expect(sprocket.model).toBe("Sprocket");
            expect(sprocket.description.split("\n")[0]).toBe(
                "Create a Sprocket parts model and return its canonical JSON form.",
            );

            const error = expectError(sprocket.invoke({ label: "bad" }));
            expect(error.kind).toBe("ModelConstructionError");
            expect(error.message).toBe("Invalid Sprocket: /Label: Label must not be bad");
            if (error.kind === "ModelConstructionError") expect(error.schema.model).toBe("Sprocket");
        });
    });

    // ---------------------------------------------------------------------------
    // Description
    // ---------------------------------------------------------------------------

    describe("description", () => {
        const lines = tool.description.split("\n");

        it("starts with the purpose and the model description", () => {
            expect(lines.slice(0, 3)).toEqual([
                "Create a Widget widgets model and return its canonical JSON form.",
                "",
                "A test widget.",
            ]);
        });

        it("lists required fields with examples", () => {
            const start = lines.indexOf("Required fields:");
            expect(lines.slice(start + 1, start + 3)).toEqual([
                '  - widget_name (string): Display name. Example: "example"',
                "  - count (integer): How many. Example: 1",
            ]);
        });

        it("lists optional fields with examples or legal values", () => {
            const start = lines.indexOf("Optional fields:");
            expect(lines.slice(start + 1, start + 7)).toEqual([
                '  - amount (string): Unit amount. Example: "1000000"',
                "  - enabled (boolean) Example: true",
                '  - mode ("fast" | "slow") Valid values: "fast", "slow"',
                "  - ratio (number) Example: 1.5",
                '  - tags (string[]) Example: ["example"]',
                "  - extra (any) Example: {}",
            ]);
        });

        it("skips the model description when there is none", () => {
            const gadget = composeDescription(Gadget, "widgets", extractFieldSchemas(Gadget)).split("\n");
            expect(gadget.slice(0, 3)).toEqual([
                "Create a Gadget widgets model and return its canonical JSON form.",
                "",
                "Required fields:",
            ]);
            expect(gadget[4]).toBe('  - part (Part) Example: {"part_name":"example"}');
        });

        it("names the members of named enums next to their values", () => {
            const accountSet = synthesizeTool(AccountSet, "transaction").description;
            expect(accountSet).toContain(
                "Account flag to enable. Valid values: 1 (asfRequireDest), 2 (asfRequireAuth), 3 (asfDisallowXRP),",
            );
            expect(accountSet).toContain("12 (asfDisallowIncomingNFTokenOffer)");
        });

        it("leaves out member names that only restate the value", () => {
            const lines = synthesizeTool(NoRippleCheck, "request").description.split("\n");
            const role = lines.find((line) => line.startsWith("  - role "));
            expect(role).toBe(
                '  - role ("gateway" | "user"): Whether the address is a gateway or a user. Valid values: "gateway", "user"',
            );
        });

        it("gives amount and currency examples by field name", () => {
            expect(exampleValue("Amount", { kind: "primitive", primitive: "string" })).toBe("1000000");
            expect(exampleValue("currency", { kind: "primitive", primitive: "string" })).toBe("USD");
            expect(exampleValue("Memos", { kind: "sequence", items: { kind: "primitive", primitive: "integer" } })).toEqual([1]);
        });
    });

    // ---------------------------------------------------------------------------
    // Invocation
    // ---------------------------------------------------------------------------

    describe("invoke", () => {
        it("returns the canonical representation on success", () => {
            expect(tool.invoke({ widget_name: "w", count: "3" })).toEqual({
                ok: true,
                tool: "widgets_widget",
                value: { WidgetName: "w", Count: 3 },
            });
        });

        it("applies schema defaults", () => {
            const result = synthesizeTool(Gadget, "widgets").invoke({ label: "g", part: { part_name: "p" } });
            expect(result).toEqual({
                ok: true,
                tool: "widgets_gadget",
                value: { Label: "g", Part: { PartName: "p" }, Level: 1 },
            });
        });

        it("drops unknown keys from the output", () => {
            const result = tool.invoke({ widget_name: "w", count: 1, colour: "red" });
            expect(result.ok && result.value).toEqual({ WidgetName: "w", Count: 1 });
        });

        it("reports missing required fields with the full schema", () => {
            const error = expectError(tool.invoke({ colour: "red" }));
            expect(error.kind).toBe("ValidationError");
            if (error.kind !== "ValidationError") return;
            expect(error.tool).toBe("widgets_widget");
            expect(error.message).toBe("Missing required fields: widget_name, count");
            expect(error.missing).toEqual(["widget_name", "count"]);
            expect(error.ignored).toEqual(["colour"]);
            expect(error.schema.supplied).toEqual(["colour"]);
            expect(error.schema.required).toEqual(["widget_name", "count"]);
        });

        it("reports enum violations with the legal set", () => {
            const error = expectError(tool.invoke({ widget_name: "w", count: 1, mode: "medium" }));
            expect(error.kind).toBe("EnumViolation");
            if (error.kind !== "EnumViolation") return;
            expect(error.field).toBe("mode");
            expect(error.value).toBe("medium");
            expect(error.legal).toEqual(["fast", "slow"]);
            expect(error.message).toBe('Invalid value "medium" for mode; valid values: "fast", "slow"');
            expect(error.schema.model).toBe("Widget");
        });

        it("wraps cross-field failures verbatim", () => {
            const error = expectError(tool.invoke({ widget_name: "w", count: 13 }));
            expect(error.kind).toBe("ModelConstructionError");
            expect(error.message).toBe("Invalid Widget: /Count: Count must not be 13");
        });

        it("wraps schema failures from construction", () => {
            const error = expectError(tool.invoke({ widget_name: "w", count: "many" }));
            expect(error.kind).toBe("ModelConstructionError");
            expect(error.message).toMatch(/^Invalid Widget: \/Count: /);
            if (error.kind === "ModelConstructionError") {
                expect(error.schema.fields.map((f) => f.param)).toContain("count");
            }
        });

        it("never throws, even when the constructor throws a non-error", () => {
            const throwing = synthesizeTool(ThrowingModel, "broken");
            const error = expectError(throwing.invoke({ input: "x" }));
            expect(error).toMatchObject({ kind: "ModelConstructionError", tool: "broken_throwingmodel", message: "boom" });
        });

        it("is deterministic", () => {
            const input = { widget_name: "w", count: "4", tags: ["x", 2] };
            expect(tool.invoke(input)).toEqual(tool.invoke(input));
        });

        it("treats absent or non-object input as an empty mapping", () => {
            for (const input of [undefined, null, JSON.parse('"widget"'), JSON.parse("[1, 2]")]) {
                const error = expectError(tool.invoke(input));
                expect(error.kind).toBe("ValidationError");
                if (error.kind !== "ValidationError") continue;
                expect(error.missing).toEqual(["widget_name", "count"]);
                expect(error.schema.supplied).toEqual([]);
            }
            expect(expectError(tool.invoke()).kind).toBe("ValidationError");
        });

        it("accepts enum member names in place of values", () => {
            const result = synthesizeTool(AccountSet, "transaction").invoke({
                account: "rSender",
                set_flag: "asfRequireDest",
                clear_flag: "asf_no_freeze",
            });
            expect(result).toEqual({
                ok: true,
                tool: "transaction_accountset",
                value: { TransactionType: "AccountSet", Account: "rSender", Flags: 0, SetFlag: 1, ClearFlag: 6 },
            });
        });

        it("checks required fields before enum membership", () => {
            const error = expectError(tool.invoke({ mode: "medium" }));
            expect(error.kind).toBe("ValidationError");
        });
    });

    describe("Payment", () => {
        const payment = synthesizeTool(Payment, "transaction");

        it("keeps the amount as the literal string", () => {
            const result = payment.invoke({ account: "rSender", destination: "rReceiver", amount: "1000000" });
            expect(result).toEqual({
                ok: true,
                tool: "transaction_payment",
                value: {
                    TransactionType: "Payment",
                    Account: "rSender",
                    Flags: 0,
                    Amount: "1000000",
                    Destination: "rReceiver",
                },
            });
        });

        it("describes the amount union", () => {
            expect(payment.description).toContain(
                '  - amount (IssuedCurrencyAmount | MPTAmount | string) Example: "1000000"',
            );
        });
    });
});
