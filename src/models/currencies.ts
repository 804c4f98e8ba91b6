/**
 * Currency specifiers (a currency without a value).
 *
 * @module
 */

import { Type } from "@sinclair/typebox";
import { AccountAddress, BaseModel, CurrencyCode, type ModelIssue } from "./base.js";

export class IssuedCurrency extends BaseModel {
    static readonly description = "Specifies an issued currency (without a value).";
    static readonly schema = Type.Object(
        {
            currency: CurrencyCode("Three-character code or 40-character hex code of the currency."),
            issuer: AccountAddress("The address of the account that issues the currency."),
        },
        { title: "IssuedCurrency" },
    );

    constructor(fields: Readonly<Record<string, unknown>>) {
        super(IssuedCurrency.schema, fields);
    }

    protected override getErrors(): ModelIssue[] {
        if (this.text("currency")?.toUpperCase() === "XRP") {
            return [{ path: "/currency", message: "Currency must not be XRP for issued currency" }];
        }
        return [];
    }
}

export class MPTCurrency extends BaseModel {
    static readonly description = "Specifies a multi-purpose token issuance (without a value).";
    static readonly schema = Type.Object(
        {
            mpt_issuance_id: Type.String({
                pattern: "^[0-9A-Fa-f]{48}$",
                description: "The 192-bit identifier of the token issuance, as hex.",
            }),
        },
        { title: "MPTCurrency" },
    );

    constructor(fields: Readonly<Record<string, unknown>>) {
        super(MPTCurrency.schema, fields);
    }
}

export class XRP extends BaseModel {
    static readonly description = "Specifies XRP as a currency (without a value).";
    static readonly schema = Type.Object(
        {
            currency: Type.Literal("XRP", { default: "XRP", description: "Always XRP." }),
        },
        { title: "XRP" },
    );

    constructor(fields: Readonly<Record<string, unknown>> = {}) {
        super(XRP.schema, fields);
    }
}
