/**
 * Amounts: a value in XRP drops, an issued currency, or an MPT.
 *
 * @module
 */

import { Type } from "@sinclair/typebox";
import {
    AccountAddress,
    BaseModel,
    CurrencyCode,
    DROPS_PATTERN,
    type ModelIssue,
} from "./base.js";

const DecimalString = (description: string) =>
    Type.String({ pattern: "^-?(\\d+\\.?\\d*|\\.\\d+)([eE][-+]?\\d+)?$", description });

export class IssuedCurrencyAmount extends BaseModel {
    static readonly description = "Specifies an amount in an issued currency.";
    static readonly schema = Type.Object(
        {
            currency: CurrencyCode("Three-character code or 40-character hex code of the currency."),
            issuer: AccountAddress("The address of the account that issues the currency."),
            value: DecimalString("The quoted amount, as a decimal string."),
        },
        { title: "IssuedCurrencyAmount" },
    );

    constructor(fields: Readonly<Record<string, unknown>>) {
        super(IssuedCurrencyAmount.schema, fields);
    }

    protected override getErrors(): ModelIssue[] {
        if (this.text("currency")?.toUpperCase() === "XRP") {
            return [{ path: "/currency", message: "Currency must not be XRP for issued currency" }];
        }
        return [];
    }
}

export class MPTAmount extends BaseModel {
    static readonly description = "Specifies an amount of a multi-purpose token.";
    static readonly schema = Type.Object(
        {
            mpt_issuance_id: Type.String({
                pattern: "^[0-9A-Fa-f]{48}$",
                description: "The 192-bit identifier of the token issuance, as hex.",
            }),
            value: Type.String({ pattern: "^\\d+$", description: "The amount, as an integer string." }),
        },
        { title: "MPTAmount" },
    );

    constructor(fields: Readonly<Record<string, unknown>>) {
        super(MPTAmount.schema, fields);
    }
}

/** XRP in drops, as a decimal string. */
export const XRPDrops = Type.String({
    pattern: DROPS_PATTERN,
    description: "An amount of XRP in drops (1 XRP = 1,000,000 drops).",
});

/** Any amount. Object shapes are tried before the drops string. */
export const Amount = Type.Union([IssuedCurrencyAmount.schema, MPTAmount.schema, XRPDrops]);
