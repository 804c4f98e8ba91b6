/**
 * Shared ledger objects that appear inside transactions: memos, signers,
 * path steps, authorized accounts and cross-chain bridges.
 *
 * @module
 */

import { Type } from "@sinclair/typebox";
import {
    AccountAddress,
    BaseModel,
    CurrencyCode,
    type ModelIssue,
} from "./base.js";
import { IssuedCurrency, XRP } from "./currencies.js";

const HexBlob = (description: string) =>
    Type.String({ pattern: "^([0-9A-Fa-f]{2})*$", description });

export class Memo extends BaseModel {
    static readonly description =
        "An arbitrary message attached to a transaction. Each field is a hex string.";
    static readonly schema = Type.Object(
        {
            MemoData: Type.Optional(HexBlob("Arbitrary hex value, conventionally the memo content.")),
            MemoFormat: Type.Optional(HexBlob("Hex value of the MIME type of the memo content.")),
            MemoType: Type.Optional(HexBlob("Hex value identifying the relation of the memo.")),
        },
        { title: "Memo" },
    );

    constructor(fields: Readonly<Record<string, unknown>>) {
        super(Memo.schema, fields);
    }

    protected override getErrors(): ModelIssue[] {
        if (!this.has("MemoData") && !this.has("MemoFormat") && !this.has("MemoType")) {
            return [{ path: "/", message: "Memo must contain at least one of MemoData, MemoFormat or MemoType" }];
        }
        return [];
    }
}

export class Signer extends BaseModel {
    static readonly description = "One signature of a multi-signed transaction.";
    static readonly schema = Type.Object(
        {
            Account: AccountAddress("The address of the signer."),
            TxnSignature: Type.String({ description: "The signature this signer provided." }),
            SigningPubKey: Type.String({ description: "The public key used to verify the signature." }),
        },
        { title: "Signer" },
    );

    constructor(fields: Readonly<Record<string, unknown>>) {
        super(Signer.schema, fields);
    }
}

/** One hop of a payment path. Keys are lower-case on the ledger. */
export class PathStep extends BaseModel {
    static readonly description = "One step of a cross-currency payment path.";
    static readonly schema = Type.Object(
        {
            account: Type.Optional(AccountAddress("Rippling through this account.")),
            currency: Type.Optional(CurrencyCode("Change to this currency.")),
            issuer: Type.Optional(AccountAddress("Issuer of the new currency.")),
        },
        { title: "PathStep" },
    );

    constructor(fields: Readonly<Record<string, unknown>>) {
        super(PathStep.schema, fields);
    }

    protected override getErrors(): ModelIssue[] {
        const issues: ModelIssue[] = [];
        if (this.has("account") && (this.has("currency") || this.has("issuer"))) {
            issues.push({ path: "/account", message: "A path step cannot set account together with currency or issuer" });
        }
        if (this.text("currency") === "XRP" && this.has("issuer")) {
            issues.push({ path: "/issuer", message: "An XRP path step cannot have an issuer" });
        }
        return issues;
    }
}

export class AuthAccount extends BaseModel {
    static readonly description = "An account authorized to bid on an AMM auction slot.";
    static readonly schema = Type.Object(
        {
            Account: AccountAddress("The authorized account."),
        },
        { title: "AuthAccount" },
    );

    constructor(fields: Readonly<Record<string, unknown>>) {
        super(AuthAccount.schema, fields);
    }
}

/** Either an issued currency or XRP; the asset a bridge chain door holds. */
const BridgeIssue = Type.Union([IssuedCurrency.schema, XRP.schema]);

export class XChainBridge extends BaseModel {
    static readonly description = "A bridge between a locking chain and an issuing chain.";
    static readonly schema = Type.Object(
        {
            LockingChainDoor: AccountAddress("Door account on the locking chain."),
            LockingChainIssue: BridgeIssue,
            IssuingChainDoor: AccountAddress("Door account on the issuing chain."),
            IssuingChainIssue: BridgeIssue,
        },
        { title: "XChainBridge" },
    );

    constructor(fields: Readonly<Record<string, unknown>>) {
        super(XChainBridge.schema, fields);
    }
}
