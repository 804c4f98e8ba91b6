/**
 * Transaction models.
 *
 * Field names follow the ledger's PascalCase JSON. Every transaction shares
 * the {@link TRANSACTION_COMMON_FIELDS}; the canonical form adds
 * `TransactionType`.
 *
 * @module
 */

import { Type, type TObject } from "@sinclair/typebox";
import {
    AccountAddress,
    BaseModel,
    Drops,
    Hash256,
    NON_MODEL,
    NamedEnum,
    UInt32,
    type ModelIssue,
} from "./base.js";
import { Amount, IssuedCurrencyAmount, XRPDrops } from "./amounts.js";
import { Memo, PathStep, Signer } from "./common.js";

// =============================================================================
// Flags
// =============================================================================

export enum PaymentFlag {
    tfNoRippleDirect = 0x00010000,
    tfPartialPayment = 0x00020000,
    tfLimitQuality = 0x00040000,
}

export enum TrustSetFlag {
    tfSetfAuth = 0x00010000,
    tfSetNoRipple = 0x00020000,
    tfClearNoRipple = 0x00040000,
    tfSetFreeze = 0x00100000,
    tfClearFreeze = 0x00200000,
}

export enum OfferCreateFlag {
    tfPassive = 0x00010000,
    tfImmediateOrCancel = 0x00020000,
    tfFillOrKill = 0x00040000,
    tfSell = 0x00080000,
}

export enum NFTokenMintFlag {
    tfBurnable = 0x00000001,
    tfOnlyXRP = 0x00000002,
    tfTrustLine = 0x00000004,
    tfTransferable = 0x00000008,
}

/** Account-level settings toggled by AccountSet's SetFlag / ClearFlag. */
export enum AccountSetAsfFlag {
    asfRequireDest = 1,
    asfRequireAuth = 2,
    asfDisallowXRP = 3,
    asfDisableMaster = 4,
    asfAccountTxnID = 5,
    asfNoFreeze = 6,
    asfGlobalFreeze = 7,
    asfDefaultRipple = 8,
    asfDepositAuth = 9,
    asfAuthorizedNFTokenMinter = 10,
    asfDisallowIncomingNFTokenOffer = 12,
    asfDisallowIncomingCheck = 13,
    asfDisallowIncomingPayChan = 14,
    asfDisallowIncomingTrustline = 15,
    asfAllowTrustLineClawback = 16,
}

// =============================================================================
// Common fields
// =============================================================================

const MemoWrapper = Type.Object({ Memo: Memo.schema }, { title: "MemoWrapper" });
const SignerWrapper = Type.Object({ Signer: Signer.schema }, { title: "SignerWrapper" });

/** Fields every transaction accepts, in ledger order. */
export const TRANSACTION_COMMON_FIELDS = {
    Account: AccountAddress("The address of the account that initiates the transaction."),
    Fee: Type.Optional(Drops("Transaction cost, in drops of XRP.")),
    Sequence: Type.Optional(UInt32("Sequence number of the sending account.")),
    Flags: Type.Integer({ minimum: 0, default: 0, description: "Bit-flags for this transaction." }),
    LastLedgerSequence: Type.Optional(UInt32("Highest ledger index this transaction can appear in.")),
    SourceTag: Type.Optional(UInt32("Identifies the reason or sender behind the payment.")),
    TicketSequence: Type.Optional(UInt32("Ticket to use in place of a sequence number.")),
    NetworkID: Type.Optional(UInt32("Network this transaction is intended for.")),
    Memos: Type.Optional(Type.Array(MemoWrapper, { description: "Arbitrary messages attached to the transaction." })),
    Signers: Type.Optional(Type.Array(SignerWrapper, { description: "Signatures of a multi-signed transaction." })),
};

/**
 * Base of all transactions. Not a tool: carries {@link NON_MODEL}.
 */
export abstract class Transaction extends BaseModel {
    static readonly [NON_MODEL] = true;

    readonly transactionType: string;

    protected constructor(
        transactionType: string,
        schema: TObject,
        fields: Readonly<Record<string, unknown>>,
    ) {
        super(schema, fields);
        this.transactionType = transactionType;
    }

    protected hasFlag(flag: number): boolean {
        return ((this.int("Flags") ?? 0) & flag) !== 0;
    }

    override toJSON(): Record<string, unknown> {
        return { TransactionType: this.transactionType, ...this.fields };
    }
}

// =============================================================================
// Payments and trust lines
// =============================================================================

export class Payment extends Transaction {
    static readonly description = "Transfers value from one account to another.";
    static readonly schema = Type.Object(
        {
            ...TRANSACTION_COMMON_FIELDS,
            Amount,
            Destination: AccountAddress("The address of the account receiving the payment."),
            DestinationTag: Type.Optional(UInt32("Identifies the beneficiary at the destination account.")),
            InvoiceID: Type.Optional(Hash256("Arbitrary 256-bit hash identifying the reason for the payment.")),
            Paths: Type.Optional(Type.Array(Type.Array(PathStep.schema), { description: "Paths for a cross-currency payment." })),
            SendMax: Type.Optional(Amount),
            DeliverMin: Type.Optional(Amount),
        },
        { title: "Payment" },
    );

    constructor(fields: Readonly<Record<string, unknown>>) {
        super("Payment", Payment.schema, fields);
    }

    protected override getErrors(): ModelIssue[] {
        const issues: ModelIssue[] = [];
        if (
            typeof this.fields.Amount === "string" &&
            this.fields.Account === this.fields.Destination &&
            !this.has("SendMax")
        ) {
            issues.push({
                path: "/Destination",
                message: "An XRP payment transaction cannot have the same sender and destination",
            });
        }
        if (this.has("DeliverMin") && !this.hasFlag(PaymentFlag.tfPartialPayment)) {
            issues.push({
                path: "/DeliverMin",
                message: "A non-partial payment cannot have a DeliverMin field",
            });
        }
        return issues;
    }
}

export class TrustSet extends Transaction {
    static readonly description = "Creates or modifies a trust line linking two accounts.";
    static readonly schema = Type.Object(
        {
            ...TRANSACTION_COMMON_FIELDS,
            LimitAmount: IssuedCurrencyAmount.schema,
            QualityIn: Type.Optional(UInt32("Value incoming balances on this trust line at this ratio per 1,000,000,000 units.")),
            QualityOut: Type.Optional(UInt32("Value outgoing balances on this trust line at this ratio per 1,000,000,000 units.")),
        },
        { title: "TrustSet" },
    );

    constructor(fields: Readonly<Record<string, unknown>>) {
        super("TrustSet", TrustSet.schema, fields);
    }
}

// =============================================================================
// Offers
// =============================================================================

export class OfferCreate extends Transaction {
    static readonly description = "Places an offer in the decentralized exchange.";
    static readonly schema = Type.Object(
        {
            ...TRANSACTION_COMMON_FIELDS,
            TakerGets: Amount,
            TakerPays: Amount,
            Expiration: Type.Optional(UInt32("Time after which the offer is no longer active, in seconds since the Ripple Epoch.")),
            OfferSequence: Type.Optional(UInt32("An offer to delete first.")),
        },
        { title: "OfferCreate" },
    );

    constructor(fields: Readonly<Record<string, unknown>>) {
        super("OfferCreate", OfferCreate.schema, fields);
    }

    protected override getErrors(): ModelIssue[] {
        const gets = this.fields.TakerGets;
        const pays = this.fields.TakerPays;
        if (typeof gets === "string" && typeof pays === "string") {
            return [{ path: "/TakerPays", message: "An offer cannot trade XRP for XRP" }];
        }
        return [];
    }
}

export class OfferCancel extends Transaction {
    static readonly description = "Removes an offer from the decentralized exchange.";
    static readonly schema = Type.Object(
        {
            ...TRANSACTION_COMMON_FIELDS,
            OfferSequence: UInt32("The sequence number of the offer to cancel."),
        },
        { title: "OfferCancel" },
    );

    constructor(fields: Readonly<Record<string, unknown>>) {
        super("OfferCancel", OfferCancel.schema, fields);
    }
}

// =============================================================================
// Account settings
// =============================================================================

export class AccountSet extends Transaction {
    static readonly description = "Modifies the properties of an account in the ledger.";
    static readonly schema = Type.Object(
        {
            ...TRANSACTION_COMMON_FIELDS,
            ClearFlag: Type.Optional(NamedEnum(AccountSetAsfFlag, { description: "Account flag to disable." })),
            SetFlag: Type.Optional(NamedEnum(AccountSetAsfFlag, { description: "Account flag to enable." })),
            Domain: Type.Optional(Type.String({ pattern: "^([0-9A-Fa-f]{2})*$", description: "The domain that owns this account, as hex." })),
            EmailHash: Type.Optional(Type.String({ pattern: "^[0-9A-Fa-f]{32}$", description: "Hash of an email address for an avatar image." })),
            MessageKey: Type.Optional(Type.String({ description: "Public key for sending encrypted messages to this account." })),
            TransferRate: Type.Optional(UInt32("Fee charged when users transfer this account's tokens, in billionths.")),
            TickSize: Type.Optional(Type.Integer({ minimum: 0, maximum: 15, description: "Tick size for offers involving this account's tokens." })),
            NFTokenMinter: Type.Optional(AccountAddress("Another account that can mint tokens for this account.")),
        },
        { title: "AccountSet" },
    );

    constructor(fields: Readonly<Record<string, unknown>>) {
        super("AccountSet", AccountSet.schema, fields);
    }

    protected override getErrors(): ModelIssue[] {
        const issues: ModelIssue[] = [];
        const setFlag = this.int("SetFlag");
        if (setFlag !== undefined && setFlag === this.int("ClearFlag")) {
            issues.push({ path: "/ClearFlag", message: "SetFlag and ClearFlag must not be equal" });
        }
        const tickSize = this.int("TickSize");
        if (tickSize !== undefined && tickSize !== 0 && tickSize < 3) {
            issues.push({ path: "/TickSize", message: "TickSize must be 0 or between 3 and 15" });
        }
        const rate = this.int("TransferRate");
        if (rate !== undefined && rate !== 0 && (rate < 1_000_000_000 || rate > 2_000_000_000)) {
            issues.push({ path: "/TransferRate", message: "TransferRate must be 0 or between 1000000000 and 2000000000" });
        }
        return issues;
    }
}

export class SetRegularKey extends Transaction {
    static readonly description = "Assigns, changes or removes the regular key pair of an account.";
    static readonly schema = Type.Object(
        {
            ...TRANSACTION_COMMON_FIELDS,
            RegularKey: Type.Optional(AccountAddress("The new regular key; omit to remove it.")),
        },
        { title: "SetRegularKey" },
    );

    constructor(fields: Readonly<Record<string, unknown>>) {
        super("SetRegularKey", SetRegularKey.schema, fields);
    }
}

export class AccountDelete extends Transaction {
    static readonly description = "Deletes an account and sends its remaining XRP to another account.";
    static readonly schema = Type.Object(
        {
            ...TRANSACTION_COMMON_FIELDS,
            Destination: AccountAddress("The account that receives the remaining XRP."),
            DestinationTag: Type.Optional(UInt32("Identifies the beneficiary at the destination account.")),
        },
        { title: "AccountDelete" },
    );

    constructor(fields: Readonly<Record<string, unknown>>) {
        super("AccountDelete", AccountDelete.schema, fields);
    }

    protected override getErrors(): ModelIssue[] {
        if (this.fields.Account === this.fields.Destination) {
            return [{ path: "/Destination", message: "An account cannot be deleted into itself" }];
        }
        return [];
    }
}

export class DepositPreauth extends Transaction {
    static readonly description = "Preauthorizes an account to send payments to this account.";
    static readonly schema = Type.Object(
        {
            ...TRANSACTION_COMMON_FIELDS,
            Authorize: Type.Optional(AccountAddress("The account to preauthorize.")),
            Unauthorize: Type.Optional(AccountAddress("The account whose preauthorization is revoked.")),
        },
        { title: "DepositPreauth" },
    );

    constructor(fields: Readonly<Record<string, unknown>>) {
        super("DepositPreauth", DepositPreauth.schema, fields);
    }

    protected override getErrors(): ModelIssue[] {
        if (this.has("Authorize") === this.has("Unauthorize")) {
            return [{ path: "/Authorize", message: "Exactly one of Authorize or Unauthorize must be set" }];
        }
        return [];
    }
}

export class TicketCreate extends Transaction {
    static readonly description = "Sets aside one or more sequence numbers as tickets.";
    static readonly schema = Type.Object(
        {
            ...TRANSACTION_COMMON_FIELDS,
            TicketCount: Type.Integer({ description: "How many tickets to create (1 to 250)." }),
        },
        { title: "TicketCreate" },
    );

    constructor(fields: Readonly<Record<string, unknown>>) {
        super("TicketCreate", TicketCreate.schema, fields);
    }

    protected override getErrors(): ModelIssue[] {
        const count = this.int("TicketCount") ?? 0;
        if (count < 1 || count > 250) {
            return [{ path: "/TicketCount", message: "TicketCount must be between 1 and 250" }];
        }
        return [];
    }
}

// =============================================================================
// Escrows and checks
// =============================================================================

export class EscrowCreate extends Transaction {
    static readonly description = "Sequesters XRP until the escrow process either finishes or is canceled.";
    static readonly schema = Type.Object(
        {
            ...TRANSACTION_COMMON_FIELDS,
            Amount: XRPDrops,
            Destination: AccountAddress("The address that receives the escrowed XRP."),
            DestinationTag: Type.Optional(UInt32("Identifies the beneficiary at the destination account.")),
            CancelAfter: Type.Optional(UInt32("Time after which the escrow expires, in seconds since the Ripple Epoch.")),
            FinishAfter: Type.Optional(UInt32("Time after which the escrow can be released, in seconds since the Ripple Epoch.")),
            Condition: Type.Optional(Type.String({ pattern: "^[0-9A-Fa-f]+$", description: "Hex crypto-condition that must be fulfilled." })),
        },
        { title: "EscrowCreate" },
    );

    constructor(fields: Readonly<Record<string, unknown>>) {
        super("EscrowCreate", EscrowCreate.schema, fields);
    }

    protected override getErrors(): ModelIssue[] {
        const issues: ModelIssue[] = [];
        const cancelAfter = this.int("CancelAfter");
        const finishAfter = this.int("FinishAfter");
        if (cancelAfter !== undefined && finishAfter !== undefined && cancelAfter <= finishAfter) {
            issues.push({ path: "/CancelAfter", message: "CancelAfter must be after FinishAfter" });
        }
        if (finishAfter === undefined && !this.has("Condition")) {
            issues.push({ path: "/FinishAfter", message: "Either FinishAfter or Condition must be specified" });
        }
        return issues;
    }
}

export class EscrowFinish extends Transaction {
    static readonly description = "Delivers XRP from a held payment to the recipient.";
    static readonly schema = Type.Object(
        {
            ...TRANSACTION_COMMON_FIELDS,
            Owner: AccountAddress("The address of the account that funded the escrow."),
            OfferSequence: UInt32("Sequence number of the EscrowCreate transaction."),
            Condition: Type.Optional(Type.String({ pattern: "^[0-9A-Fa-f]+$", description: "Hex crypto-condition of the escrow." })),
            Fulfillment: Type.Optional(Type.String({ pattern: "^[0-9A-Fa-f]+$", description: "Hex fulfillment matching the condition." })),
        },
        { title: "EscrowFinish" },
    );

    constructor(fields: Readonly<Record<string, unknown>>) {
        super("EscrowFinish", EscrowFinish.schema, fields);
    }

    protected override getErrors(): ModelIssue[] {
        if (this.has("Condition") !== this.has("Fulfillment")) {
            return [{ path: "/Fulfillment", message: "Condition and Fulfillment must be provided together" }];
        }
        return [];
    }
}

export class EscrowCancel extends Transaction {
    static readonly description = "Returns escrowed XRP to the sender after the escrow expired.";
    static readonly schema = Type.Object(
        {
            ...TRANSACTION_COMMON_FIELDS,
            Owner: AccountAddress("The address of the account that funded the escrow."),
            OfferSequence: UInt32("Sequence number of the EscrowCreate transaction."),
        },
        { title: "EscrowCancel" },
    );

    constructor(fields: Readonly<Record<string, unknown>>) {
        super("EscrowCancel", EscrowCancel.schema, fields);
    }
}

export class CheckCreate extends Transaction {
    static readonly description = "Creates a check, a deferred payment the destination can cash.";
    static readonly schema = Type.Object(
        {
            ...TRANSACTION_COMMON_FIELDS,
            Destination: AccountAddress("The account that can cash the check."),
            SendMax: Amount,
            DestinationTag: Type.Optional(UInt32("Identifies the beneficiary at the destination account.")),
            Expiration: Type.Optional(UInt32("Time after which the check is no longer valid.")),
            InvoiceID: Type.Optional(Hash256("Arbitrary 256-bit hash identifying the reason for the check.")),
        },
        { title: "CheckCreate" },
    );

    constructor(fields: Readonly<Record<string, unknown>>) {
        super("CheckCreate", CheckCreate.schema, fields);
    }
}

export class CheckCash extends Transaction {
    static readonly description = "Redeems a check for up to the amount it authorizes.";
    static readonly schema = Type.Object(
        {
            ...TRANSACTION_COMMON_FIELDS,
            CheckID: Hash256("The ID of the check ledger object to cash."),
            Amount: Type.Optional(Amount),
            DeliverMin: Type.Optional(Amount),
        },
        { title: "CheckCash" },
    );

    constructor(fields: Readonly<Record<string, unknown>>) {
        super("CheckCash", CheckCash.schema, fields);
    }

    protected override getErrors(): ModelIssue[] {
        if (this.has("Amount") === this.has("DeliverMin")) {
            return [{ path: "/Amount", message: "Exactly one of Amount or DeliverMin must be set" }];
        }
        return [];
    }
}

export class CheckCancel extends Transaction {
    static readonly description = "Cancels an unredeemed check.";
    static readonly schema = Type.Object(
        {
            ...TRANSACTION_COMMON_FIELDS,
            CheckID: Hash256("The ID of the check ledger object to cancel."),
        },
        { title: "CheckCancel" },
    );

    constructor(fields: Readonly<Record<string, unknown>>) {
        super("CheckCancel", CheckCancel.schema, fields);
    }
}

// =============================================================================
// NFTs
// =============================================================================

export class NFTokenMint extends Transaction {
    static readonly description = "Creates a non-fungible token.";
    static readonly schema = Type.Object(
        {
            ...TRANSACTION_COMMON_FIELDS,
            NFTokenTaxon: UInt32("Arbitrary taxon grouping related tokens."),
            Issuer: Type.Optional(AccountAddress("The issuer when minting on behalf of another account.")),
            TransferFee: Type.Optional(Type.Integer({ minimum: 0, description: "Secondary-sale fee in units of 1/100,000." })),
            URI: Type.Optional(Type.String({ pattern: "^([0-9A-Fa-f]{2})*$", maxLength: 512, description: "Hex URI of the token's data." })),
        },
        { title: "NFTokenMint" },
    );

    constructor(fields: Readonly<Record<string, unknown>>) {
        super("NFTokenMint", NFTokenMint.schema, fields);
    }

    protected override getErrors(): ModelIssue[] {
        const issues: ModelIssue[] = [];
        const fee = this.int("TransferFee");
        if (fee !== undefined && fee > 50_000) {
            issues.push({ path: "/TransferFee", message: "TransferFee must not be greater than 50000" });
        }
        if (this.has("Issuer") && this.fields.Issuer === this.fields.Account) {
            issues.push({ path: "/Issuer", message: "Issuer must not be equal to Account" });
        }
        return issues;
    }
}

export class NFTokenBurn extends Transaction {
    static readonly description = "Permanently destroys a non-fungible token.";
    static readonly schema = Type.Object(
        {
            ...TRANSACTION_COMMON_FIELDS,
            NFTokenID: Hash256("The token to burn."),
            Owner: Type.Optional(AccountAddress("The current owner, when burning a token held by another account.")),
        },
        { title: "NFTokenBurn" },
    );

    constructor(fields: Readonly<Record<string, unknown>>) {
        super("NFTokenBurn", NFTokenBurn.schema, fields);
    }
}

export class NFTokenCreateOffer extends Transaction {
    static readonly description = "Creates an offer to buy or sell a non-fungible token.";
    static readonly schema = Type.Object(
        {
            ...TRANSACTION_COMMON_FIELDS,
            NFTokenID: Hash256("The token the offer references."),
            Amount,
            Owner: Type.Optional(AccountAddress("The token owner, for a buy offer.")),
            Expiration: Type.Optional(UInt32("Time after which the offer is no longer active.")),
            Destination: Type.Optional(AccountAddress("The only account allowed to accept the offer.")),
        },
        { title: "NFTokenCreateOffer" },
    );

    constructor(fields: Readonly<Record<string, unknown>>) {
        super("NFTokenCreateOffer", NFTokenCreateOffer.schema, fields);
    }

    protected override getErrors(): ModelIssue[] {
        if (this.has("Owner") && this.fields.Owner === this.fields.Account) {
            return [{ path: "/Owner", message: "Owner must not be equal to Account" }];
        }
        return [];
    }
}
