/**
 * Request (query) models. Field names follow the ledger's snake_case
 * JSON-RPC parameters; the canonical form adds `method`.
 *
 * @module
 */

import { Type, type TObject } from "@sinclair/typebox";
import { AccountAddress, BaseModel, Hash256, NON_MODEL, NamedEnum, type ModelIssue } from "./base.js";
import { Amount } from "./amounts.js";
import { IssuedCurrency, XRP } from "./currencies.js";

/** Ledger object types accepted by account_objects. */
export enum AccountObjectType {
    Check = "check",
    DepositPreauth = "deposit_preauth",
    Escrow = "escrow",
    NFTOffer = "nft_offer",
    Offer = "offer",
    PaymentChannel = "payment_channel",
    SignerList = "signer_list",
    State = "state",
    Ticket = "ticket",
}

export enum NoRippleCheckRole {
    Gateway = "gateway",
    User = "user",
}

const LedgerIndex = Type.Union(
    [
        Type.Integer({ minimum: 0 }),
        Type.Literal("validated"),
        Type.Literal("closed"),
        Type.Literal("current"),
    ],
    { description: "Ledger index, or one of validated, closed, current." },
);

/** Pagination marker echoed back from a previous response. */
const Marker = Type.Union(
    [
        Type.String(),
        Type.Object({ ledger: Type.Integer(), seq: Type.Integer() }, { title: "Marker" }),
    ],
    { description: "Pagination marker from a previous response." },
);

const PageLimit = (description: string) => Type.Integer({ minimum: 1, maximum: 400, description });

/** Fields every request accepts. */
export const REQUEST_COMMON_FIELDS = {
    id: Type.Optional(Type.Union([Type.String(), Type.Integer()], { description: "Arbitrary request identifier echoed in the response." })),
    api_version: Type.Optional(Type.Integer({ minimum: 1, description: "API version to use." })),
};

/** Fields that select a ledger version. */
const LEDGER_SELECTOR_FIELDS = {
    ledger_hash: Type.Optional(Hash256("A 20-byte hex string for the ledger version to use.")),
    ledger_index: Type.Optional(LedgerIndex),
};

/**
 * Base of all requests. Not a tool: carries {@link NON_MODEL}.
 */
export abstract class Request extends BaseModel {
    static readonly [NON_MODEL] = true;

    readonly method: string;

    protected constructor(method: string, schema: TObject, fields: Readonly<Record<string, unknown>>) {
        super(schema, fields);
        this.method = method;
    }

    override toJSON(): Record<string, unknown> {
        return { method: this.method, ...this.fields };
    }
}

// =============================================================================
// Account queries
// =============================================================================

export class AccountInfo extends Request {
    static readonly description = "Retrieves information about an account, its activity and its XRP balance.";
    static readonly schema = Type.Object(
        {
            ...REQUEST_COMMON_FIELDS,
            account: AccountAddress("The account to look up."),
            ...LEDGER_SELECTOR_FIELDS,
            queue: Type.Optional(Type.Boolean({ description: "Include queued transactions." })),
            signer_lists: Type.Optional(Type.Boolean({ description: "Include the account's signer lists." })),
            strict: Type.Optional(Type.Boolean({ description: "Only accept a public key or address." })),
        },
        { title: "AccountInfo" },
    );

    constructor(fields: Readonly<Record<string, unknown>>) {
        super("account_info", AccountInfo.schema, fields);
    }

    protected override getErrors(): ModelIssue[] {
        const ledger = this.fields.ledger_index;
        if (this.fields.queue === true && ledger !== undefined && ledger !== "current") {
            return [{ path: "/queue", message: "queue can only be requested for the current ledger" }];
        }
        return [];
    }
}

export class AccountLines extends Request {
    static readonly description = "Retrieves the trust lines of an account.";
    static readonly schema = Type.Object(
        {
            ...REQUEST_COMMON_FIELDS,
            account: AccountAddress("The account whose trust lines to list."),
            ...LEDGER_SELECTOR_FIELDS,
            peer: Type.Optional(AccountAddress("Only list trust lines with this account.")),
            limit: Type.Optional(PageLimit("Maximum number of trust lines to return.")),
            marker: Type.Optional(Marker),
        },
        { title: "AccountLines" },
    );

    constructor(fields: Readonly<Record<string, unknown>>) {
        super("account_lines", AccountLines.schema, fields);
    }
}

export class AccountObjects extends Request {
    static readonly description = "Retrieves the ledger objects owned by an account.";
    static readonly schema = Type.Object(
        {
            ...REQUEST_COMMON_FIELDS,
            account: AccountAddress("The account whose objects to list."),
            ...LEDGER_SELECTOR_FIELDS,
            type: Type.Optional(NamedEnum(AccountObjectType, { description: "Only return objects of this type." })),
            deletion_blockers_only: Type.Optional(Type.Boolean({ description: "Only return objects that block deleting the account." })),
            limit: Type.Optional(PageLimit("Maximum number of objects to return.")),
            marker: Type.Optional(Marker),
        },
        { title: "AccountObjects" },
    );

    constructor(fields: Readonly<Record<string, unknown>>) {
        super("account_objects", AccountObjects.schema, fields);
    }
}

export class AccountOffers extends Request {
    static readonly description = "Retrieves the open offers placed by an account.";
    static readonly schema = Type.Object(
        {
            ...REQUEST_COMMON_FIELDS,
            account: AccountAddress("The account whose offers to list."),
            ...LEDGER_SELECTOR_FIELDS,
            limit: Type.Optional(PageLimit("Maximum number of offers to return.")),
            marker: Type.Optional(Marker),
        },
        { title: "AccountOffers" },
    );

    constructor(fields: Readonly<Record<string, unknown>>) {
        super("account_offers", AccountOffers.schema, fields);
    }
}

export class AccountNFTs extends Request {
    static readonly description = "Retrieves the non-fungible tokens owned by an account.";
    static readonly schema = Type.Object(
        {
            ...REQUEST_COMMON_FIELDS,
            account: AccountAddress("The account whose tokens to list."),
            ...LEDGER_SELECTOR_FIELDS,
            limit: Type.Optional(PageLimit("Maximum number of tokens to return.")),
            marker: Type.Optional(Marker),
        },
        { title: "AccountNFTs" },
    );

    constructor(fields: Readonly<Record<string, unknown>>) {
        super("account_nfts", AccountNFTs.schema, fields);
    }
}

export class AccountTx extends Request {
    static readonly description = "Retrieves the transactions that affected an account.";
    static readonly schema = Type.Object(
        {
            ...REQUEST_COMMON_FIELDS,
            account: AccountAddress("The account whose history to list."),
            ledger_index_min: Type.Optional(Type.Integer({ description: "Earliest ledger to include; -1 for the earliest available." })),
            ledger_index_max: Type.Optional(Type.Integer({ description: "Latest ledger to include; -1 for the most recent validated." })),
            ...LEDGER_SELECTOR_FIELDS,
            binary: Type.Optional(Type.Boolean({ description: "Return transactions as hex blobs." })),
            forward: Type.Optional(Type.Boolean({ description: "Return oldest transactions first." })),
            limit: Type.Optional(PageLimit("Maximum number of transactions to return.")),
            marker: Type.Optional(Marker),
        },
        { title: "AccountTx" },
    );

    constructor(fields: Readonly<Record<string, unknown>>) {
        super("account_tx", AccountTx.schema, fields);
    }

    protected override getErrors(): ModelIssue[] {
        const min = this.int("ledger_index_min");
        const max = this.int("ledger_index_max");
        if (min !== undefined && max !== undefined && min !== -1 && max !== -1 && min > max) {
            return [{ path: "/ledger_index_min", message: "ledger_index_min must not be greater than ledger_index_max" }];
        }
        return [];
    }
}

export class GatewayBalances extends Request {
    static readonly description = "Calculates the total balances issued by an account.";
    static readonly schema = Type.Object(
        {
            ...REQUEST_COMMON_FIELDS,
            account: AccountAddress("The issuing account."),
            ...LEDGER_SELECTOR_FIELDS,
            hotwallet: Type.Optional(
                Type.Union([AccountAddress("An operational address to exclude."), Type.Array(Type.String())], {
                    description: "Operational addresses to exclude from the balances issued.",
                }),
            ),
            strict: Type.Optional(Type.Boolean({ description: "Only accept an address or public key." })),
        },
        { title: "GatewayBalances" },
    );

    constructor(fields: Readonly<Record<string, unknown>>) {
        super("gateway_balances", GatewayBalances.schema, fields);
    }
}

export class NoRippleCheck extends Request {
    static readonly description = "Compares an account's rippling settings with the recommended defaults.";
    static readonly schema = Type.Object(
        {
            ...REQUEST_COMMON_FIELDS,
            account: AccountAddress("The account to check."),
            role: NamedEnum(NoRippleCheckRole, { description: "Whether the address is a gateway or a user." }),
            ...LEDGER_SELECTOR_FIELDS,
            transactions: Type.Optional(Type.Boolean({ description: "Include suggested fixing transactions." })),
            limit: Type.Optional(PageLimit("Maximum number of problems to report.")),
        },
        { title: "NoRippleCheck" },
    );

    constructor(fields: Readonly<Record<string, unknown>>) {
        super("noripple_check", NoRippleCheck.schema, fields);
    }
}

// =============================================================================
// Order books and paths
// =============================================================================

const CurrencySpec = Type.Union([IssuedCurrency.schema, XRP.schema]);

export class BookOffers extends Request {
    static readonly description = "Retrieves the offers between two currencies in the decentralized exchange.";
    static readonly schema = Type.Object(
        {
            ...REQUEST_COMMON_FIELDS,
            taker_gets: CurrencySpec,
            taker_pays: CurrencySpec,
            ...LEDGER_SELECTOR_FIELDS,
            taker: Type.Optional(AccountAddress("Perspective account for funding and quality.")),
            limit: Type.Optional(PageLimit("Maximum number of offers to return.")),
        },
        { title: "BookOffers" },
    );

    constructor(fields: Readonly<Record<string, unknown>>) {
        super("book_offers", BookOffers.schema, fields);
    }
}

export class RipplePathFind extends Request {
    static readonly description = "Finds the payment paths that could deliver an amount.";
    static readonly schema = Type.Object(
        {
            ...REQUEST_COMMON_FIELDS,
            source_account: AccountAddress("The account that would send funds."),
            destination_account: AccountAddress("The account that would receive funds."),
            destination_amount: Amount,
            send_max: Type.Optional(Amount),
            source_currencies: Type.Optional(Type.Array(CurrencySpec, { maxItems: 18, description: "Currencies the source may spend." })),
            ...LEDGER_SELECTOR_FIELDS,
        },
        { title: "RipplePathFind" },
    );

    constructor(fields: Readonly<Record<string, unknown>>) {
        super("ripple_path_find", RipplePathFind.schema, fields);
    }

    protected override getErrors(): ModelIssue[] {
        if (this.has("send_max") && this.has("source_currencies")) {
            return [{ path: "/send_max", message: "send_max and source_currencies cannot both be set" }];
        }
        return [];
    }
}

// =============================================================================
// Ledger and server
// =============================================================================

export class Ledger extends Request {
    static readonly description = "Retrieves information about a ledger version.";
    static readonly schema = Type.Object(
        {
            ...REQUEST_COMMON_FIELDS,
            ...LEDGER_SELECTOR_FIELDS,
            transactions: Type.Optional(Type.Boolean({ description: "Include the ledger's transactions." })),
            expand: Type.Optional(Type.Boolean({ description: "Return full transactions instead of hashes." })),
            owner_funds: Type.Optional(Type.Boolean({ description: "Include owner funds for offer transactions." })),
            binary: Type.Optional(Type.Boolean({ description: "Return data as hex blobs." })),
        },
        { title: "Ledger" },
    );

    constructor(fields: Readonly<Record<string, unknown>>) {
        super("ledger", Ledger.schema, fields);
    }
}

export class Tx extends Request {
    static readonly description = "Retrieves one transaction by its hash.";
    static readonly schema = Type.Object(
        {
            ...REQUEST_COMMON_FIELDS,
            transaction: Hash256("The hash of the transaction."),
            binary: Type.Optional(Type.Boolean({ description: "Return the transaction as a hex blob." })),
            min_ledger: Type.Optional(Type.Integer({ minimum: 0, description: "First ledger to search." })),
            max_ledger: Type.Optional(Type.Integer({ minimum: 0, description: "Last ledger to search." })),
        },
        { title: "Tx" },
    );

    constructor(fields: Readonly<Record<string, unknown>>) {
        super("tx", Tx.schema, fields);
    }
}

export class Fee extends Request {
    static readonly description = "Reports the current state of the open-ledger transaction cost.";
    static readonly schema = Type.Object({ ...REQUEST_COMMON_FIELDS }, { title: "Fee" });

    constructor(fields: Readonly<Record<string, unknown>> = {}) {
        super("fee", Fee.schema, fields);
    }
}

export class ServerInfo extends Request {
    static readonly description = "Reports the status of the server.";
    static readonly schema = Type.Object({ ...REQUEST_COMMON_FIELDS }, { title: "ServerInfo" });

    constructor(fields: Readonly<Record<string, unknown>> = {}) {
        super("server_info", ServerInfo.schema, fields);
    }
}

export class Ping extends Request {
    static readonly description = "Checks that the server is responsive.";
    static readonly schema = Type.Object({ ...REQUEST_COMMON_FIELDS }, { title: "Ping" });

    constructor(fields: Readonly<Record<string, unknown>> = {}) {
        super("ping", Ping.schema, fields);
    }
}
