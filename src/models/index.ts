/**
 * Domain-model catalogue: the fixed list of model-bearing modules the tool
 * registry is built from.
 *
 * @example
 * ```ts
 * import { Payment } from "ledgertools/models";
 *
 * const payment = new Payment({ Account: "rSender", Destination: "rReceiver", Amount: "1000000" });
 * console.log(payment.toJSON());
 * ```
 *
 * @module
 */

import type { ModelModule } from "../types.js";
import * as amounts from "./amounts.js";
import * as common from "./common.js";
import * as currencies from "./currencies.js";
import * as requests from "./requests.js";
import * as transactions from "./transactions.js";

export { BaseModel, ENUM_NAMES_KEYWORD, ModelError, NamedEnum, NON_MODEL, type ModelIssue } from "./base.js";
export * from "./amounts.js";
export * from "./common.js";
export * from "./currencies.js";
export * from "./requests.js";
export * from "./transactions.js";

/** Source modules scanned at startup, in registration order. */
export const MODEL_MODULES: readonly ModelModule[] = [
    { category: "transaction", label: "Transactions", exports: transactions },
    { category: "request", label: "Requests", exports: requests },
    { category: "amount", label: "Amounts", exports: amounts },
    { category: "currency", label: "Currencies", exports: currencies },
    { category: "other", label: "Other", exports: common },
];
