/**
 * Invoke Example: Build a Payment
 *
 * Calls a tool the way an agent runtime would: loosely-typed input in,
 * canonical JSON or a diagnostic out. No LLM involved.
 *
 * Run: npx tsx examples/invoke/index.ts
 */

import { createLedgerTools, type InvokeResult } from "../../src/index.js";

const lt = createLedgerTools({ include: ["category:transaction"] });

function show(label: string, result: InvokeResult): void {
    console.log(`\n${label}`);
    if (result.ok) {
        console.log(JSON.stringify(result.value, null, 2));
    } else {
        console.log(`${result.error.kind}: ${result.error.message}`);
    }
}

// Amount given as a number, currency longer than three characters
show(
    "Issued-currency payment",
    lt.invoke("transaction_payment", {
        account: "rSender",
        destination: "rReceiver",
        amount: { currency: "USDC", issuer: "rIssuer", value: 25 },
        destination_tag: "42",
    }),
);

// Missing fields come back with the whole schema
show("Incomplete payment", lt.invoke("transaction_payment", { account: "rSender" }));

// The same call through the agent-tool adapter
const payment = lt.agentTools().find((t) => t.name === "transaction_payment");
if (!payment) {
    console.error("transaction_payment not found");
    process.exit(1);
}
const result = await payment.execute("example-call-1", {
    account: "rSender",
    destination: "rReceiver",
    amount: "1000000",
});
for (const block of result.content) {
    console.log(block.text);
}
