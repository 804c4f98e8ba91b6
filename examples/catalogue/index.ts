/**
 * Catalogue Example: List the Tools
 *
 * Prints every synthesized tool grouped by category, then the full
 * description of one tool, the text an LLM would see.
 *
 * Run: npx tsx examples/catalogue/index.ts [tool]
 * e.g: npx tsx examples/catalogue/index.ts request_bookoffers
 */

import { createLedgerTools } from "../../src/index.js";

const toolName = process.argv[2] ?? "transaction_payment";

const lt = createLedgerTools();

for (const { label, count, tools } of lt.listCategories()) {
    console.log(`${label} (${count})`);
    for (const { name } of tools) {
        console.log(`  ${name}`);
    }
}

const tool = lt.tools.get(toolName);
if (!tool) {
    console.error(`Unknown tool: ${toolName}`);
    process.exit(1);
}

console.log(`\n${"─".repeat(60)}\n${tool.description}`);
