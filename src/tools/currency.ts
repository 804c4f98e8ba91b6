/**
 * Currency-code normalization.
 *
 * The ledger accepts either a 3-character code or a 40-character hex code.
 * Longer human-readable codes are encoded as upper-case hex of their UTF-8
 * bytes, right-padded with zeros.
 *
 * @module
 */

/** Width of a hex-encoded currency code (20 bytes). */
export const HEX_CURRENCY_WIDTH = 40;

const MAX_CODE_BYTES = HEX_CURRENCY_WIDTH / 2;
const HEX_CURRENCY = /^[0-9A-Fa-f]{40}$/;

export function isHexCurrencyCode(code: string): boolean {
    return HEX_CURRENCY.test(code);
}

/**
 * Encode a code of 1–20 UTF-8 bytes, e.g. `"USDC"` →
 * `"5553444300000000000000000000000000000000"`.
 *
 * @throws RangeError if the code is empty or longer than 20 bytes.
 */
export function encodeCurrencyCode(code: string): string {
    const bytes = Buffer.from(code, "utf8");
    if (bytes.length === 0 || bytes.length > MAX_CODE_BYTES) {
        throw new RangeError(`Currency code must be 1-${MAX_CODE_BYTES} bytes, got ${bytes.length}`);
    }
    return bytes.toString("hex").toUpperCase().padEnd(HEX_CURRENCY_WIDTH, "0");
}

/**
 * Decode a hex currency code back to text, dropping the zero padding.
 * Returns `undefined` when the input is not a hex code.
 */
export function decodeCurrencyCode(code: string): string | undefined {
    if (!isHexCurrencyCode(code)) return undefined;
    const trimmed = code.replace(/(00)+$/, "");
    return Buffer.from(trimmed, "hex").toString("utf8");
}

/**
 * Normalize a currency code for the ledger.
 *
 * Codes of 3 code points, the native-currency sentinel and hex codes pass
 * through unchanged; other codes of 1–20 bytes are hex-encoded. Anything
 * else is returned as-is so that model validation can reject it.
 */
export function normalizeCurrencyCode(code: string, nativeCurrency = "XRP"): string {
    if ([...code].length === 3 || code === nativeCurrency || isHexCurrencyCode(code)) {
        return code;
    }
    const length = Buffer.byteLength(code, "utf8");
    if (length === 0 || length > MAX_CODE_BYTES) return code;
    return encodeCurrencyCode(code);
}
