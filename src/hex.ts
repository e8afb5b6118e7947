/**
 * Parse a hex dump such as `05 01 09 02`, `0x05,0x01` or `05010902` into bytes.
 *
 * Whitespace, commas and `0x` prefixes separate tokens; each token must hold an even number
 * of hex digits.
 */
export function parseHexBytes(text: string): Uint8Array {
  const out: number[] = [];
  for (const rawToken of text.split(/[\s,]+/u)) {
    if (rawToken === "") continue;
    const token = rawToken.startsWith("0x") || rawToken.startsWith("0X") ? rawToken.slice(2) : rawToken;
    if (token.length === 0 || token.length % 2 !== 0 || !/^[0-9a-fA-F]+$/.test(token)) {
      throw new Error(`invalid hex byte ${JSON.stringify(rawToken)}`);
    }
    for (let i = 0; i < token.length; i += 2) {
      out.push(Number.parseInt(token.slice(i, i + 2), 16));
    }
  }
  return Uint8Array.from(out);
}

export function formatHexBytes(bytes: Uint8Array): string {
  return Array.from(bytes, (b) => b.toString(16).toUpperCase().padStart(2, "0")).join(" ");
}
