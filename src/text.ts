const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder("utf-8");

function coerceString(input: unknown): string {
  try {
    return String(input ?? "");
  } catch {
    return "";
  }
}

function isForbiddenCodePoint(code: number): boolean {
  return code <= 0x1f || code === 0x7f || code === 0x85 || code === 0x2028 || code === 0x2029;
}

/**
 * Collapse control characters and whitespace runs into single spaces so a value can be
 * embedded in one JSONL log record or one trace line.
 */
export function sanitizeOneLine(input: unknown): string {
  const parts: string[] = [];
  let hasOutput = false;
  let pendingSpace = false;
  for (const ch of coerceString(input)) {
    if (isForbiddenCodePoint(ch.codePointAt(0) ?? 0) || /\s/u.test(ch)) {
      pendingSpace = hasOutput;
      continue;
    }
    if (pendingSpace) {
      parts.push(" ");
      pendingSpace = false;
    }
    parts.push(ch);
    hasOutput = true;
  }
  return parts.join("");
}

export function truncateUtf8(input: unknown, maxBytes: number): string {
  if (!Number.isInteger(maxBytes) || maxBytes <= 0) return "";
  const s = coerceString(input);
  const buf = new Uint8Array(maxBytes);
  const { read, written } = textEncoder.encodeInto(s, buf);
  if (read === s.length) return s;
  return written === 0 ? "" : textDecoder.decode(buf.subarray(0, written));
}

export function formatOneLineUtf8(input: unknown, maxBytes: number): string {
  return truncateUtf8(sanitizeOneLine(input), maxBytes);
}

function errorMessageOf(err: unknown): string {
  if (err === null) return "null";
  if (typeof err === "object") {
    try {
      if ("message" in err && typeof err.message === "string") return err.message;
    } catch {
      // getters may throw
    }
    return "Error";
  }
  if (typeof err === "function") return "Error";
  return String(err);
}

export function formatOneLineError(err: unknown, maxBytes: number, fallback = "Error"): string {
  return formatOneLineUtf8(errorMessageOf(err), maxBytes) || fallback || "Error";
}
