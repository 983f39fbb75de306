import { randomUUID } from "crypto";

export interface Logger {
  debug(message: string, context?: object): void;
  info(message: string, context?: object): void;
  warn(message: string, context?: object): void;
  error(message: string, context?: object): void;
}

/** Discards everything. Default for services constructed without a logger. */
export class NoopLogger implements Logger {
  debug(_message: string, _context?: object): void {}
  info(_message: string, _context?: object): void {}
  warn(_message: string, _context?: object): void {}
  error(_message: string, _context?: object): void {}
}

export const generateSpanId = (): string => randomUUID();

// ============================================================================
// Shared logging utilities (used by api-server)
// ============================================================================

/**
 * Generic text truncation for logging previews
 */
export function truncateText(
  text: string,
  limit: number = 500,
): { preview: string; length: number } {
  const length = text.length;
  if (length <= limit) {
    return { preview: text, length };
  }
  return { preview: text.slice(0, limit), length };
}

/**
 * Keeps allowlisted headers and replaces the value of sensitive ones with a
 * marker, so their presence still shows up in logs.
 */
export function pickHeaders(
  headers: Record<string, string | string[] | undefined>,
  allowlist: Set<string>,
  redactSet?: Set<string>,
): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    const lowerKey = key.toLowerCase();
    if (redactSet?.has(lowerKey)) {
      result[key] = "[REDACTED]";
    } else if (allowlist.has(lowerKey)) {
      result[key] = Array.isArray(value) ? value.join(", ") : (value ?? "");
    }
  }
  return result;
}

export function normalizeError(
  error: unknown,
): { message: string; stack?: string } | string {
  return error instanceof Error
    ? { message: error.message, stack: error.stack }
    : String(error);
}

/**
 * Shortens a credential to something safe to log: the first characters and
 * the total length.
 */
export function fingerprintCredential(credential: string, visible = 6): string {
  if (credential.length <= visible) {
    return `[${credential.length} chars]`;
  }
  return `${credential.slice(0, visible)}…[${credential.length} chars]`;
}
