/**
 * Secret and PII Redaction
 *
 * Confluence credentials travel through configuration objects and request
 * headers, and Confluence Cloud usernames are email addresses. Both must be
 * kept out of log files.
 */

const REDACTED = "[REDACTED]";

/**
 * Keys whose values should always be redacted (matched case-insensitively).
 */
const SENSITIVE_KEYS: ReadonlySet<string> = new Set([
  "password",
  "secret",
  "token",
  "apikey",
  "api_key",
  "apitoken",
  "api_token",
  "authorization",
  "cookie",
  "accesstoken",
]);

const EMAIL_REGEX = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g;

function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEYS.has(key.toLowerCase());
}

/**
 * Redact a single key/value pair.
 *
 * - If the key matches a known sensitive field name the entire value is replaced
 *   with "[REDACTED]".
 * - If the value is a string that contains email-like patterns, those patterns
 *   are replaced with "[REDACTED]".
 */
export function redactValue(key: string, value: unknown): unknown {
  if (isSensitiveKey(key)) {
    return REDACTED;
  }

  if (typeof value === "string") {
    // replace() resets lastIndex on the global regex, test() would not
    return value.replace(EMAIL_REGEX, REDACTED);
  }

  return value;
}

const REDACTED_KEYS = [
  "password",
  "secret",
  "token",
  "apiKey",
  "api_key",
  "apiToken",
  "api_token",
  "authorization",
  "Authorization",
  "cookie",
  "accessToken",
];

/**
 * JSON paths for Pino's `redact` option: each key at the top level and one
 * level down (e.g. `confluence.apiKey`, `headers.authorization`).
 */
export const REDACT_PATHS: string[] = [
  ...REDACTED_KEYS,
  ...REDACTED_KEYS.map((key) => `*.${key}`),
];
