/**
 * Credential and PII redaction for log output.
 *
 * Source connectors carry Atlassian API tokens, Microsoft client secrets and
 * bearer tokens; none of them may reach a log line. Author emails in record
 * payloads are masked as well.
 */

const REDACTED = "[REDACTED]";

/**
 * Keys whose values are always replaced (matched case-insensitively).
 */
const SENSITIVE_KEYS: ReadonlySet<string> = new Set([
  "password",
  "secret",
  "token",
  "apikey",
  "api_key",
  "apitoken",
  "api_token",
  "clientsecret",
  "client_secret",
  "authorization",
  "cookie",
  "accesstoken",
  "access_token",
  "refreshtoken",
]);

const EMAIL_REGEX = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g;

function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEYS.has(key.toLowerCase());
}

/**
 * Redact a single key/value pair: sensitive keys lose their whole value,
 * other string values have email addresses masked.
 */
export function redactValue(key: string, value: unknown): unknown {
  if (isSensitiveKey(key)) {
    return REDACTED;
  }

  if (typeof value === "string") {
    return value.replace(EMAIL_REGEX, REDACTED);
  }

  return value;
}

/**
 * Apply {@link redactValue} to every top-level field of a log object.
 */
export function redactFields(fields: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(fields)) {
    result[key] = redactValue(key, value);
  }
  return result;
}

const SENSITIVE_PATHS = [
  "password",
  "secret",
  "token",
  "apiKey",
  "apiToken",
  "clientSecret",
  "authorization",
  "cookie",
  "accessToken",
  "refreshToken",
];

/**
 * Pino `redact` paths: every sensitive name at the top level and one level
 * down (e.g. `headers.authorization`, `jira.apiToken`).
 */
export const REDACT_PATHS: string[] = [
  ...SENSITIVE_PATHS,
  ...SENSITIVE_PATHS.map((path) => `*.${path}`),
];
