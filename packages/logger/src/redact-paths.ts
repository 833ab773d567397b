/**
 * Property names whose values never reach log output. Provider credentials
 * travel inside config objects, so one level of nesting is covered as well.
 */
const SENSITIVE_KEYS = [
  "apiKey",
  "api_key",
  "password",
  "authorization",
  "token",
  "secret",
  "databaseUrl",
] as const;

export const REDACT_PATHS: string[] = [
  ...SENSITIVE_KEYS,
  ...SENSITIVE_KEYS.map((key) => `*.${key}`),
  "*.headers.authorization",
];

const CREDENTIALS_IN_URL = /(\w+:\/\/)([^:/@\s]+):([^@\s]+)@/g;

/**
 * Strip user:password from connection URIs before they are logged as part
 * of a message string (pino's `redact` only covers structured fields).
 */
export function maskConnectionString(value: string): string {
  return value.replace(CREDENTIALS_IN_URL, "$1$2:[REDACTED]@");
}
