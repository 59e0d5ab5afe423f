const REDACTION_PATTERNS = [
  /(?:api[_-]?key|apikey|secret|token|password|credential)['":\s]*[=:]\s*['"]?([a-zA-Z0-9_-]{16,})['"]?/gi,
  /Bearer\s+[a-zA-Z0-9._-]+/gi,
  /(?:secret|password|key)['":\s]*[=:]\s*['"]?([A-Za-z0-9+/=]{32,})['"]?/gi,
  /(SECRET_KEY_BASE|DATABASE_URL)=\S+/g,
  /\/\/[^/\s:@]+:[^/\s@]+@/g,
];

/**
 * Mask credentials before a line reaches a log file. Sidecar output is
 * forwarded verbatim, and backends happily print connection strings.
 */
export function redact(text: string): string {
  let result = text;

  for (const pattern of REDACTION_PATTERNS) {
    result = result.replace(pattern, (match) => {
      const prefix = match.slice(0, 4);
      return `${prefix}[REDACTED]`;
    });
  }

  return result;
}
