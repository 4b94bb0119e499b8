/**
 * Environment variable entries for the `additional_env_vars` field
 */

/**
 * Split a single input line into `KEY=VALUE` tokens.
 * Spaces inside double quotes do not split; the quote characters
 * themselves are dropped, so `"A=b c"` and `A="b c"` both yield `A=b c`.
 */
export function parseEnvVars(input: string | undefined): string[] {
  if (!input) {
    return [];
  }

  const tokens: string[] = [];
  let current = "";
  let inQuotes = false;
  let quoted = false;

  for (const char of input) {
    if (char === '"') {
      inQuotes = !inQuotes;
      quoted = true;
    } else if (/\s/.test(char) && !inQuotes) {
      if (current || quoted) {
        tokens.push(current);
      }
      current = "";
      quoted = false;
    } else {
      current += char;
    }
  }

  if (current || quoted) {
    tokens.push(current);
  }

  return tokens;
}

/**
 * True when a double quote is opened and never closed
 */
export function hasUnterminatedQuote(input: string | undefined): boolean {
  return ((input ?? "").split('"').length - 1) % 2 === 1;
}

/**
 * Check a whole input line before it is split; returns an error message
 * or undefined when every token is valid
 */
export function validateEnvLine(input: string | undefined): string | undefined {
  if (hasUnterminatedQuote(input)) {
    return "Unterminated quote in environment variables";
  }
  return validateEnvVars(parseEnvVars(input));
}

/**
 * Check one entry; returns an error message or undefined when valid
 */
export function validateEnvVar(entry: string): string | undefined {
  const separators = entry.split("=").length - 1;
  if (separators !== 1) {
    return `Environment variable '${entry}' must contain exactly one '=' (KEY=VALUE)`;
  }
  const [key] = entry.split("=");
  if (!key) {
    return `Environment variable '${entry}' has an empty key`;
  }
  if (/\s/.test(key)) {
    return `Environment variable key '${key}' must not contain whitespace`;
  }
  if (entry.includes('"')) {
    return `Environment variable '${entry}' must not contain double quotes`;
  }
  return undefined;
}

/**
 * Validate every entry, returning the first problem found
 */
export function validateEnvVars(entries: readonly string[]): string | undefined {
  for (const entry of entries) {
    const error = validateEnvVar(entry);
    if (error) {
      return error;
    }
  }
  return undefined;
}

/**
 * Inverse of parseEnvVars: entries with whitespace are quoted so the
 * line can be edited and parsed back to the same list
 */
export function formatEnvVars(entries: readonly string[]): string {
  return entries.map((entry) => (/\s/.test(entry) ? `"${entry}"` : entry)).join(" ");
}
