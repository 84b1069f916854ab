/**
 * pg-maint - Identifier Quoting Utilities
 *
 * Maintenance statements (VACUUM, ANALYZE, REINDEX) cannot take their target
 * as a bind parameter, so every schema and table name that reaches SQL text
 * goes through quoteIdentifier() here. Values (filters, thresholds) are
 * always passed as parameters instead.
 *
 * PostgreSQL identifier rules for quoted names:
 * - Any character except NUL
 * - Embedded double quotes are doubled
 * - Maximum length: 63 bytes (NAMEDATALEN - 1)
 */

/**
 * Maximum identifier length in PostgreSQL (NAMEDATALEN - 1)
 */
const MAX_IDENTIFIER_BYTES = 63;

/**
 * Error thrown when an identifier cannot be quoted safely
 */
export class InvalidIdentifierError extends Error {
  constructor(
    public readonly identifier: string,
    public readonly reason: string,
  ) {
    super(`Invalid identifier "${identifier}": ${reason}`);
    this.name = "InvalidIdentifierError";
  }
}

/**
 * Validate an identifier read from the catalog or supplied by the operator
 *
 * @throws InvalidIdentifierError if the identifier is empty, too long or contains NUL
 */
export function validateIdentifier(name: string): void {
  if (name.length === 0) {
    throw new InvalidIdentifierError(
      name,
      "Identifier must be a non-empty string",
    );
  }

  if (Buffer.byteLength(name, "utf8") > MAX_IDENTIFIER_BYTES) {
    throw new InvalidIdentifierError(
      name,
      `Identifier exceeds maximum length of ${String(MAX_IDENTIFIER_BYTES)} bytes`,
    );
  }

  if (name.includes("\0")) {
    throw new InvalidIdentifierError(
      name,
      "Identifier contains a NUL character",
    );
  }
}

/**
 * Quote a PostgreSQL identifier for safe use in SQL text
 *
 * @example
 * quoteIdentifier('users') // Returns: "users"
 * quoteIdentifier('Order Items') // Returns: "Order Items"
 * quoteIdentifier('a"b') // Returns: "a""b"
 */
export function quoteIdentifier(name: string): string {
  validateIdentifier(name);
  return `"${name.replace(/"/g, '""')}"`;
}

/**
 * Quote a schema-qualified table reference
 *
 * @example
 * quoteQualifiedName('public', 'users') // Returns: "public"."users"
 */
export function quoteQualifiedName(schema: string, table: string): string {
  return `${quoteIdentifier(schema)}.${quoteIdentifier(table)}`;
}

/**
 * Translate a shell-style glob into a LIKE pattern (backslash escape)
 *
 * `*` matches any run of characters and `?` exactly one; literal `%`, `_`
 * and `\` are escaped so they only match themselves.
 *
 * @example
 * globToLikePattern('order_*') // Returns: order\_%
 */
export function globToLikePattern(glob: string): string {
  let pattern = "";
  for (const char of glob) {
    switch (char) {
      case "*":
        pattern += "%";
        break;
      case "?":
        pattern += "_";
        break;
      case "%":
      case "_":
      case "\\":
        pattern += `\\${char}`;
        break;
      default:
        pattern += char;
    }
  }
  return pattern;
}
