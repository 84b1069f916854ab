/**
 * pg-maint - Maintenance statement construction
 */

import type { OperationKind } from "../types/index.js";
import { quoteQualifiedName } from "../utils/identifiers.js";

/**
 * Build the statement for one operation. The target is the only variable
 * part and always goes through the identifier quoting helper.
 *
 * @example
 * buildMaintenanceStatement('vacuum_full', 'public', 'orders')
 * // VACUUM (FULL) "public"."orders"
 */
export function buildMaintenanceStatement(
  kind: OperationKind,
  schema: string,
  table: string,
): string {
  const target = quoteQualifiedName(schema, table);
  switch (kind) {
    case "analyze":
      return `ANALYZE ${target}`;
    case "vacuum":
      return `VACUUM ${target}`;
    case "vacuum_full":
      return `VACUUM (FULL) ${target}`;
    case "reindex":
      return `REINDEX TABLE ${target}`;
  }
}
