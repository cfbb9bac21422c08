import type { JsonObject, JsonValue } from '@dss-mcp/dss-client';

/**
 * Keep only the listed fields of a platform item, filling in the given
 * default where the platform omits one. Listing calls return far more
 * than an agent needs; this keeps their results small.
 */
export function summarize(item: JsonObject, fields: Record<string, JsonValue>): JsonObject {
  const summary: JsonObject = {};
  for (const [key, fallback] of Object.entries(fields)) {
    summary[key] = item[key] ?? fallback;
  }
  return summary;
}
