import { randomBytes } from "node:crypto";

/**
 * Compact, time-sortable id: base36(timestamp) + "-" + 8 hex chars.
 * Used for event ids and correlation ids; entity ids are UUIDs.
 */
export function generateEventId(now: number = Date.now()): string {
  return `${now.toString(36)}-${randomBytes(4).toString("hex")}`;
}
