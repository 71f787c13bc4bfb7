/**
 * In-memory session history. Records are frozen on append and snapshots are
 * copies, so callers can never edit the log.
 */

import type { QueryRecord, SessionState } from "./types.js";

export function createSessionState(): SessionState {
  let records: QueryRecord[] = [];

  return {
    append(record: QueryRecord): void {
      records.push(Object.freeze({ ...record }));
    },

    snapshot(): readonly QueryRecord[] {
      return Object.freeze(records.slice());
    },

    clear(): void {
      records = [];
    },

    get size(): number {
      return records.length;
    },
  };
}
