import type { JsonObject } from "@shared/telemetry";

export type Snapshot = Readonly<{
  data: JsonObject;
  lastUpdated: string | null;
}>;

/**
 * Holds the single current snapshot. `replace` swaps the whole record in one
 * assignment, so a reader holding the result of `read()` keeps a consistent
 * tree even if a newer snapshot lands meanwhile.
 */
export class StateStore {
  private current: Snapshot | null = null;

  read(): Snapshot | null {
    return this.current;
  }

  replace(data: JsonObject, timestamp: string | null): Snapshot {
    const next: Snapshot = Object.freeze({ data, lastUpdated: timestamp });
    this.current = next;
    return next;
  }

  clear(): void {
    this.current = null;
  }
}
