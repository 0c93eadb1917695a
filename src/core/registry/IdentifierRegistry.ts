/**
 * Keyed store of live workflow entities.
 *
 * One registry exists per entity kind (GeoLayers, tables, data stores).
 * IDs are unique: `register()` is the only way to add an entry and it
 * settles every collision according to the caller's policy before it
 * returns. The registry never logs; commands turn the returned outcome
 * into log records.
 *
 * @module
 */

import { CollisionPolicy } from "./CollisionPolicy.js";

/**
 * What `register()` did.
 *
 * | existing? | policy         | inserted | warned | failed |
 * |-----------|----------------|----------|--------|--------|
 * | no        | any            | true     | false  | false  |
 * | yes       | Replace        | true     | false  | false  |
 * | yes       | ReplaceAndWarn | true     | true   | false  |
 * | yes       | Warn           | false    | true   | false  |
 * | yes       | Fail           | false    | false  | true   |
 */
export interface RegisterOutcome {
  readonly inserted: boolean;
  readonly warned: boolean;
  readonly failed: boolean;
}

const OUTCOMES: Record<CollisionPolicy, RegisterOutcome> = {
  [CollisionPolicy.REPLACE]: { inserted: true, warned: false, failed: false },
  [CollisionPolicy.REPLACE_AND_WARN]: { inserted: true, warned: true, failed: false },
  [CollisionPolicy.WARN]: { inserted: false, warned: true, failed: false },
  [CollisionPolicy.FAIL]: { inserted: false, warned: false, failed: true },
};

const INSERTED: RegisterOutcome = { inserted: true, warned: false, failed: false };

export class IdentifierRegistry<T> {
  private readonly entries = new Map<string, T>();

  /**
   * @param label - Entity name used in messages, e.g. "GeoLayer"
   */
  constructor(readonly label: string) {}

  get(id: string): T | undefined {
    return this.entries.get(id);
  }

  exists(id: string): boolean {
    return this.entries.has(id);
  }

  register(id: string, item: T, policy: CollisionPolicy): RegisterOutcome {
    if (!this.entries.has(id)) {
      this.entries.set(id, item);
      return INSERTED;
    }

    const outcome = OUTCOMES[policy];
    if (outcome.inserted) {
      this.entries.set(id, item);
    }
    return outcome;
  }

  /**
   * Deletes an entry. Removing an absent ID is a no-op.
   */
  remove(id: string): void {
    this.entries.delete(id);
  }

  ids(): string[] {
    return [...this.entries.keys()];
  }

  values(): T[] {
    return [...this.entries.values()];
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
