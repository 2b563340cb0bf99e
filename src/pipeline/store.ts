/**
 * InMemoryStageStore
 *
 * Ephemeral store scoped to a single verification run. One Map per slot
 * kind; computes SHA-256 hashes on set.
 */

import { contentHash } from "../shared/hash.js";
import type { ProducedRef, StageStore, StoreSlotKind, StoreSlots } from "./types.js";

type SlotMaps = { [K in StoreSlotKind]: Map<string, StoreSlots[K]> };

function emptySlots(): SlotMaps {
  return {
    template_styles: new Map(),
    document_styles: new Map(),
    match_outcome: new Map(),
    raw_discrepancies: new Map(),
    mismatches: new Map(),
    warnings: new Map(),
  };
}

export class InMemoryStageStore implements StageStore {
  private data: SlotMaps = emptySlots();
  private produced = new Map<string, ProducedRef>();

  set<K extends StoreSlotKind>(kind: K, id: string, value: StoreSlots[K]): ProducedRef {
    const slot: Map<string, StoreSlots[K]> = this.data[kind];
    slot.set(id, value);
    const ref: ProducedRef = { kind, id, hash: contentHash(value) };
    this.produced.set(`${kind}::${id}`, ref);
    return ref;
  }

  get<K extends StoreSlotKind>(kind: K, id: string): StoreSlots[K] {
    const slot: Map<string, StoreSlots[K]> = this.data[kind];
    const value = slot.get(id);
    if (value === undefined) {
      throw new Error(`StageStore: key not found: ${kind}::${id}`);
    }
    return value;
  }

  has(kind: StoreSlotKind, id: string): boolean {
    return this.data[kind].has(id);
  }

  refs(): ProducedRef[] {
    return [...this.produced.values()];
  }

  clear(): void {
    this.data = emptySlots();
    this.produced.clear();
  }

  get size(): number {
    return this.produced.size;
  }
}
