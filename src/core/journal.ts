import { decEntry, encEntry, type JournalEntry } from "../codec/rlp";
import { StorageModel, type StateDelta } from "./storage";
import type { LoggedEvent } from "./types";

/**
 * Ordered log of committed transactions, each kept RLP-encoded as it would be
 * on disk: the storage delta plus the events it flushed. Replaying it from
 * empty state reproduces persisted storage and the event sequence exactly.
 */
export class StateJournal {
  private readonly entries: Uint8Array[] = [];

  /** Encodes an entry without recording it. */
  encode(delta: StateDelta, events: readonly LoggedEvent[] = []): Uint8Array {
    return encEntry({ delta, events: [...events] });
  }

  push(entry: Uint8Array): number {
    this.entries.push(entry);
    return this.entries.length - 1;
  }

  get length(): number {
    return this.entries.length;
  }

  encoded(): readonly Uint8Array[] {
    return this.entries;
  }

  *decoded(): IterableIterator<JournalEntry> {
    for (const e of this.entries) yield decEntry(e);
  }
}

export const replay = (
  entries: Iterable<Uint8Array>,
): { storage: StorageModel; events: LoggedEvent[] } => {
  const storage = new StorageModel();
  const events: LoggedEvent[] = [];
  for (const e of entries) {
    const entry = decEntry(e);
    storage.apply(entry.delta);
    events.push(...entry.events);
  }
  return { storage, events };
};
