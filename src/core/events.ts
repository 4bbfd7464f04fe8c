import { EngineError, EventFilterError } from "./errors";
import type { CallFrame } from "./frame";
import type {
  Address,
  ContractEvent,
  EventDecl,
  EventFilter,
  LoggedEvent,
} from "./types";

export const MAX_INDEXED_FIELDS = 3;

/**
 * Global append-only log. Events are buffered on their frame and only reach
 * the log once every frame up to the top-level one has committed.
 */
export class EventLog {
  private readonly entries: LoggedEvent[] = [];
  private readonly decls = new Map<string, Map<Address, EventDecl>>();

  get size(): number {
    return this.entries.length;
  }

  declare(address: Address, events: Iterable<EventDecl>): void {
    for (const decl of events) {
      let byAddr = this.decls.get(decl.name);
      if (!byAddr) {
        byAddr = new Map();
        this.decls.set(decl.name, byAddr);
      }
      byAddr.set(address, decl);
    }
  }

  emit(frame: CallFrame, event: ContractEvent): void {
    frame.pendingEvents.push(event);
  }

  /** Moves a committed frame's events up one level, or into the log at the top. */
  flush(frame: CallFrame): LoggedEvent[] {
    const pending = frame.pendingEvents.splice(0);
    if (frame.parent) {
      frame.parent.pendingEvents.push(...pending);
      return [];
    }
    const logged = this.index(pending);
    this.entries.push(...logged);
    return logged;
  }

  /** What flushing a top-level frame would log, leaving the frame untouched. */
  staged(frame: CallFrame): LoggedEvent[] {
    if (frame.parent) throw new EngineError("only a top-level frame has staged events");
    return this.index(frame.pendingEvents);
  }

  private index(pending: readonly ContractEvent[]): LoggedEvent[] {
    const base = this.entries.length;
    return pending.map((e, i) => ({ ...e, logIndex: base + i }));
  }

  discard(frame: CallFrame): void {
    frame.pendingEvents.length = 0;
  }

  /** Validates the filter eagerly, then yields matches lazily in log order. */
  query(filter: EventFilter = {}): IterableIterator<LoggedEvent> {
    this.validate(filter);
    return this.scan(filter);
  }

  private *scan(filter: EventFilter): IterableIterator<LoggedEvent> {
    const where = Object.entries(filter.where ?? {});
    for (const e of this.entries) {
      if (filter.address && e.address !== filter.address) continue;
      if (filter.event && e.name !== filter.event) continue;
      const matches = where.every(([name, value]) =>
        e.fields.some((f) => f.indexed && f.name === name && f.value === value),
      );
      if (matches) yield e;
    }
  }

  private validate(filter: EventFilter): void {
    const names = Object.keys(filter.where ?? {});
    if (!names.length) return;
    if (!filter.event) {
      throw new EventFilterError("filtering on fields requires an event name");
    }
    const decls = this.decls.get(filter.event);
    if (!decls?.size) throw new EventFilterError(`unknown event ${filter.event}`);
    // a proxy logs events its own code never declares
    const own = filter.address ? decls.get(filter.address) : undefined;
    for (const decl of own ? [own] : decls.values()) {
      for (const name of names) {
        const field = decl.fields.find((f) => f.name === name);
        if (!field) {
          throw new EventFilterError(`${filter.event} has no field ${name}`);
        }
        if (!field.indexed) {
          throw new EventFilterError(`${filter.event}.${name} is not indexed`);
        }
      }
    }
  }
}
