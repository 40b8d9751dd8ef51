import { encEvent } from "../codec/rlp";
import type { ILogger } from "../logging";
import type { RegistryEvent } from "../types";

/** Append-only notification channel. Delivery beyond append is not guaranteed. */
export interface EventSink {
  append(event: RegistryEvent): void;
}

export interface EventRecord {
  readonly seq: number;
  readonly event: RegistryEvent;
}

export type EventListener = (record: EventRecord) => void;

export class EventLog implements EventSink {
  private readonly records: EventRecord[] = [];
  private readonly listeners = new Set<EventListener>();

  constructor(private readonly log?: ILogger) {}

  get size(): number {
    return this.records.length;
  }

  append(event: RegistryEvent): void {
    const record: EventRecord = { seq: this.records.length, event };
    this.records.push(record);
    for (const listener of this.listeners) {
      try {
        listener(record);
      } catch (e) {
        // a failing subscriber must not undo an already committed operation
        this.log?.error({ err: e, seq: record.seq }, "event listener failed");
      }
    }
  }

  /** Records with `seq >= from`, in emission order. */
  since(from = 0): readonly EventRecord[] {
    return this.records.slice(from);
  }

  subscribe(listener: EventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** RLP wire form for indexers. */
  encoded(from = 0): Uint8Array[] {
    return this.since(from).map((r) => encEvent(r.event));
  }
}
