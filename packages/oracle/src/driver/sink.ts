import type {Timestamp} from "@slashwatch/types";
import type {ActionName} from "../actions/interface.js";

type EventBase = {
  sequence: number;
  flow: number;
  action: ActionName;
};

/** A flow starts */
export type FlowEvent = EventBase & {type: "flow"};

/** A flow ended with a command accepted or rejected by the system */
export type OutcomeEvent = EventBase & {
  type: "outcome";
  success: boolean;
  /** Number of outcomes of this kind for this action so far in the sequence, this one included */
  count: number;
};

/** A command was sent to the system */
export type TransactionEvent = EventBase & {
  type: "transaction";
  command: string;
  timestamp: Timestamp;
  from: string;
  to: string;
  /** Returned value, or the rejection reason */
  returnValue: string;
  success: boolean;
};

export type FuzzEvent = FlowEvent | OutcomeEvent | TransactionEvent;

/**
 * Ordered destination of fuzz events. Writes are never reordered, `flush` resolves once every
 * event written before it is persisted.
 */
export interface EventSink {
  write(event: FuzzEvent): void;
  flush(): Promise<void>;
}

/** Keeps events in memory */
export class MemorySink implements EventSink {
  readonly events: FuzzEvent[] = [];
  flushes = 0;

  write(event: FuzzEvent): void {
    this.events.push(event);
  }

  async flush(): Promise<void> {
    this.flushes++;
  }
}

export class NoopSink implements EventSink {
  write(): void {
    // Drop
  }

  async flush(): Promise<void> {
    // Nothing buffered
  }
}
