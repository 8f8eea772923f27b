import { StyleEventKind, StyleParseError } from "../types/index.js";
import type { ParseFailedData, StyleEvent } from "../types/index.js";

export type StyleEventListener = (event: StyleEvent) => void;

export class StyleEventEmitter {
  private listeners: StyleEventListener[] = [];
  onEvent: StyleEventListener | undefined;

  emit(event: StyleEvent): void {
    if (this.onEvent) {
      this.onEvent(event);
    }
    for (const listener of [...this.listeners]) {
      listener(event);
    }
  }

  /** Registers a listener and returns a function that removes it again. */
  subscribe(listener: StyleEventListener): () => void {
    this.listeners.push(listener);
    return () => {
      const idx = this.listeners.indexOf(listener);
      if (idx >= 0) this.listeners.splice(idx, 1);
    };
  }

  close(): void {
    this.listeners.length = 0;
    this.onEvent = undefined;
  }
}

/**
 * Runs a parse, reporting a parse_failed event before the error propagates.
 */
export function withFailureEvent<T>(
  emitter: StyleEventEmitter | undefined,
  source: ParseFailedData["source"],
  parse: () => T,
): T {
  try {
    return parse();
  } catch (err) {
    if (emitter && err instanceof StyleParseError) {
      emitter.emit({
        kind: StyleEventKind.PARSE_FAILED,
        timestamp: new Date(),
        data: { source, errorKind: err.kind, message: err.message },
      });
    }
    throw err;
  }
}
