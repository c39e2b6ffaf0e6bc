import type { IngestOutcome } from "./engine.js";
import type { SourceId } from "./types.js";

export type EngineEvent = {
  source: SourceId;
  ts: number;
  outcome: IngestOutcome;
};

export type EngineListener = (event: EngineEvent) => void;

/**
 * Simple pub/sub for pipeline outcomes. Listeners run synchronously on the
 * ingestion path, so they must stay cheap.
 */
export class QuakeEventBus {
  private listeners = new Set<EngineListener>();

  constructor(private readonly onListenerError: (err: unknown) => void = (err) => {
    console.error("[quakewatch] event listener error:", err);
  }) {}

  /** Subscribe to all outcomes. Returns an unsubscribe function. */
  on(listener: EngineListener): () => void {
    this.listeners.add(listener);
    return () => { this.listeners.delete(listener); };
  }

  emit(event: EngineEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        this.onListenerError(err);
      }
    }
  }
}
