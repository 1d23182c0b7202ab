/**
 * Core interfaces for dependency injection.
 * The engine never touches the terminal, the process or the global network
 * stack directly; everything goes through these.
 */

export interface FileSystem {
  readFile(path: string): string;
  readFileBinary(path: string): Buffer;
  exists(path: string): boolean;
}

export interface HttpClient {
  fetch(url: string, options?: RequestInit): Promise<Response>;
}

export type EventLevel = "debug" | "info" | "warn" | "error";

/**
 * Structured event emitted by the engine.
 * `type` is a stable machine-readable tag, `message` is for humans.
 */
export interface EngineEvent {
  level: EventLevel;
  type: string;
  message: string;
  data?: Record<string, unknown>;
}

/**
 * Receives engine events. Passed explicitly into every operation that
 * reports progress, so tests can capture events without global state.
 */
export interface EventSink {
  emit(event: EngineEvent): void;
}
