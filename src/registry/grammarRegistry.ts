import { RegistryError } from "../errors.js";
import type { TypeSet } from "../synth/types.js";

export type GrammarBuild = () => TypeSet | Promise<TypeSet>;

export type RegistryEventType = "build-start" | "build-complete" | "build-failed" | "cache-hit";

export interface RegistryEvent {
  readonly type: RegistryEventType;
  readonly identity: string;
  readonly error?: unknown;
}

export type RegistryEventListener = (event: RegistryEvent) => void;

export interface GrammarRegistryOptions {
  /**
   * Receives errors thrown by event listeners. Without it they are rethrown
   * on a later microtask, outside the build they were reported from.
   */
  readonly onListenerError?: (error: unknown, event: RegistryEvent) => void;
}

interface ReadyEntry {
  readonly status: "ready";
  readonly typeSet: TypeSet;
}

interface PendingEntry {
  readonly status: "pending";
  readonly promise: Promise<TypeSet>;
}

type Entry = ReadyEntry | PendingEntry;

/**
 * Single-flight cache of synthesized type sets keyed by grammar identity.
 * Entries live until evicted; a failed build leaves no entry behind.
 */
export class GrammarRegistry {
  private readonly entries = new Map<string, Entry>();
  private readonly listeners = new Set<RegistryEventListener>();
  private readonly options: GrammarRegistryOptions;

  constructor(options: GrammarRegistryOptions = {}) {
    this.options = options;
  }

  getOrBuild(identity: string, build: GrammarBuild): Promise<TypeSet> {
    const entry = this.entries.get(identity);
    if (entry) {
      this.emit({ type: "cache-hit", identity });
      return entry.status === "ready" ? Promise.resolve(entry.typeSet) : entry.promise;
    }

    this.emit({ type: "build-start", identity });
    const pending: PendingEntry = {
      status: "pending",
      promise: Promise.resolve()
        .then(build)
        .then(
          (typeSet) => {
            // An eviction during the build leaves the slot to later callers.
            if (this.entries.get(identity) === pending) {
              this.entries.set(identity, { status: "ready", typeSet });
            }
            this.emit({ type: "build-complete", identity });
            return typeSet;
          },
          (error: unknown) => {
            if (this.entries.get(identity) === pending) {
              this.entries.delete(identity);
            }
            this.emit({ type: "build-failed", identity, error });
            throw error;
          }
        ),
    };
    this.entries.set(identity, pending);
    return pending.promise;
  }

  /** Synchronous variant for builds that do no asynchronous work. */
  getOrBuildSync(identity: string, build: () => TypeSet): TypeSet {
    const entry = this.entries.get(identity);
    if (entry?.status === "ready") {
      this.emit({ type: "cache-hit", identity });
      return entry.typeSet;
    }
    if (entry?.status === "pending") {
      throw new RegistryError(
        `Grammar "${identity}" is being built asynchronously; await getOrBuild instead`,
        identity
      );
    }

    this.emit({ type: "build-start", identity });
    let typeSet: TypeSet;
    try {
      typeSet = build();
    } catch (error) {
      this.emit({ type: "build-failed", identity, error });
      throw error;
    }
    this.entries.set(identity, { status: "ready", typeSet });
    this.emit({ type: "build-complete", identity });
    return typeSet;
  }

  /** The cached type set, if a build for `identity` has completed. */
  peek(identity: string): TypeSet | undefined {
    const entry = this.entries.get(identity);
    return entry?.status === "ready" ? entry.typeSet : undefined;
  }

  has(identity: string): boolean {
    return this.entries.has(identity);
  }

  /** Drop an entry; callers already holding its type set keep using it. */
  evict(identity: string): boolean {
    return this.entries.delete(identity);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  onEvent(listener: RegistryEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // A throwing listener never changes the outcome of the build it observes.
  private emit(event: RegistryEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        this.reportListenerError(error, event);
      }
    }
  }

  private reportListenerError(error: unknown, event: RegistryEvent): void {
    const { onListenerError } = this.options;
    if (onListenerError) {
      onListenerError(error, event);
      return;
    }
    queueMicrotask(() => {
      throw error;
    });
  }
}

let shared: GrammarRegistry | undefined;

/** The process-wide registry. */
export function getSharedGrammarRegistry(): GrammarRegistry {
  shared ??= new GrammarRegistry();
  return shared;
}
