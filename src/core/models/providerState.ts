/**
 * Observable provider snapshot, refreshed by probing the backend.
 *
 * Snapshots are frozen and swapped whole; readers never see a partial update.
 * A probe started before the latest `reset()` can no longer change state.
 */

import { Unsubscribe } from "../eventBus";
import { ModelHubLogger } from "../logger";
import { compareIdentifiers } from "../types";
import { err, ok, Result } from "../utils/result";

export interface ModelDescriptor {
  readonly id: string;
  readonly name: string;
}

export interface ProviderSnapshot<M extends ModelDescriptor> {
  readonly models: readonly M[];
  /** At least one model available */
  readonly authenticated: boolean;
  readonly refreshedAt: number | null;
  readonly error: Error | null;
}

/**
 * `coalesce`: overlapping refreshes share one probe.
 * `race`: every refresh probes and the last probe to finish wins.
 */
export type RefreshStrategy = "coalesce" | "race";

export type Probe<M extends ModelDescriptor> = () => Promise<readonly M[]>;

export type SnapshotListener<M extends ModelDescriptor> = (
  snapshot: ProviderSnapshot<M>,
  previous: ProviderSnapshot<M>
) => void;

export interface ProviderStateOptions {
  strategy?: () => RefreshStrategy;
  logger?: ModelHubLogger;
}

export function createSnapshot<M extends ModelDescriptor>(
  models: readonly M[],
  error: Error | null = null,
  refreshedAt: number | null = Date.now()
): ProviderSnapshot<M> {
  const seen = new Set<string>();
  const unique: M[] = [];
  for (const model of models) {
    if (!seen.has(model.id)) {
      seen.add(model.id);
      unique.push(model);
    }
  }
  unique.sort((a, b) => compareIdentifiers(a.name, b.name));

  return Object.freeze({
    models: Object.freeze(unique),
    authenticated: unique.length > 0,
    refreshedAt,
    error,
  });
}

export class ProviderState<M extends ModelDescriptor> {
  private current: ProviderSnapshot<M> = createSnapshot<M>([], null, null);
  private inFlight?: Promise<ProviderSnapshot<M>>;
  private generation = 0;
  private probeCount = 0;
  private disposed = false;
  private readonly listeners = new Set<SnapshotListener<M>>();
  private readonly strategy: () => RefreshStrategy;
  private readonly logger: ModelHubLogger;

  constructor(private readonly probe: Probe<M>, options: ProviderStateOptions = {}) {
    this.strategy = options.strategy ?? (() => "coalesce");
    this.logger = options.logger ?? ModelHubLogger.silent();
  }

  get snapshot(): ProviderSnapshot<M> {
    return this.current;
  }

  /** Probes started so far */
  get probes(): number {
    return this.probeCount;
  }

  get refreshing(): boolean {
    return this.inFlight !== undefined;
  }

  /**
   * Probe the backend and swap in the result. Rejects with the probe error
   * after the empty snapshot carrying it is in place.
   */
  refresh(): Promise<ProviderSnapshot<M>> {
    if (this.inFlight && this.strategy() === "coalesce") {
      return this.inFlight;
    }
    return this.start();
  }

  /**
   * Same as `refresh()` but never rejects
   */
  async refreshSettled(): Promise<Result<ProviderSnapshot<M>, Error>> {
    try {
      return ok(await this.refresh());
    } catch (error) {
      return err(error instanceof Error ? error : new Error(String(error)));
    }
  }

  /**
   * Start a probe that supersedes every probe already in flight
   */
  reset(): Promise<ProviderSnapshot<M>> {
    this.generation++;
    this.inFlight = undefined;
    return this.start();
  }

  subscribe(listener: SnapshotListener<M>): Unsubscribe {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Drop listeners; results of probes still running are ignored
   */
  dispose(): void {
    this.disposed = true;
    this.generation++;
    this.inFlight = undefined;
    this.listeners.clear();
  }

  private start(): Promise<ProviderSnapshot<M>> {
    const attempt = this.run(this.generation);
    this.inFlight = attempt;
    const clear = () => {
      if (this.inFlight === attempt) {
        this.inFlight = undefined;
      }
    };
    void attempt.then(clear, clear);
    return attempt;
  }

  private async run(generation: number): Promise<ProviderSnapshot<M>> {
    this.probeCount++;
    let models: readonly M[];
    try {
      models = await this.probe();
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      if (generation !== this.generation) {
        return this.superseded();
      }
      this.swap(createSnapshot<M>([], failure));
      throw failure;
    }

    if (generation !== this.generation) {
      return this.superseded();
    }
    const snapshot = createSnapshot(models);
    this.swap(snapshot);
    return snapshot;
  }

  /**
   * A stale probe's caller gets the outcome of the probe that replaced it
   */
  private superseded(): Promise<ProviderSnapshot<M>> {
    if (this.disposed || !this.inFlight) {
      return Promise.resolve(this.current);
    }
    return this.inFlight;
  }

  private swap(snapshot: ProviderSnapshot<M>): void {
    const previous = this.current;
    this.current = snapshot;

    for (const listener of [...this.listeners]) {
      try {
        listener(snapshot, previous);
      } catch (error) {
        this.logger.error(error instanceof Error ? error : String(error), { listener: "provider-state" });
      }
    }
  }
}
