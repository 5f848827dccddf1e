import {
  BehaviorSubject,
  defaultIfEmpty,
  finalize,
  from,
  take,
  type ObservableInput,
  type Subscription,
} from 'rxjs';

export type LoadOutcome<T> =
  | { status: 'loaded'; key: string; payload: T }
  | { status: 'unavailable'; key: string; reason: string };

export type SegmentLoader<T> = () => ObservableInput<T | null | undefined>;

/**
 * One in-flight segment load per view.
 *
 * The loader only ever writes into a single result slot tagged with the
 * requested key; the render tick takes the result from there. Requests made
 * while a load is running are dropped, not queued.
 */
export class TelemetryLoadGateService<T> {
  private loadingSubject = new BehaviorSubject<boolean>(false);
  loading$ = this.loadingSubject.asObservable();

  private inFlightKey: string | null = null;
  private slot: LoadOutcome<T> | null = null;
  private loadSub?: Subscription;

  /**
   * Start loading `key`. Returns `false` when another load is still running.
   */
  request(key: string, loader: SegmentLoader<T>): boolean {
    if (this.loadingSubject.value) {
      console.log(
        `[LoadGate] ${key} ignored, ${this.inFlightKey ?? 'a segment'} is still loading`,
      );
      return false;
    }

    this.inFlightKey = key;
    this.slot = null;
    this.loadingSubject.next(true);

    let source: ObservableInput<T | null | undefined>;
    try {
      source = loader();
    } catch (error) {
      this.fail(key, error);
      this.settle();
      return true;
    }

    this.loadSub = from(source)
      .pipe(
        take(1),
        defaultIfEmpty(null),
        finalize(() => this.settle()),
      )
      .subscribe({
        next: (payload) => {
          this.slot =
            payload === null || payload === undefined
              ? { status: 'unavailable', key, reason: 'no telemetry available' }
              : { status: 'loaded', key, payload };
        },
        error: (error: unknown) => this.fail(key, error),
      });

    return true;
  }

  /**
   * Hand the completed result to the caller and empty the slot.
   * A result for a key other than `currentKey` is stale and discarded.
   */
  take(currentKey: string | null): LoadOutcome<T> | null {
    const outcome = this.slot;
    if (!outcome) return null;

    this.slot = null;

    if (outcome.key !== currentKey) {
      console.log(
        `[LoadGate] discarding stale result for ${outcome.key} (current: ${currentKey ?? 'none'})`,
      );
      return null;
    }

    return outcome;
  }

  isLoading(): boolean {
    return this.loadingSubject.value;
  }

  hasResult(): boolean {
    return this.slot !== null;
  }

  /** Drop any in-flight load and pending result (view closed). */
  reset(): void {
    this.loadSub?.unsubscribe();
    this.loadSub = undefined;
    this.slot = null;
    this.settle();
  }

  private fail(key: string, error: unknown): void {
    const reason = error instanceof Error ? error.message : String(error);
    console.error(`[LoadGate] telemetry load failed for ${key}:`, reason);
    this.slot = { status: 'unavailable', key, reason };
  }

  private settle(): void {
    this.inFlightKey = null;
    if (this.loadingSubject.value) {
      this.loadingSubject.next(false);
    }
  }
}
