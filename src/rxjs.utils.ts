import * as rx from 'rxjs';

/**
 * A single-assignment broadcast flag. Every `start()` of a dispatcher creates
 * a fresh signal and hands it to the workers it spawns, so a worker only ever
 * sees the signal of its own generation.
 */
export class StopSignal {
  private readonly state$ = new rx.BehaviorSubject<boolean>(false);

  constructor(public readonly generation: number) {}

  public get isSet(): boolean {
    return this.state$.getValue();
  }

  /** Emits once, when the signal is set (immediately if it already is). */
  public get stopped$(): rx.Observable<void> {
    return this.state$.pipe(
      rx.filter((stopped) => stopped),
      rx.take(1),
      rx.map(() => undefined)
    );
  }

  public set(): void {
    if (!this.isSet) {
      this.state$.next(true);
    }
  }
}

export function retryOnError$<R>(
  retryCount: number,
  retryDelayMillis: number,
  body: () => Promise<R>,
  onError: (error: unknown) => R
): rx.Observable<R> {
  return rx.defer(body).pipe(
    rx.retry({
      count: retryCount,
      delay: retryDelayMillis,
    }),
    rx.catchError((error: unknown) => {
      return rx.of(onError(error));
    })
  );
}
