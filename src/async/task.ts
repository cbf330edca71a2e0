/**
 * Cooperative task helpers.
 *
 * A compile or format flow is written as one `async` function. Every place
 * where it waits on something driven from outside (the user picking an item,
 * typing a value, a network reply) goes through `suspend`, so callback-based
 * editor APIs read as straight-line code and the extension host keeps
 * running while the flow is parked.
 */

export type Callback<T> = (value: T) => void;

/**
 * A single outstanding request for externally supplied input.
 * The completion slot is filled once; later completions are ignored.
 */
export class PendingPrompt<T> {
  private settled = false;

  constructor(private readonly resolve: (value: T) => void) {}

  public get isSettled(): boolean {
    return this.settled;
  }

  public readonly complete = (value: T): void => {
    if (this.settled) {
      return;
    }
    this.settled = true;
    this.resolve(value);
  };
}

/**
 * Suspends the calling task until `op` hands a value to its completion callback.
 *
 * @param op - Starts the external operation and receives the completion callback.
 * @returns The first value passed to the callback.
 */
export function suspend<T>(op: (done: Callback<T>) => void): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const pending = new PendingPrompt<T>(resolve);
    try {
      op(pending.complete);
    } catch (err) {
      reject(err);
    }
  });
}

/**
 * Turns a callback-last function into one that returns a promise.
 */
export function wrap<A extends unknown[], T>(
  fn: (...args: [...A, Callback<T>]) => void
): (...args: A) => Promise<T> {
  return (...args: A) => suspend<T>((done) => fn(...args, done));
}

export interface TaskHandle {
  readonly name: string;
  /** Settles when the task body finishes, whether it succeeded or not. Never rejects. */
  readonly done: Promise<void>;
}

/**
 * Starts `body` as an independent task without blocking the caller.
 *
 * Errors thrown inside `body` stay inside the task: they are logged and
 * handed to `onError`, never rethrown to whoever spawned it.
 */
export function spawn(
  name: string,
  body: () => Promise<void>,
  onError?: (error: unknown) => void | Promise<void>
): TaskHandle {
  const done = Promise.resolve()
    .then(body)
    .catch(async (err: unknown) => {
      console.error(`[Task] ${name} failed:`, err);
      if (onError) {
        await onError(err);
      }
    })
    .catch((err: unknown) => {
      console.error(`[Task] ${name} error handler failed:`, err);
    });

  return { name, done };
}

/**
 * Hands control back to the event loop and resumes on the next turn,
 * after pending I/O and UI work queued before it.
 */
export function yieldPoint(): Promise<void> {
  return new Promise<void>((resolve) => setImmediate(resolve));
}
