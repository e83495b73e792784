/**
 * Abort helpers for collaborators whose clients take no AbortSignal.
 */

/**
 * Errors cross realms (test sandboxes, a client library's own context), so
 * they are recognised by shape rather than by `instanceof`.
 */
function errorName(value: unknown): string | undefined {
  if (typeof value === "object" && value !== null && "name" in value && typeof value.name === "string") {
    return value.name;
  }
  return undefined;
}

/**
 * Reason of an aborted signal; an AbortError when the reason is not an error.
 */
export function abortReason(signal: AbortSignal): unknown {
  const reason: unknown = signal.reason;
  if (errorName(reason) !== undefined) return reason;
  return new DOMException("This operation was aborted", "AbortError");
}

export function isAbortError(err: unknown): boolean {
  const name = errorName(err);
  return name === "AbortError" || name === "TimeoutError";
}

/**
 * Race a promise against a signal. The underlying work is not cancelled;
 * only the caller stops waiting.
 */
export function withAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) {
    // Observe the losing promise so its rejection is not unhandled
    void promise.catch(() => undefined);
    return Promise.reject(abortReason(signal));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(abortReason(signal));
    };
    signal.addEventListener("abort", onAbort, { once: true });

    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      }
    );
  });
}
