/** A source could not produce a batch: transport failure, bad status, or unparseable payload. */
export class SourceFetchError extends Error {
  constructor(
    readonly source: string,
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(`${source}: ${message}`, options)
    this.name = 'SourceFetchError'
  }
}

/** Combine the per-request timeout with the caller's cancellation signal. */
export function requestSignal(timeoutMs: number, signal?: AbortSignal): AbortSignal {
  const timeout = AbortSignal.timeout(timeoutMs)
  return signal ? AbortSignal.any([timeout, signal]) : timeout
}
