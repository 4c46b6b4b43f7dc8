export class TimeoutError extends Error {
  constructor(
    public readonly timeoutMs: number,
    message = `Timed out after ${timeoutMs}ms`,
  ) {
    super(message)
    this.name = "TimeoutError"
  }
}

/**
 * Races `run` against a timer. The signal handed to `run` aborts when the
 * timer fires so the underlying request can stop early.
 */
export async function withTimeout<T>(run: (signal: AbortSignal) => Promise<T>, timeoutMs: number): Promise<T> {
  const controller = new AbortController()
  let timer: ReturnType<typeof setTimeout> | undefined
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new TimeoutError(timeoutMs)
      controller.abort(error)
      reject(error)
    }, timeoutMs)
  })

  try {
    return await Promise.race([run(controller.signal), timeout])
  } finally {
    clearTimeout(timer)
  }
}
