/**
 * Per-key mutual exclusion for a single process.
 *
 * Callers for the same key run one at a time in arrival order; different keys
 * never wait on each other. A caller that cannot obtain the key within its
 * timeout gets a LockTimeoutError and gives up its place in the queue.
 *
 * One registry is created at process start and shared through AppEnv.
 */

export type ReleaseLock = () => void

export class LockTimeoutError extends Error {
  constructor(
    public key: string,
    public timeoutMs: number,
  ) {
    super(`Timed out after ${timeoutMs}ms waiting for lock '${key}'`)
    this.name = "LockTimeoutError"
  }
}

function waitWithTimeout(
  turn: Promise<void>,
  key: string,
  timeoutMs: number,
): Promise<void> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(
      () => reject(new LockTimeoutError(key, timeoutMs)),
      timeoutMs,
    )
    void turn.then(() => {
      clearTimeout(timer)
      resolve()
    })
  })
}

export class KeyedLock {
  // Last queued holder per key. The chain never rejects.
  private tails = new Map<string, Promise<void>>()

  /**
   * Waits for the key and returns its release function. Releasing twice is
   * a no-op.
   */
  async acquire(key: string, timeoutMs: number): Promise<ReleaseLock> {
    const previous = this.tails.get(key)

    let releaseSlot: () => void = () => {}
    const slot = new Promise<void>((resolve) => {
      releaseSlot = resolve
    })
    const tail = (previous ?? Promise.resolve()).then(() => slot)
    this.tails.set(key, tail)
    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key)
      }
    })

    if (previous) {
      try {
        await waitWithTimeout(previous, key, timeoutMs)
      } catch (error) {
        // Hand the turn on as soon as the holder ahead of us is done
        void previous.then(releaseSlot)
        throw error
      }
    }

    let released = false
    return () => {
      if (released) return
      released = true
      releaseSlot()
    }
  }

  async runExclusive<T>(
    key: string,
    timeoutMs: number,
    fn: () => Promise<T> | T,
  ): Promise<T> {
    const release = await this.acquire(key, timeoutMs)
    try {
      return await fn()
    } finally {
      release()
    }
  }
}
