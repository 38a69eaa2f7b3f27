export type JobQueueConfig = {
  maxConcurrent: number
}

/**
 * Bounded pool: at most `maxConcurrent` jobs are handed to the processor at
 * once. The processor reports back through `onJobComplete`.
 */
export function createJobQueue<Job>(config: JobQueueConfig) {
  const pending: Job[] = []
  let activeCount = 0
  let processor: ((job: Job) => void) | null = null
  let idleWaiters: Array<() => void> = []

  function notifyIfIdle(): void {
    if (activeCount > 0 || pending.length > 0) return
    const waiters = idleWaiters
    idleWaiters = []
    for (const resolve of waiters) resolve()
  }

  function tryProcess(): void {
    while (processor && activeCount < config.maxConcurrent && pending.length > 0) {
      activeCount++
      const job = pending.shift()
      if (job !== undefined) processor(job)
    }
  }

  return {
    setProcessor(fn: (job: Job) => void): void {
      processor = fn
      tryProcess()
    },

    enqueue(job: Job): void {
      pending.push(job)
      tryProcess()
    },

    onJobComplete(): void {
      activeCount = Math.max(0, activeCount - 1)
      tryProcess()
      notifyIfIdle()
    },

    /** Resolves once nothing is pending or running. */
    drain(): Promise<void> {
      return new Promise((resolve) => {
        idleWaiters.push(resolve)
        notifyIfIdle()
      })
    },

    get pending(): number {
      return pending.length
    },

    get active(): number {
      return activeCount
    },
  }
}

export type JobQueue<Job> = ReturnType<typeof createJobQueue<Job>>
