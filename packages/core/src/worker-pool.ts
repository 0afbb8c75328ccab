import {CancellationError, DispatchError} from './errors.js'

/** An execution slot. One agent runs one job instance at a time. */
export type Agent = {
  id: string;
}

type Waiter = {
  resolve: (agent: Agent) => void;
}

/**
 * Fixed-size pool of agents handed out in FIFO order.
 *
 * `checkout` resolves immediately while an agent is idle, otherwise waits
 * until one is released. Waiting can be abandoned through an AbortSignal.
 */
export class WorkerPool {
  private readonly idle: Agent[]
  private readonly waiters: Waiter[] = []

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new DispatchError('INVALID_CONCURRENCY', `Concurrency must be a positive integer, got ${capacity}`)
    }

    this.idle = Array.from({length: capacity}, (_, i) => ({id: `agent-${i + 1}`}))
  }

  get busy(): number {
    return this.capacity - this.idle.length
  }

  get waiting(): number {
    return this.waiters.length
  }

  async checkout(signal?: AbortSignal): Promise<Agent> {
    if (signal?.aborted) {
      throw new CancellationError()
    }

    const agent = this.idle.shift()
    if (agent) {
      return agent
    }

    return new Promise<Agent>((resolve, reject) => {
      const waiter: Waiter = {
        resolve(agent) {
          signal?.removeEventListener('abort', onAbort)
          resolve(agent)
        }
      }

      const onAbort = () => {
        const index = this.waiters.indexOf(waiter)
        if (index !== -1) {
          this.waiters.splice(index, 1)
        }

        reject(new CancellationError())
      }

      signal?.addEventListener('abort', onAbort, {once: true})
      this.waiters.push(waiter)
    })
  }

  /** Hands the agent to the next waiter, or returns it to the idle list. */
  release(agent: Agent): void {
    const waiter = this.waiters.shift()
    if (waiter) {
      waiter.resolve(agent)
      return
    }

    this.idle.push(agent)
  }

  async use<T>(fn: (agent: Agent) => Promise<T>, signal?: AbortSignal): Promise<T> {
    const agent = await this.checkout(signal)
    try {
      return await fn(agent)
    } finally {
      this.release(agent)
    }
  }
}
