import { AsyncLocalStorage } from 'node:async_hooks'

/**
 * One level of a hold. Nested `run` calls made at this level are queued
 * behind each other. Once the level is closed, later calls from its context
 * are no longer nested and wait for the mutex like any other caller.
 */
class Hold {
  private tail: Promise<void> = Promise.resolve()
  private open = true

  constructor(readonly ticket: symbol) {}

  enqueue<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task)
    // errors reach the caller through `result`; the queue only needs order
    this.tail = result.then(settled, settled)
    return result
  }

  get accepting(): boolean {
    return this.open
  }

  /**
   * Waits for every queued task, including tasks queued while waiting, and
   * stops accepting new ones.
   */
  async close(): Promise<void> {
    let tail: Promise<void>
    do {
      tail = this.tail
      await tail
    } while (tail !== this.tail)
    this.open = false
  }
}

function settled() {
  return undefined
}

type Holds = ReadonlyMap<RecursiveMutex, Hold>

const holds = new AsyncLocalStorage<Holds>()

/**
 * RecursiveMutex is a first-in-first-out asynchronous lock that the holding
 * execution context may acquire again without waiting on other callers. A
 * context holds the mutex for as long as the function passed to {@link
 * RecursiveMutex.run} is running, including every promise it awaits.
 *
 * Nested `run` calls made from there re-enter the mutex, but they never run
 * at the same time as each other: nested calls of one level run one after
 * another in call order, even when the holder does not await them. The
 * outermost `run` waits for every nested call it started before it hands the
 * mutex to the next waiter, so a nested call never outlives the hold.
 *
 * Tasks that call `run` only after the hold has been released are not treated
 * as holders. They queue like any other caller.
 */
export class RecursiveMutex {
  private owner: symbol | undefined
  private held = 0
  private readonly waiters: Array<() => void> = []

  /**
   * Whether some execution context currently holds the mutex.
   */
  get locked(): boolean {
    return this.owner !== undefined
  }

  /**
   * Number of running nested `run` calls of the current holder, counting the
   * outermost one, and 0 when unlocked.
   */
  get depth(): number {
    return this.held
  }

  /**
   * Runs `fn` while holding the mutex and resolves with its result. The
   * mutex is released on every exit path, so a throwing or rejecting `fn`
   * propagates its error and leaves the mutex free for the next waiter.
   */
  async run<T>(fn: () => T | Promise<T>): Promise<T> {
    const current = holds.getStore()
    const parent = current?.get(this)

    if (
      parent !== undefined &&
      parent.accepting &&
      parent.ticket === this.owner
    ) {
      return parent.enqueue(async () => {
        this.held++
        try {
          return await this.runLevel(current, new Hold(parent.ticket), fn)
        } finally {
          this.held--
        }
      })
    }

    const ticket = Symbol('hold')
    await this.acquire(ticket)
    this.held = 1

    try {
      return await this.runLevel(current, new Hold(ticket), fn)
    } finally {
      this.held = 0
      this.release()
    }
  }

  private async runLevel<T>(
    current: Holds | undefined,
    hold: Hold,
    fn: () => T | Promise<T>,
  ): Promise<T> {
    const next = new Map(current)
    next.set(this, hold)
    try {
      return await holds.run(next, fn)
    } finally {
      await hold.close()
    }
  }

  private acquire(ticket: symbol): Promise<void> {
    if (this.owner === undefined) {
      this.owner = ticket
      return Promise.resolve()
    }

    return new Promise((resolve) => {
      this.waiters.push(() => {
        this.owner = ticket
        resolve()
      })
    })
  }

  private release() {
    const next = this.waiters.shift()
    if (next) {
      next()
    } else {
      this.owner = undefined
    }
  }
}
