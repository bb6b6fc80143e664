/**
 * Lifecycle: start/stop protocol for long-lived resources such as the SQLite
 * connection and the assembled runtime.
 *
 * A resource exposes a `lifecycle` field built with one of:
 *   - LifecycleManager.on({ start?, stop? }): explicit steps
 *   - LifecycleManager.auto(deps): derived from the resources it owns
 */

export interface Lifecycle {
  lifecycle: LifecycleMethods
}

export interface LifecycleMethods {
  start: LifecycleStep
  stop: LifecycleStep
}

export type LifecycleStep = () => void | Promise<void>

/** Entry in an auto() sequence: a single Lifecycle or a group started together. */
type AutoEntry = Lifecycle | Lifecycle[]

export const LifecycleManager = {
  /** Explicit steps. A missing step is a no-op. */
  on(opts: { start?: LifecycleStep; stop?: LifecycleStep }): LifecycleMethods {
    return {
      start: LifecycleManager.start(opts.start ?? (() => {})),
      stop: LifecycleManager.stop(opts.stop ?? (() => {})),
    }
  },

  /** Start runs once; later calls resolve immediately. */
  start(fn: LifecycleStep): LifecycleStep {
    let started = false
    return async () => {
      if (started) return
      started = true
      await fn()
    }
  },

  /** Stop runs on every call. */
  stop(fn: LifecycleStep): LifecycleStep {
    return async () => {
      await fn()
    }
  },

  /**
   * Start walks the list forward, stop walks it backwards.
   * Array entries run in parallel. Pass a thunk to reference `this` from a field initializer.
   */
  auto(deps: AutoEntry[] | (() => AutoEntry[])): LifecycleMethods {
    const resolve = (): AutoEntry[] => typeof deps === "function" ? deps() : deps
    const run = async (entry: AutoEntry, step: "start" | "stop"): Promise<void> => {
      if (Array.isArray(entry)) {
        await Promise.all(entry.map((d) => d.lifecycle[step]()))
      } else {
        await entry.lifecycle[step]()
      }
    }

    return {
      start: LifecycleManager.start(async () => {
        for (const entry of resolve()) await run(entry, "start")
      }),
      stop: LifecycleManager.stop(async () => {
        for (const entry of [...resolve()].reverse()) await run(entry, "stop")
      }),
    }
  },
}
