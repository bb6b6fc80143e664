import { describe, expect, test } from "vitest";
import { LifecycleManager, type Lifecycle } from "../lifecycle.js";

// ============================================================================
// Helpers
// ============================================================================

/** A resource whose lifecycle records start/stop calls in order. */
function tracked(name: string, log: string[]): Lifecycle {
  return {
    lifecycle: LifecycleManager.on({
      start: () => { log.push(`${name}:start`) },
      stop: () => { log.push(`${name}:stop`) },
    }),
  }
}

// ============================================================================
// LifecycleManager.start / stop
// ============================================================================

describe("LifecycleManager.start", () => {
  test("runs once however often it is called", async () => {
    let count = 0
    const step = LifecycleManager.start(() => { count++ })
    await step()
    await step()
    expect(count).toBe(1)
  })

  test("awaits async steps", async () => {
    let value = ""
    const step = LifecycleManager.start(async () => {
      await Promise.resolve()
      value = "open"
    })
    await step()
    expect(value).toBe("open")
  })
})

describe("LifecycleManager.stop", () => {
  test("runs every time", async () => {
    let count = 0
    const step = LifecycleManager.stop(() => { count++ })
    await step()
    await step()
    expect(count).toBe(2)
  })
})

describe("LifecycleManager.on", () => {
  test("missing steps are no-ops", async () => {
    const lifecycle = LifecycleManager.on({})
    await expect(lifecycle.start()).resolves.toBeUndefined()
    await expect(lifecycle.stop()).resolves.toBeUndefined()
  })
})

// ============================================================================
// LifecycleManager.auto
// ============================================================================

describe("LifecycleManager.auto", () => {
  test("starts forward and stops in reverse", async () => {
    const log: string[] = []
    const lifecycle = LifecycleManager.auto([tracked("store", log), tracked("client", log)])

    await lifecycle.start()
    await lifecycle.stop()

    expect(log).toEqual(["store:start", "client:start", "client:stop", "store:stop"])
  })

  test("groups run together", async () => {
    const log: string[] = []
    const lifecycle = LifecycleManager.auto([tracked("a", log), [tracked("b", log), tracked("c", log)]])

    await lifecycle.start()

    expect(log[0]).toBe("a:start")
    expect(log.slice(1).sort()).toEqual(["b:start", "c:start"])
  })

  test("a thunk is resolved when the step runs", async () => {
    const log: string[] = []
    const deps: Lifecycle[] = []
    const lifecycle = LifecycleManager.auto(() => deps)
    deps.push(tracked("late", log))

    await lifecycle.start()

    expect(log).toEqual(["late:start"])
  })
})
