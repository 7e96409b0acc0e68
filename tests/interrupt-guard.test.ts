import { expect, test, vi } from "vitest"

import { InterruptGuard } from "../src/daemon/interrupt-guard"

test("interrupt runs the fleet stop before exiting 1", async () => {
  let stopped = false
  const guard = new InterruptGuard({
    onInterrupt: async () => {
      await new Promise((r) => setTimeout(r, 50))
      stopped = true
    },
    exitOnInterrupt: false,
  })

  guard.arm()
  expect(guard.getState()).toBe("armed")

  await guard.handleSignal("SIGINT")

  expect(stopped).toBe(true)
  expect(guard.getState()).toBe("stopped")
  expect(guard.getExitCode()).toBe(1)
})

test("second signal during cleanup exits 2 without a second cleanup", async () => {
  let finishCleanup: (value: void) => void = () => {}
  const onInterrupt = vi.fn(
    () =>
      new Promise<void>((resolve) => {
        finishCleanup = resolve
      }),
  )
  const guard = new InterruptGuard({ onInterrupt, exitOnInterrupt: false })
  guard.arm()

  const first = guard.handleSignal("SIGINT")
  expect(guard.getState()).toBe("cleaning")

  await guard.handleSignal("SIGTERM")
  expect(guard.getExitCode()).toBe(2)

  finishCleanup()
  await first

  expect(onInterrupt).toHaveBeenCalledOnce()
  expect(guard.getExitCode()).toBe(2)
})

test("failed cleanup still exits 1", async () => {
  const guard = new InterruptGuard({
    onInterrupt: async () => {
      throw new Error("reclaim failed")
    },
    exitOnInterrupt: false,
  })
  guard.arm()

  await guard.handleSignal("SIGTERM")

  expect(guard.getExitCode()).toBe(1)
})

test("signals are ignored unless armed", async () => {
  const onInterrupt = vi.fn(async () => {})
  const guard = new InterruptGuard({ onInterrupt, exitOnInterrupt: false })

  await guard.handleSignal("SIGINT")

  expect(onInterrupt).not.toHaveBeenCalled()
  expect(guard.getState()).toBe("idle")
})

test("run installs handlers only for the duration of the task", async () => {
  const before = process.listenerCount("SIGINT")
  const guard = new InterruptGuard({ onInterrupt: async () => {}, exitOnInterrupt: false })

  const result = await guard.run(async () => {
    expect(process.listenerCount("SIGINT")).toBe(before + 1)
    return "done"
  })

  expect(result).toBe("done")
  expect(process.listenerCount("SIGINT")).toBe(before)
  expect(guard.getState()).toBe("idle")
})

test("cleanup waits for the interrupted command to settle", async () => {
  const order: Array<string> = []
  const guard = new InterruptGuard({
    onInterrupt: async () => {
      order.push("fleet stopped")
    },
    exitOnInterrupt: false,
  })
  const interrupts: Array<Promise<void>> = []

  await guard.run(async (signal) => {
    interrupts.push(guard.handleSignal("SIGINT"))
    expect(signal.aborted).toBe(true)
    await new Promise((r) => setTimeout(r, 20))
    order.push("command settled")
  })
  await Promise.all(interrupts)

  expect(order).toEqual(["command settled", "fleet stopped"])
  expect(guard.getExitCode()).toBe(1)
})
