import consola from "consola"

import { InterruptedError } from "../lib/error"

export type GuardState = "idle" | "armed" | "cleaning" | "stopped"

export interface InterruptGuardOptions {
  // Full fleet stop; runs once, on the first interrupt
  onInterrupt: () => Promise<void>
  // When false, do not call process.exit() after cleanup (useful for tests)
  exitOnInterrupt?: boolean
}

const SIGNALS: ReadonlyArray<NodeJS.Signals> = ["SIGINT", "SIGTERM"]

// Owns SIGINT/SIGTERM while a mutating command runs. The first signal aborts
// the command, waits for it to settle, then stops the whole fleet and exits 1;
// a second one exits 2 immediately.
export class InterruptGuard {
  private state: GuardState = "idle"
  private readonly exitOnInterrupt: boolean
  private readonly listeners = new Map<NodeJS.Signals, () => void>()
  private cleanup: Promise<void> | null = null
  private readonly controller = new AbortController()
  // The guarded command, settled or not; cleanup waits on it
  private task: Promise<unknown> | null = null
  private exitCode: number | null = null

  constructor(private readonly opts: InterruptGuardOptions) {
    this.exitOnInterrupt = opts.exitOnInterrupt ?? true
  }

  // Aborted on the first interrupt
  get signal(): AbortSignal {
    return this.controller.signal
  }

  getState(): GuardState {
    return this.state
  }

  // Code the guard exited (or would have exited) with
  getExitCode(): number | null {
    return this.exitCode
  }

  arm(): this {
    if (this.state !== "idle") return this
    for (const signal of SIGNALS) {
      const listener = () => {
        void this.handleSignal(signal)
      }
      this.listeners.set(signal, listener)
      process.on(signal, listener)
    }
    this.state = "armed"
    return this
  }

  disarm(): void {
    for (const [signal, listener] of this.listeners) {
      process.off(signal, listener)
    }
    this.listeners.clear()
    if (this.state === "armed") this.state = "idle"
  }

  async handleSignal(signal: string): Promise<void> {
    if (this.state === "cleaning") {
      consola.warn("Second signal received during cleanup: forcing immediate exit")
      this.finish(2)
      return
    }
    if (this.state !== "armed") return

    this.state = "cleaning"
    consola.warn(`${signal} received, cleaning up...`)

    this.controller.abort(new InterruptedError(signal))
    this.cleanup = this.stopAfterTask().catch((err: unknown) => {
      consola.error("Cleanup after interrupt failed:", err)
    })
    await this.cleanup

    if (this.state === "cleaning") {
      this.finish(1)
    }
  }

  // Nothing may launch once the fleet stop has passed it, so the command
  // has to settle first
  private async stopAfterTask(): Promise<void> {
    if (this.task) {
      await this.task.then(
        () => undefined,
        (err: unknown) => {
          consola.debug("Interrupted command ended with:", err)
        },
      )
    }
    await this.opts.onInterrupt()
  }

  private finish(code: number): void {
    this.disarm()
    this.state = "stopped"
    this.exitCode = code
    if (this.exitOnInterrupt) {
      process.exit(code)
    } else {
      consola.info(`Interrupt handled (exit ${code} suppressed)`)
    }
  }

  // Wraps a command so an interrupt during it triggers the fleet stop
  async run<T>(task: (signal: AbortSignal) => Promise<T>): Promise<T> {
    this.arm()
    // Started on the next tick so an interrupt always finds it registered
    const running = Promise.resolve().then(() => task(this.signal))
    this.task = running
    try {
      return await running
    } finally {
      // An interrupt may still be stopping the fleet; let it finish first
      if (this.cleanup) await this.cleanup
      this.disarm()
    }
  }
}
