import consola from "consola"
import { spawn } from "node:child_process"
import { once } from "node:events"
import fs from "node:fs/promises"
import invariant from "tiny-invariant"

import { sleep as realSleep, type Sleep } from "./bounded-retry"

export interface SpawnRequest {
  command: string
  args: Array<string>
  cwd: string
  env: NodeJS.ProcessEnv
  // stdout and stderr are appended here
  logFile: string
}

/**
 * Everything the supervisor does to operating-system processes.
 * The orchestrator only talks to this interface so tests can swap in a fake.
 */
export interface ProcessControl {
  // Launches a process detached from the supervisor and resolves with its pid
  spawn(request: SpawnRequest): Promise<number>
  // Signal-0 probe; false for a pid that does not exist
  isAlive(pid: number): boolean
  // Sends `signal` to the process (group when possible); a missing process is not an error
  terminate(pid: number, signal: NodeJS.Signals): void
  // Sends `signal` to this one pid, never its group
  kill(pid: number, signal: NodeJS.Signals): void
}

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code
  }
  return undefined
}

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0)
    return true
  } catch (err) {
    // EPERM: the process exists but belongs to someone else
    return errorCode(err) === "EPERM"
  }
}

function signalProcess(pid: number, signal: NodeJS.Signals): void {
  if (process.platform === "win32") {
    // Windows: use taskkill to kill process tree
    spawn("taskkill", ["/PID", String(pid), "/T", "/F"], { stdio: "ignore" })
    return
  }

  // Detached children lead their own process group; signalling the group
  // also reaches reloader workers.
  try {
    process.kill(-pid, signal)
    return
  } catch {
    // not a group leader, fall through to the pid itself
  }

  signalPid(pid, signal)
}

function signalPid(pid: number, signal: NodeJS.Signals): void {
  try {
    process.kill(pid, signal)
  } catch (err) {
    if (errorCode(err) !== "ESRCH") throw err
  }
}

export const nodeProcessControl: ProcessControl = {
  async spawn(request) {
    const log = await fs.open(request.logFile, "a")

    try {
      const child = spawn(request.command, request.args, {
        cwd: request.cwd,
        env: request.env,
        detached: true,
        stdio: ["ignore", log.fd, log.fd],
        windowsHide: true,
      })

      // Rejects with the spawn error (e.g. ENOENT) instead of a late "error" event
      await once(child, "spawn")
      invariant(child.pid, `No pid for spawned ${request.command}`)

      child.unref()
      return child.pid
    } finally {
      await log.close()
    }
  },

  isAlive: isProcessAlive,

  terminate: signalProcess,

  kill: signalPid,
}

export interface TerminateOptions {
  timeoutMs: number
  pollMs?: number
  sleep?: Sleep
}

// SIGTERM, wait for the process to go away, then SIGKILL.
// Resolves true when the process exited on its own.
export async function terminateGracefully(
  control: ProcessControl,
  pid: number,
  opts: TerminateOptions,
): Promise<boolean> {
  const wait = opts.sleep ?? realSleep
  const pollMs = opts.pollMs ?? 200

  control.terminate(pid, "SIGTERM")

  let waited = 0
  while (waited < opts.timeoutMs) {
    if (!control.isAlive(pid)) {
      return true
    }
    await wait(pollMs)
    waited += pollMs
  }

  if (!control.isAlive(pid)) {
    return true
  }

  consola.warn(`Process ${pid} did not exit within ${opts.timeoutMs}ms; forcing termination`)
  control.terminate(pid, "SIGKILL")
  return false
}
