import fs from "node:fs/promises"
import path from "node:path"

import { isProcessAlive } from "./process-control"
import type { ProcessHandle, ServiceSpec } from "./types"

/**
 * Remembers which pid runs each service across supervisor invocations.
 * A marker existing means "the supervisor believes this service is running".
 */
export interface ProcessTracker {
  record(service: ServiceSpec, pid: number): Promise<void>
  lookup(service: ServiceSpec): Promise<number | null>
  handle(service: ServiceSpec): Promise<ProcessHandle | null>
  // True when a marker exists, readable or not
  hasMarker(service: ServiceSpec): Promise<boolean>
  forget(service: ServiceSpec): Promise<void>
  isAlive(pid: number): boolean
}

type AliveCheck = (pid: number) => boolean

function parsePid(content: string): number | null {
  const pid = Number(content.trim())
  if (!Number.isInteger(pid) || pid <= 0) return null
  return pid
}

// One `<service>.pid` file per service under the control directory
export class FileProcessTracker implements ProcessTracker {
  constructor(
    readonly controlDir: string,
    private readonly alive: AliveCheck = isProcessAlive,
  ) {}

  markerPath(service: ServiceSpec): string {
    return path.join(this.controlDir, `${service.name}.pid`)
  }

  async record(service: ServiceSpec, pid: number): Promise<void> {
    const target = this.markerPath(service)
    const tmp = `${target}.${process.pid}.tmp`

    await fs.mkdir(this.controlDir, { recursive: true })

    try {
      await fs.writeFile(tmp, String(pid), { mode: 0o600 })
    } catch (err) {
      throw new Error(`Failed to write temporary PID file for ${service.name}: ${err}`)
    }

    // Atomic rename with retry logic
    let retries = 3
    while (retries > 0) {
      try {
        await fs.rename(tmp, target)
        return
      } catch (err) {
        retries--
        if (retries === 0) {
          await fs.rm(tmp, { force: true })
          throw new Error(`Failed to rename PID file for ${service.name} after 3 attempts: ${err}`)
        }
        await new Promise((r) => setTimeout(r, 50))
      }
    }
  }

  async lookup(service: ServiceSpec): Promise<number | null> {
    try {
      const content = await fs.readFile(this.markerPath(service), "utf8")
      return parsePid(content)
    } catch {
      return null
    }
  }

  async handle(service: ServiceSpec): Promise<ProcessHandle | null> {
    const marker = this.markerPath(service)
    try {
      const [content, stat] = await Promise.all([
        fs.readFile(marker, "utf8"),
        fs.stat(marker),
      ])
      const pid = parsePid(content)
      if (pid === null) return null
      return { service, pid, startedAt: stat.mtime }
    } catch {
      return null
    }
  }

  async hasMarker(service: ServiceSpec): Promise<boolean> {
    try {
      await fs.access(this.markerPath(service))
      return true
    } catch {
      return false
    }
  }

  async forget(service: ServiceSpec): Promise<void> {
    // force: already gone is fine
    await fs.rm(this.markerPath(service), { force: true })
  }

  isAlive(pid: number): boolean {
    return this.alive(pid)
  }
}

// In-memory tracker for tests and dry runs
export class MemoryProcessTracker implements ProcessTracker {
  private readonly handles = new Map<string, ProcessHandle>()

  constructor(
    private readonly alive: AliveCheck = isProcessAlive,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async record(service: ServiceSpec, pid: number): Promise<void> {
    this.handles.set(service.name, { service, pid, startedAt: this.now() })
  }

  async lookup(service: ServiceSpec): Promise<number | null> {
    return this.handles.get(service.name)?.pid ?? null
  }

  async handle(service: ServiceSpec): Promise<ProcessHandle | null> {
    return this.handles.get(service.name) ?? null
  }

  async hasMarker(service: ServiceSpec): Promise<boolean> {
    return this.handles.has(service.name)
  }

  async forget(service: ServiceSpec): Promise<void> {
    this.handles.delete(service.name)
  }

  isAlive(pid: number): boolean {
    return this.alive(pid)
  }

  tracked(): Array<ProcessHandle> {
    return [...this.handles.values()]
  }
}
