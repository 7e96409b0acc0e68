import consola from "consola"
import { execFile } from "node:child_process"
import net from "node:net"
import { promisify } from "node:util"

import { sleep as realSleep, type Sleep } from "../daemon/bounded-retry"
import { nodeProcessControl, type ProcessControl } from "../daemon/process-control"

const execFileAsync = promisify(execFile)

/**
 * Check if a port is already in use by attempting to connect to it
 */
export async function isPortInUse(port: number, host = "127.0.0.1"): Promise<boolean> {
  return new Promise((resolve) => {
    const socket = new net.Socket()

    const onError = () => {
      socket.destroy()
      resolve(false) // Port is not in use (connection failed)
    }

    const onConnect = () => {
      socket.destroy()
      resolve(true) // Port is in use (connection succeeded)
    }

    socket.setTimeout(1000)
    socket.once("error", onError)
    socket.once("timeout", onError)
    socket.connect(port, host, onConnect)
  })
}

export type PortOwnerLookup = (port: number) => Promise<Array<number>>

export function parsePidList(stdout: string): Array<number> {
  return stdout
    .split("\n")
    .map((line) => Number.parseInt(line.trim(), 10))
    .filter((pid) => Number.isInteger(pid) && pid > 0)
}

// Pids listening on `port`, via lsof. lsof exits 1 when nothing matches.
export const findPortOwners: PortOwnerLookup = async (port) => {
  try {
    const { stdout } = await execFileAsync("lsof", ["-ti", `tcp:${port}`, "-sTCP:LISTEN"])
    return parsePidList(stdout)
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      consola.warn(`lsof not found; cannot look up the owner of port ${port}`)
    }
    return []
  }
}

export interface PortGuardOptions {
  // How long to wait after killing an occupant so the OS releases the socket
  releaseDelayMs: number
  findOwners?: PortOwnerLookup
  probe?: (port: number) => Promise<boolean>
  control?: ProcessControl
  sleep?: Sleep
}

/**
 * Port occupancy is the source of truth for "can this service bind",
 * regardless of what the pid markers claim.
 */
export class PortGuard {
  private readonly findOwners: PortOwnerLookup
  private readonly probe: (port: number) => Promise<boolean>
  private readonly control: ProcessControl
  private readonly sleep: Sleep

  constructor(private readonly opts: PortGuardOptions) {
    this.findOwners = opts.findOwners ?? findPortOwners
    this.probe = opts.probe ?? (async (port) =>
      (await isPortInUse(port, "127.0.0.1")) || (await isPortInUse(port, "::1")))
    this.control = opts.control ?? nodeProcessControl
    this.sleep = opts.sleep ?? realSleep
  }

  isBound(port: number): Promise<boolean> {
    return this.probe(port)
  }

  // Force-kills whatever listens on `port`. Returns the pids that were signalled.
  async reclaim(port: number): Promise<Array<number>> {
    const owners = (await this.findOwners(port)).filter((pid) => pid !== process.pid)
    if (owners.length === 0) {
      return []
    }

    for (const pid of owners) {
      consola.debug(`Reclaiming port ${port} from pid ${pid}`)
      // Only the listener itself; its group may hold unrelated processes
      this.control.kill(pid, "SIGKILL")
    }

    await this.sleep(this.opts.releaseDelayMs)
    return owners
  }
}
