import net from "node:net"
import { expect, test, vi } from "vitest"

import type { ProcessControl } from "../src/daemon/process-control"
import { isPortInUse, parsePidList, PortGuard } from "../src/lib/port-check"

function listen(): Promise<net.Server> {
  return new Promise((resolve) => {
    const server = net.createServer()
    server.listen(0, "127.0.0.1", () => resolve(server))
  })
}

function portOf(server: net.Server): number {
  const address = server.address()
  if (address === null || typeof address === "string") throw new Error("not listening on TCP")
  return address.port
}

function fakeControl() {
  const control = {
    spawn: async () => 1,
    isAlive: () => true,
    terminate: vi.fn(),
    kill: vi.fn(),
  } satisfies ProcessControl
  return control
}

test("isPortInUse sees a listener and its absence", async () => {
  const server = await listen()
  const port = portOf(server)

  expect(await isPortInUse(port)).toBe(true)

  await new Promise((r) => server.close(r))
  expect(await isPortInUse(port)).toBe(false)
})

test("parsePidList reads lsof output", () => {
  expect(parsePidList("123\n456\n\n")).toEqual([123, 456])
  expect(parsePidList("")).toEqual([])
})

test("reclaim kills every owner except ourselves and waits for release", async () => {
  const control = fakeControl()
  const sleep = vi.fn(async () => {})
  const guard = new PortGuard({
    releaseDelayMs: 750,
    findOwners: async () => [process.pid, 4321, 4322],
    control,
    sleep,
  })

  expect(await guard.reclaim(9001)).toEqual([4321, 4322])
  expect(control.kill.mock.calls).toEqual([
    [4321, "SIGKILL"],
    [4322, "SIGKILL"],
  ])
  expect(control.terminate).not.toHaveBeenCalled()
  expect(sleep).toHaveBeenCalledWith(750)
})

test("reclaim with nothing listening is a no-op", async () => {
  const control = fakeControl()
  const sleep = vi.fn(async () => {})
  const guard = new PortGuard({ releaseDelayMs: 750, findOwners: async () => [], control, sleep })

  expect(await guard.reclaim(9001)).toEqual([])
  expect(control.kill).not.toHaveBeenCalled()
  expect(sleep).not.toHaveBeenCalled()
})

test("isBound uses the injected probe", async () => {
  const guard = new PortGuard({ releaseDelayMs: 0, probe: async (port) => port === 9001 })

  expect(await guard.isBound(9001)).toBe(true)
  expect(await guard.isBound(9002)).toBe(false)
})

test("default probe detects a loopback listener", async () => {
  const server = await listen()
  const guard = new PortGuard({ releaseDelayMs: 0 })

  expect(await guard.isBound(portOf(server))).toBe(true)

  await new Promise((r) => server.close(r))
})
