import consola from "consola"
import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { afterEach, beforeEach, expect, test, vi } from "vitest"

import { guardFleet, runFleetCommand, runFleetTask } from "../src/commands/shared"
import { InterruptedError } from "../src/lib/error"

import { createFakeFleet } from "./helpers/fake-fleet"

const svcA = { name: "svcA", port: 9001 }
const svcB = { name: "svcB", port: 9002 }

let root: string

beforeEach(async () => {
  root = await fs.mkdtemp(path.join(os.tmpdir(), "fleet-commands-"))
  await fs.writeFile(
    path.join(root, "fleet.config.json"),
    JSON.stringify({ services: [svcA], command: ["node", "{name}.js"] }),
  )
  await fs.mkdir(path.join(root, "deployment/dev"), { recursive: true })
  await fs.writeFile(path.join(root, "deployment/dev/.env"), "")
})

afterEach(async () => {
  process.exitCode = undefined
  vi.restoreAllMocks()
  await fs.rm(root, { recursive: true, force: true })
})

function argsFor(env: string) {
  return { env, config: path.join(root, "fleet.config.json"), verbose: false }
}

test("an unknown service exits 1 and lists the valid services", async () => {
  const error = vi.spyOn(consola, "error").mockImplementation(() => {})
  const info = vi.spyOn(consola, "info").mockImplementation(() => {})
  vi.spyOn(consola, "success").mockImplementation(() => {})

  await runFleetCommand(
    argsFor("dev"),
    async (ctx, signal) => {
      await ctx.orchestrator.restart("svcZ", signal)
    },
    { guarded: true, exitOnInterrupt: false },
  )

  expect(process.exitCode).toBe(1)
  expect(error).toHaveBeenCalledWith("Unknown service: svcZ")
  expect(info).toHaveBeenCalledWith("Valid values: svcA")
})

test("an unknown environment exits 1 before the task runs", async () => {
  const error = vi.spyOn(consola, "error").mockImplementation(() => {})
  const info = vi.spyOn(consola, "info").mockImplementation(() => {})
  const task = vi.fn(async () => {})

  await runFleetCommand(argsFor("qa"), task)

  expect(process.exitCode).toBe(1)
  expect(task).not.toHaveBeenCalled()
  expect(error).toHaveBeenCalledWith("Invalid environment: qa")
  expect(info).toHaveBeenCalledWith(
    "Valid values: development (dev), test (testing), staging (stag), production (prod)",
  )
})

test("a successful command leaves the exit code alone", async () => {
  vi.spyOn(consola, "success").mockImplementation(() => {})

  await runFleetCommand(argsFor("development"), async () => {})

  expect(process.exitCode).toBeUndefined()
})

test("an interrupt mid-launch stops the fleet once the launch has settled", async () => {
  const fleet = createFakeFleet([svcA, svcB])
  const guard = guardFleet(fleet, { exitOnInterrupt: false })
  const interrupts: Array<Promise<void>> = []
  fleet.world.onSpawn = async () => {
    if (interrupts.length === 0) interrupts.push(guard.handleSignal("SIGINT"))
  }

  await expect(
    guard.run((signal) => fleet.orchestrator.startFleet({ signal })),
  ).rejects.toBeInstanceOf(InterruptedError)
  await Promise.all(interrupts)

  // svcB is never launched; svcA is stopped by the fleet stop
  expect(fleet.world.spawned.map((s) => s.pid)).toEqual([1000])
  expect([...fleet.world.alive]).toEqual([])
  expect(fleet.world.signals).toEqual([{ pid: 1000, signal: "SIGTERM" }])
  expect(fleet.tracker.tracked()).toEqual([])
  expect(fleet.registryClient.calls).toBe(0)
  expect(guard.getExitCode()).toBe(1)
})

test("an interrupt during a parallel start still stops every launched service", async () => {
  const fleet = createFakeFleet([svcA, svcB])
  const guard = guardFleet(fleet, { exitOnInterrupt: false })
  const interrupts: Array<Promise<void>> = []
  fleet.world.onSpawn = async (pid) => {
    if (pid === 1001) interrupts.push(guard.handleSignal("SIGTERM"))
  }

  await expect(
    guard.run((signal) => fleet.orchestrator.startFleet({ parallel: true, signal })),
  ).rejects.toBeInstanceOf(InterruptedError)
  await Promise.all(interrupts)

  expect(fleet.world.spawned.map((s) => s.pid)).toEqual([1000, 1001])
  expect([...fleet.world.alive]).toEqual([])
  expect(fleet.tracker.tracked()).toEqual([])
  expect(guard.getExitCode()).toBe(1)
})

test("unguarded tasks get a signal that never aborts", async () => {
  const fleet = createFakeFleet([svcA])
  const seen: Array<boolean> = []

  await runFleetTask(fleet, async (_ctx, signal) => {
    seen.push(signal.aborted)
  })

  expect(seen).toEqual([false])
})
