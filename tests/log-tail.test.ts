import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { afterEach, beforeEach, expect, test } from "vitest"

import { followFile, readLastLines } from "../src/lib/log-tail"

let dir: string

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "fleet-logs-"))
})

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true })
})

test("last lines of a log", async () => {
  const file = path.join(dir, "svcA.log")
  await fs.writeFile(file, "one\ntwo\nthree\n")

  expect(await readLastLines(file, 2)).toEqual(["two", "three"])
  expect(await readLastLines(file, 10)).toEqual(["one", "two", "three"])
  expect(await readLastLines(file, 0)).toEqual([])
})

test("missing log reads as null", async () => {
  expect(await readLastLines(path.join(dir, "absent.log"), 5)).toBeNull()
})

test("follow streams appended output until aborted", async () => {
  const file = path.join(dir, "svcA.log")
  await fs.writeFile(file, "old\n")
  const chunks: Array<string> = []
  const controller = new AbortController()

  const following = followFile(file, (chunk) => chunks.push(chunk), {
    signal: controller.signal,
    intervalMs: 20,
  })
  await new Promise((r) => setTimeout(r, 100))

  await fs.appendFile(file, "new line\n")

  const deadline = Date.now() + 3000
  while (chunks.length === 0 && Date.now() < deadline) {
    await new Promise((r) => setTimeout(r, 20))
  }
  controller.abort()
  await following

  expect(chunks.join("")).toBe("new line\n")
})

test("follow with an already aborted signal returns at once", async () => {
  const controller = new AbortController()
  controller.abort()

  await followFile(path.join(dir, "absent.log"), () => {}, { signal: controller.signal })
})

test("follow keeps a character split across two writes intact", async () => {
  const file = path.join(dir, "svcA.log")
  await fs.writeFile(file, "")
  const chunks: Array<string> = []
  const controller = new AbortController()

  const following = followFile(file, (chunk) => chunks.push(chunk), {
    signal: controller.signal,
    intervalMs: 20,
  })
  await new Promise((r) => setTimeout(r, 100))

  const waitFor = async (done: () => boolean) => {
    const deadline = Date.now() + 3000
    while (!done() && Date.now() < deadline) {
      await new Promise((r) => setTimeout(r, 20))
    }
  }

  // "é" is 0xC3 0xA9 in UTF-8
  await fs.appendFile(file, Buffer.from([0x61, 0xc3]))
  await waitFor(() => chunks.length > 0)
  await fs.appendFile(file, Buffer.from([0xa9, 0x0a]))
  await waitFor(() => chunks.join("").endsWith("\n"))
  controller.abort()
  await following

  expect(chunks).toEqual(["a", "é\n"])
})
