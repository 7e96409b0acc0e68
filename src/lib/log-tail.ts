import fs from "node:fs/promises"
import { watchFile, unwatchFile } from "node:fs"
import { StringDecoder } from "node:string_decoder"

// Last `count` lines of a file, or null when it does not exist
export async function readLastLines(file: string, count: number): Promise<Array<string> | null> {
  let content: string
  try {
    content = await fs.readFile(file, "utf8")
  } catch {
    return null
  }

  const lines = content.split("\n")
  if (lines.at(-1) === "") lines.pop()
  return count > 0 ? lines.slice(-count) : []
}

export interface FollowOptions {
  signal: AbortSignal
  intervalMs?: number
}

// Streams bytes appended to `file` until `signal` aborts. A truncated file is
// read again from the start.
export async function followFile(
  file: string,
  onChunk: (chunk: string) => void,
  opts: FollowOptions,
): Promise<void> {
  if (opts.signal.aborted) return

  let offset = (await fs.stat(file)).size
  let reading = Promise.resolve()
  // Keeps a multi-byte character split across two reads intact
  const decoder = new StringDecoder("utf8")

  const readFrom = async (size: number) => {
    if (size < offset) offset = 0
    if (size === offset) return

    const handle = await fs.open(file, "r")
    try {
      const buffer = Buffer.alloc(size - offset)
      const { bytesRead } = await handle.read(buffer, 0, buffer.length, offset)
      offset += bytesRead
      const text = decoder.write(buffer.subarray(0, bytesRead))
      if (text !== "") onChunk(text)
    } finally {
      await handle.close()
    }
  }

  await new Promise<void>((resolve, reject) => {
    const listener = (current: { size: number }) => {
      reading = reading.then(() => readFrom(current.size)).catch((err: unknown) => {
        stop()
        reject(err)
      })
    }
    const stop = () => {
      unwatchFile(file, listener)
      opts.signal.removeEventListener("abort", onAbort)
    }
    const onAbort = () => {
      stop()
      reading.then(resolve, reject)
    }

    watchFile(file, { interval: opts.intervalMs ?? 250 }, listener)
    opts.signal.addEventListener("abort", onAbort, { once: true })
  })
}
