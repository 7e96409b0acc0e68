import consola from "consola"

export class RegistryUnreachableError extends Error {
  constructor(
    readonly url: string,
    options?: { cause?: unknown },
  ) {
    super(`Cannot connect to service registry at ${url}`, options)
    this.name = "RegistryUnreachableError"
  }
}

/**
 * Read side of the discovery registry. `listServices` throws
 * RegistryUnreachableError when the registry cannot be queried at all.
 */
export interface RegistryClient {
  listServices(timeoutMs: number): Promise<Array<string>>
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

// Names from a Consul-style agent listing: the keys (service ids) and each
// entry's "Service"/"ID" fields. Non-JSON bodies fall back to the raw text.
export function extractServiceNames(body: string): Array<string> {
  let parsed: unknown
  try {
    parsed = JSON.parse(body)
  } catch {
    return body.trim() ? [body] : []
  }

  if (Array.isArray(parsed)) {
    return parsed.filter((entry): entry is string => typeof entry === "string")
  }
  if (!isRecord(parsed)) {
    return []
  }

  const names = new Set<string>()
  for (const [key, entry] of Object.entries(parsed)) {
    names.add(key)
    if (isRecord(entry)) {
      for (const field of ["Service", "ID"]) {
        const value = entry[field]
        if (typeof value === "string") names.add(value)
      }
    }
  }
  return [...names]
}

export class HttpRegistryClient implements RegistryClient {
  private readonly fetch: typeof fetch

  constructor(
    readonly url: string,
    fetchImpl?: typeof fetch,
  ) {
    this.fetch = fetchImpl ?? globalThis.fetch
  }

  async listServices(timeoutMs: number): Promise<Array<string>> {
    let body: string
    try {
      const response = await this.fetch(this.url, { signal: AbortSignal.timeout(timeoutMs) })
      if (!response.ok) {
        await response.body?.cancel()
        consola.debug(`Registry answered ${response.status} for ${this.url}`)
        throw new RegistryUnreachableError(this.url)
      }
      body = await response.text()
    } catch (err) {
      if (err instanceof RegistryUnreachableError) throw err
      throw new RegistryUnreachableError(this.url, { cause: err })
    }

    return extractServiceNames(body)
  }
}
