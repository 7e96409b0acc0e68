import type { HealthStatus } from "../daemon/types"

export interface HealthProberOptions {
  host?: string
  healthPath: string
  docsPath: string
  fetch?: typeof fetch
}

export interface HealthCheck {
  status: HealthStatus
  // Response body of a successful probe
  body?: string
}

/**
 * Talks to a service's own HTTP endpoints. Refused connections, timeouts and
 * non-2xx answers all fold into "unreachable".
 */
export class HealthProber {
  private readonly host: string
  private readonly fetch: typeof fetch

  constructor(private readonly opts: HealthProberOptions) {
    this.host = opts.host ?? "127.0.0.1"
    this.fetch = opts.fetch ?? globalThis.fetch
  }

  private url(port: number, pathname: string): string {
    return `http://${this.host}:${port}${pathname}`
  }

  async check(port: number, timeoutMs: number): Promise<HealthCheck> {
    try {
      const response = await this.fetch(this.url(port, this.opts.healthPath), {
        signal: AbortSignal.timeout(timeoutMs),
      })
      if (!response.ok) {
        await response.body?.cancel()
        return { status: "unreachable" }
      }
      return { status: "healthy", body: await response.text() }
    } catch {
      return { status: "unreachable" }
    }
  }

  async probe(port: number, timeoutMs: number): Promise<HealthStatus> {
    return (await this.check(port, timeoutMs)).status
  }

  // HTTP status of the docs page, or null when nothing answered
  async docsStatus(port: number, timeoutMs: number): Promise<number | null> {
    try {
      const response = await this.fetch(this.url(port, this.opts.docsPath), {
        signal: AbortSignal.timeout(timeoutMs),
      })
      await response.body?.cancel()
      return response.status
    } catch {
      return null
    }
  }
}
