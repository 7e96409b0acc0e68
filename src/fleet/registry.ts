import { UnknownServiceError } from "../lib/error"
import type { ServiceSpec } from "../daemon/types"

/**
 * Ordered, immutable table of the services a fleet is made of.
 *
 * Order is the start/stop sequence and the order of every rendered report.
 */
export class FleetRegistry {
  private readonly services: ReadonlyArray<ServiceSpec>
  private readonly byName: ReadonlyMap<string, ServiceSpec>

  constructor(services: ReadonlyArray<ServiceSpec>) {
    const byName = new Map<string, ServiceSpec>()
    const ports = new Set<number>()

    for (const service of services) {
      if (byName.has(service.name)) {
        throw new Error(`Duplicate service name in fleet: ${service.name}`)
      }
      if (ports.has(service.port)) {
        throw new Error(`Duplicate port in fleet: ${service.port} (${service.name})`)
      }
      if (!Number.isInteger(service.port) || service.port < 1 || service.port > 65535) {
        throw new Error(`Invalid port for ${service.name}: ${service.port}`)
      }
      byName.set(service.name, Object.freeze({ ...service }))
      ports.add(service.port)
    }

    this.byName = byName
    this.services = Object.freeze([...byName.values()])
  }

  list(): ReadonlyArray<ServiceSpec> {
    return this.services
  }

  names(): Array<string> {
    return this.services.map((service) => service.name)
  }

  get(name: string): ServiceSpec {
    const service = this.byName.get(name)
    if (!service) {
      throw new UnknownServiceError(name, this.names())
    }
    return service
  }

  has(name: string): boolean {
    return this.byName.has(name)
  }
}
