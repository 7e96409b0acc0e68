import consola from "consola"

import { retryBounded, type Sleep } from "../daemon/bounded-retry"
import type { RegistrationStatus, ServiceSpec } from "../daemon/types"

import { RegistryUnreachableError, type RegistryClient } from "./registry-client"

export interface ReconcilerOptions {
  // Per-request timeout for one listing call
  timeoutMs: number
  sleep?: Sleep
}

/**
 * Confirms that a launched service has registered itself with discovery.
 * Registration happens asynchronously after the service boots, so this polls.
 */
export class RegistryReconciler {
  constructor(
    private readonly client: RegistryClient,
    private readonly opts: ReconcilerOptions,
  ) {}

  // Registry keys may carry instance suffixes, so a substring match counts
  private async poll(service: ServiceSpec): Promise<RegistrationStatus> {
    try {
      const names = await this.client.listServices(this.opts.timeoutMs)
      return names.some((name) => name.includes(service.name))
        ? "registered"
        : "not-registered"
    } catch (err) {
      if (err instanceof RegistryUnreachableError) {
        consola.debug(err.message)
        return "registry-unreachable"
      }
      throw err
    }
  }

  // Single look at the registry, as used by `status`
  check(service: ServiceSpec): Promise<RegistrationStatus> {
    return this.poll(service)
  }

  async confirmRegistration(
    service: ServiceSpec,
    maxAttempts: number,
    intervalMs: number,
  ): Promise<RegistrationStatus> {
    const { value, attempts } = await retryBounded<RegistrationStatus>(
      async () => {
        const status = await this.poll(service)
        // Unreachable aborts right away: retrying past a dead registry is pointless
        return status === "not-registered" ? undefined : status
      },
      { maxAttempts, intervalMs, sleep: this.opts.sleep },
    )

    consola.debug(`Registration check for ${service.name} finished after ${attempts} attempt(s)`)
    return value ?? "not-registered"
  }
}
