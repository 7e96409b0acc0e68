import consola from "consola"

import { sleep as realSleep, type Sleep } from "../daemon/bounded-retry"
import type { ProcessTracker } from "../daemon/pid"
import { terminateGracefully, type ProcessControl, type SpawnRequest } from "../daemon/process-control"
import type {
  FleetReport,
  FleetStatusEntry,
  HealthStatus,
  LaunchMode,
  LifecycleState,
  RegistrationStatus,
  ServiceResult,
  ServiceSpec,
  StartSummary,
} from "../daemon/types"
import type { FleetTiming } from "../lib/config"
import type { HealthCheck } from "../lib/health"

import type { FleetRegistry } from "./registry"

export interface PortGuardLike {
  isBound(port: number): Promise<boolean>
  reclaim(port: number): Promise<Array<number>>
}

export interface HealthProbeLike {
  probe(port: number, timeoutMs: number): Promise<HealthStatus>
  check(port: number, timeoutMs: number): Promise<HealthCheck>
  docsStatus(port: number, timeoutMs: number): Promise<number | null>
}

export interface RegistrationCheckerLike {
  check(service: ServiceSpec): Promise<RegistrationStatus>
  confirmRegistration(
    service: ServiceSpec,
    maxAttempts: number,
    intervalMs: number,
  ): Promise<RegistrationStatus>
}

export type LaunchPlanner = (service: ServiceSpec, mode: LaunchMode) => SpawnRequest

export interface OrchestratorDeps {
  registry: FleetRegistry
  tracker: ProcessTracker
  control: ProcessControl
  ports: PortGuardLike
  health: HealthProbeLike
  reconciler: RegistrationCheckerLike
  plan: LaunchPlanner
  timing: FleetTiming
  sleep?: Sleep
  onTransition?: (service: ServiceSpec, state: LifecycleState) => void
}

export interface StartOptions {
  parallel?: boolean
  // Once aborted, no further stop or launch is begun
  signal?: AbortSignal
}

export interface EndpointReport {
  service: ServiceSpec
  health: HealthCheck
  docsStatus: number | null
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

/**
 * Drives every service through stop -> port check -> launch -> health ->
 * registration. Per-service failures become outcomes in the result; only an
 * unknown service name or a failed marker write throws.
 */
export class Orchestrator {
  private readonly sleep: Sleep

  constructor(private readonly deps: OrchestratorDeps) {
    this.sleep = deps.sleep ?? realSleep
  }

  get registry(): FleetRegistry {
    return this.deps.registry
  }

  private transition(service: ServiceSpec, state: LifecycleState): void {
    consola.debug(`${service.name}: ${state}`)
    this.deps.onTransition?.(service, state)
  }

  // Stopping: terminate the tracked pid, drop the marker, then free the port
  // no matter what the marker said.
  async stopService(service: ServiceSpec): Promise<void> {
    const { tracker, control, ports, timing } = this.deps

    const pid = await tracker.lookup(service)
    if (pid !== null && tracker.isAlive(pid)) {
      await terminateGracefully(control, pid, {
        timeoutMs: timing.terminateTimeoutMs,
        sleep: this.sleep,
      })
      consola.info(`  Stopped ${service.name} (PID: ${pid})`)
    }
    // Also drops markers that hold no readable pid
    await tracker.forget(service)

    const reclaimed = await ports.reclaim(service.port)
    if (reclaimed.length > 0) {
      consola.debug(`  Freed port ${service.port} from pid(s) ${reclaimed.join(", ")}`)
    }
  }

  async stopFleet(): Promise<void> {
    consola.start("Stopping all services...")
    for (const service of this.registry.list()) {
      await this.stopService(service)
    }
    consola.success("All services stopped")
  }

  async stop(name?: string): Promise<void> {
    if (name === undefined) {
      await this.stopFleet()
      return
    }
    const service = this.registry.get(name)
    await this.stopService(service)
    consola.success(`${service.name} stopped`)
  }

  async startService(
    service: ServiceSpec,
    mode: LaunchMode = "start",
    signal?: AbortSignal,
  ): Promise<ServiceResult> {
    const { tracker, control, ports, health, reconciler, timing } = this.deps

    signal?.throwIfAborted()
    this.transition(service, "stopping")
    await this.stopService(service)

    this.transition(service, "port-check")
    if (await ports.isBound(service.port)) {
      consola.warn(`  Port ${service.port} is already in use, skipping ${service.name}`)
      this.transition(service, "failed")
      return { service, outcome: { kind: "port-conflict" } }
    }

    signal?.throwIfAborted()
    this.transition(service, "launching")
    const devNote = mode === "dev" ? ", development mode - auto-reload" : ""
    consola.info(`  Starting ${service.name} (Port: ${service.port}${devNote})...`)

    let pid: number
    try {
      pid = await control.spawn(this.deps.plan(service, mode))
    } catch (err) {
      consola.error(`  ${service.name} failed to start: ${describeError(err)}`)
      this.transition(service, "failed")
      return { service, outcome: { kind: "launch-failed", reason: describeError(err) } }
    }
    await tracker.record(service, pid)

    this.transition(service, "awaiting-health")
    await this.sleep(timing.settleMs)
    // The pid is recorded, so whoever aborted will find and stop it
    signal?.throwIfAborted()

    if (!tracker.isAlive(pid)) {
      await tracker.forget(service)
      consola.error(`  ${service.name} failed to start (PID ${pid} exited)`)
      this.transition(service, "failed")
      return { service, outcome: { kind: "launch-failed", reason: `process ${pid} exited during startup` } }
    }

    if ((await health.probe(service.port, timing.healthTimeoutMs)) !== "healthy") {
      // Left running: it may still be booting, and the fix is to read its log
      consola.warn(`  ${service.name} started but health check failed (PID: ${pid})`)
      this.transition(service, "degraded")
      return { service, outcome: { kind: "degraded", pid } }
    }

    consola.success(`  ${service.name} started successfully (PID: ${pid}${mode === "dev" ? ", development mode" : ""})`)

    this.transition(service, "awaiting-registration")
    const registration = await reconciler.confirmRegistration(
      service,
      timing.registrationAttempts,
      timing.registrationIntervalMs,
    )
    switch (registration) {
      case "registered":
        consola.success(`  ${service.name} registered with the service registry`)
        break
      case "registry-unreachable":
        consola.warn("  Cannot connect to the service registry")
        break
      case "not-registered":
        consola.warn(`  ${service.name} not registered with the service registry (timeout)`)
        break
    }

    this.transition(service, "ready")
    return { service, outcome: { kind: "ready", pid, registration } }
  }

  async startFleet(opts: StartOptions = {}): Promise<StartSummary> {
    const services = this.registry.list()
    const { signal } = opts

    let results: Array<ServiceResult>
    if (opts.parallel) {
      // Every launch settles before an abort is rethrown, so a fleet stop that
      // follows sees every recorded pid
      const settled = await Promise.allSettled(
        services.map((service) => this.startService(service, "start", signal)),
      )
      results = []
      for (const outcome of settled) {
        if (outcome.status === "rejected") throw outcome.reason
        results.push(outcome.value)
      }
    } else {
      results = []
      for (const service of services) {
        results.push(await this.startService(service, "start", signal))
      }
    }

    return this.summarize(results)
  }

  async restart(name?: string, signal?: AbortSignal): Promise<StartSummary> {
    if (name === undefined) {
      await this.stopFleet()
      await this.sleep(this.deps.timing.restartDelayMs)
      return this.startFleet({ signal })
    }

    const service = this.registry.get(name)
    await this.stopService(service)
    await this.sleep(this.deps.timing.restartDelayMs)
    return this.summarize([await this.startService(service, "start", signal)])
  }

  // Same state machine as start; the spawned runtime handles its own reloads
  async dev(name: string, signal?: AbortSignal): Promise<ServiceResult> {
    const service = this.registry.get(name)
    await this.stopService(service)
    await this.sleep(this.deps.timing.devDelayMs)
    return this.startService(service, "dev", signal)
  }

  async status(): Promise<FleetReport> {
    const { tracker, health, reconciler, timing } = this.deps
    const results: Array<FleetStatusEntry> = []

    for (const service of this.registry.list()) {
      const handle = await tracker.handle(service)
      const live = handle !== null && tracker.isAlive(handle.pid) ? handle : null
      if (handle !== null && live === null) {
        consola.warn(`Stale PID file for ${service.name} (process ${handle.pid} does not exist)`)
        await tracker.forget(service)
      } else if (handle === null && (await tracker.hasMarker(service))) {
        consola.warn(`Unreadable PID file for ${service.name}, removing it`)
        await tracker.forget(service)
      }

      const check = await health.check(service.port, timing.healthTimeoutMs)
      const registration = await reconciler.check(service)

      results.push({
        service,
        pid: live?.pid ?? null,
        startedAt: live?.startedAt ?? null,
        alive: live !== null,
        health: check.status,
        registration,
        ...(check.body === undefined ? {} : { detail: check.body }),
      })
    }

    return { results }
  }

  async testEndpoints(): Promise<Array<EndpointReport>> {
    const { health, timing } = this.deps
    const reports: Array<EndpointReport> = []
    for (const service of this.registry.list()) {
      reports.push({
        service,
        health: await health.check(service.port, timing.healthTimeoutMs),
        docsStatus: await health.docsStatus(service.port, timing.healthTimeoutMs),
      })
    }
    return reports
  }

  private summarize(results: Array<ServiceResult>): StartSummary {
    const succeeded = results.filter(
      (result) => result.outcome.kind === "ready" || result.outcome.kind === "degraded",
    ).length
    return { results, succeeded, failed: results.length - succeeded }
  }
}
