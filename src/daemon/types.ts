export interface ServiceSpec {
  readonly name: string
  readonly port: number
}

export interface ProcessHandle {
  service: ServiceSpec
  pid: number
  startedAt: Date
}

export type HealthStatus = "unknown" | "healthy" | "unreachable"

export type RegistrationStatus =
  | "registered"
  | "registry-unreachable"
  | "not-registered"

// Per-service states walked through by a single start attempt
export type LifecycleState =
  | "stopping"
  | "port-check"
  | "launching"
  | "awaiting-health"
  | "awaiting-registration"
  | "ready"
  | "degraded"
  | "failed"

export type LaunchMode = "start" | "dev"

export type ServiceOutcome =
  | { kind: "ready"; pid: number; registration: RegistrationStatus }
  | { kind: "degraded"; pid: number }
  | { kind: "port-conflict" }
  | { kind: "launch-failed"; reason: string }

export interface ServiceResult {
  service: ServiceSpec
  outcome: ServiceOutcome
}

export interface StartSummary {
  results: Array<ServiceResult>
  succeeded: number
  failed: number
}

export interface FleetStatusEntry {
  service: ServiceSpec
  pid: number | null
  startedAt: Date | null
  alive: boolean
  health: HealthStatus
  registration: RegistrationStatus
  // Raw health response body, present only when the probe succeeded
  detail?: string
}

export interface FleetReport {
  results: Array<FleetStatusEntry>
}
