import type {
  FleetReport,
  RegistrationStatus,
  ServiceResult,
  StartSummary,
} from "../daemon/types"
import type { EndpointReport } from "../fleet/orchestrator"

const REGISTRATION_LABELS: Record<RegistrationStatus, string> = {
  "registered": "Registered",
  "registry-unreachable": "Cannot connect",
  "not-registered": "Not registered",
}

export function describeOutcome(result: ServiceResult): string {
  const { outcome } = result
  switch (outcome.kind) {
    case "ready":
      return `ready (PID ${outcome.pid}, registry: ${REGISTRATION_LABELS[outcome.registration]})`
    case "degraded":
      return `degraded (PID ${outcome.pid}, health check failed)`
    case "port-conflict":
      return `not started (port ${result.service.port} in use)`
    case "launch-failed":
      return `failed to start (${outcome.reason})`
  }
}

export function formatSummary(summary: StartSummary): Array<string> {
  const lines = [`Success: ${summary.succeeded} services`]
  if (summary.failed > 0) {
    lines.push(`Failed: ${summary.failed} services`)
  }
  for (const result of summary.results) {
    lines.push(`  ${result.service.name}: ${describeOutcome(result)}`)
  }
  return lines
}

// Health bodies are usually one JSON line; keep the status view to one line each
function oneLine(text: string): string {
  return text.replace(/\s+/g, " ").trim()
}

export function formatStatus(report: FleetReport): Array<string> {
  const lines: Array<string> = []
  for (const entry of report.results) {
    const head = entry.health === "healthy"
      ? `  ✅ ${entry.service.name}: ${oneLine(entry.detail ?? "healthy")}`
      : `  ❌ ${entry.service.name}: Not responding`
    lines.push(head)
    if (entry.pid !== null) {
      const since = entry.startedAt ? ` (since ${entry.startedAt.toISOString()})` : ""
      lines.push(`    PID: ${entry.pid}${since}`)
    }
    lines.push(`    🔗 Registry: ${REGISTRATION_LABELS[entry.registration]}`)
  }
  return lines
}

function prettyBody(body: string): string {
  try {
    return JSON.stringify(JSON.parse(body), null, 2)
  } catch {
    return body
  }
}

export function formatEndpointReport(report: EndpointReport): Array<string> {
  const health = report.health.status === "healthy"
    ? prettyBody(report.health.body ?? "")
    : "Failed"
  return [
    `Testing ${report.service.name} (Port: ${report.service.port}):`,
    `  Health check: ${health}`,
    `  API documentation: ${report.docsStatus ?? "N/A"}`,
  ]
}
