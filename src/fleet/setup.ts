import consola from "consola"

import { FileProcessTracker } from "../daemon/pid"
import { nodeProcessControl } from "../daemon/process-control"
import { expandCommand, loadFleetConfig, type FleetConfig } from "../lib/config"
import { loadEnvironment, registryUrlFrom, type LoadedEnvironment } from "../lib/environment"
import { HealthProber } from "../lib/health"
import { ensurePaths, logFileFor, resolvePaths, type FleetPaths } from "../lib/paths"
import { PortGuard } from "../lib/port-check"
import { RegistryReconciler } from "../lib/reconciler"
import { HttpRegistryClient } from "../lib/registry-client"

import { Orchestrator, type LaunchPlanner } from "./orchestrator"
import { FleetRegistry } from "./registry"

export interface FleetContext {
  config: FleetConfig
  environment: LoadedEnvironment
  paths: FleetPaths
  registryUrl: string
  orchestrator: Orchestrator
}

export interface FleetOptions {
  configFile: string
  env: string
  verbose?: boolean
}

export function createLaunchPlanner(
  config: FleetConfig,
  environment: LoadedEnvironment,
  paths: FleetPaths,
): LaunchPlanner {
  return (service, mode) => {
    const template = mode === "dev" ? (config.devCommand ?? config.command) : config.command
    return {
      ...expandCommand(template, service),
      cwd: config.root,
      env: {
        ...process.env,
        ...environment.variables,
        SERVICE_NAME: service.name,
        SERVICE_PORT: String(service.port),
      },
      logFile: logFileFor(paths, service),
    }
  }
}

export function createOrchestrator(
  config: FleetConfig,
  environment: LoadedEnvironment,
  paths: FleetPaths,
  registryUrl: string,
): Orchestrator {
  const { timing } = config
  return new Orchestrator({
    registry: new FleetRegistry(config.services),
    tracker: new FileProcessTracker(paths.CONTROL_DIR),
    control: nodeProcessControl,
    ports: new PortGuard({ releaseDelayMs: timing.reclaimDelayMs }),
    health: new HealthProber({ healthPath: config.healthPath, docsPath: config.docsPath }),
    reconciler: new RegistryReconciler(new HttpRegistryClient(registryUrl), {
      timeoutMs: timing.registryTimeoutMs,
    }),
    plan: createLaunchPlanner(config, environment, paths),
    timing,
  })
}

// Loads config and environment; nothing touches a process before both succeed
export async function loadFleet(options: FleetOptions): Promise<FleetContext> {
  if (options.verbose) {
    consola.level = 5
    consola.info("Verbose logging enabled")
  }

  const config = await loadFleetConfig(options.configFile)
  const environment = await loadEnvironment(config.root, options.env)
  const paths = resolvePaths(config)
  await ensurePaths(paths)

  const registryUrl = registryUrlFrom(config.registry.url, environment.variables)

  consola.success(`Environment config loaded: ${environment.name} (file: ${environment.file})`)
  consola.debug(`Service registry: ${registryUrl}`)

  return {
    config,
    environment,
    paths,
    registryUrl,
    orchestrator: createOrchestrator(config, environment, paths, registryUrl),
  }
}
