import fs from "node:fs/promises"
import path from "node:path"

import type { ServiceSpec } from "../daemon/types"

import type { FleetConfig } from "./config"

export interface FleetPaths {
  CONTROL_DIR: string
  LOG_DIR: string
}

export function resolvePaths(config: Pick<FleetConfig, "root" | "controlDir" | "logDir">): FleetPaths {
  return {
    CONTROL_DIR: path.resolve(config.root, config.controlDir),
    LOG_DIR: path.resolve(config.root, config.logDir),
  }
}

export async function ensurePaths(paths: FleetPaths): Promise<void> {
  await fs.mkdir(paths.CONTROL_DIR, { recursive: true })
  await fs.mkdir(paths.LOG_DIR, { recursive: true })
}

export function logFileFor(paths: FleetPaths, service: ServiceSpec): string {
  return path.join(paths.LOG_DIR, `${service.name}.log`)
}
