import fs from "node:fs/promises"
import path from "node:path"
import { z } from "zod"

import type { ServiceSpec } from "../daemon/types"

import { ConfigError } from "./error"

export const DEFAULT_CONFIG_FILE = "fleet.config.json"

const serviceSchema = z.object({
  name: z.string().regex(/^[\w.-]+$/, "service names may only use letters, digits, _ . -"),
  port: z.number().int().min(1).max(65535),
})

const timingSchema = z.object({
  settleMs: z.number().int().nonnegative().default(3000),
  healthTimeoutMs: z.number().int().positive().default(2000),
  registryTimeoutMs: z.number().int().positive().default(2000),
  registrationAttempts: z.number().int().positive().default(10),
  registrationIntervalMs: z.number().int().nonnegative().default(1000),
  reclaimDelayMs: z.number().int().nonnegative().default(1000),
  restartDelayMs: z.number().int().nonnegative().default(2000),
  devDelayMs: z.number().int().nonnegative().default(1000),
  terminateTimeoutMs: z.number().int().nonnegative().default(5000),
})

export const fleetConfigSchema = z
  .object({
    services: z.array(serviceSchema).min(1),
    command: z.array(z.string().min(1)).min(1),
    devCommand: z.array(z.string().min(1)).min(1).optional(),
    healthPath: z.string().startsWith("/").default("/health"),
    docsPath: z.string().startsWith("/").default("/docs"),
    registry: z.object({ url: z.string().url().optional() }).default({}),
    controlDir: z.string().min(1).default("pids"),
    logDir: z.string().min(1).default("logs"),
    timing: timingSchema.default({}),
  })
  .superRefine((config, ctx) => {
    const names = new Set<string>()
    const ports = new Set<number>()
    config.services.forEach((service, index) => {
      if (names.has(service.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["services", index, "name"],
          message: `duplicate service name ${service.name}`,
        })
      }
      if (ports.has(service.port)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["services", index, "port"],
          message: `duplicate port ${service.port}`,
        })
      }
      names.add(service.name)
      ports.add(service.port)
    })
  })

export type FleetTiming = z.infer<typeof timingSchema>

export type FleetConfig = z.infer<typeof fleetConfigSchema> & {
  // Directory the config file lives in; relative paths resolve against it
  root: string
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ")
}

export function parseFleetConfig(raw: unknown, root: string): FleetConfig {
  const result = fleetConfigSchema.safeParse(raw)
  if (!result.success) {
    throw new ConfigError(`Invalid fleet config: ${formatIssues(result.error)}`)
  }
  return { ...result.data, root }
}

export async function loadFleetConfig(file: string): Promise<FleetConfig> {
  const absolute = path.resolve(file)

  let content: string
  try {
    content = await fs.readFile(absolute, "utf8")
  } catch {
    throw new ConfigError(`Fleet config not found: ${absolute}`)
  }

  let raw: unknown
  try {
    raw = JSON.parse(content)
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err)
    throw new ConfigError(`Fleet config ${absolute} is not valid JSON: ${reason}`)
  }

  return parseFleetConfig(raw, path.dirname(absolute))
}

// Substitutes {name} and {port} in an argv template
export function expandCommand(
  template: ReadonlyArray<string>,
  service: ServiceSpec,
): { command: string; args: Array<string> } {
  const [command, ...args] = template.map((part) =>
    part.replaceAll("{name}", service.name).replaceAll("{port}", String(service.port)),
  )
  if (command === undefined) {
    throw new ConfigError(`Empty launch command for ${service.name}`)
  }
  return { command, args }
}
