import { parse } from "dotenv"
import fs from "node:fs/promises"
import path from "node:path"

import { ConfigError } from "./error"

export type EnvironmentName = "development" | "test" | "staging" | "production"

interface EnvironmentDefinition {
  name: EnvironmentName
  aliases: ReadonlyArray<string>
  // Relative to the fleet root
  file: string
}

export const ENVIRONMENTS: ReadonlyArray<EnvironmentDefinition> = [
  { name: "development", aliases: ["dev"], file: "deployment/dev/.env" },
  { name: "test", aliases: ["testing"], file: "deployment/test/.env.test" },
  { name: "staging", aliases: ["stag"], file: "deployment/staging/.env.staging" },
  { name: "production", aliases: ["prod"], file: "deployment/production/.env.production" },
]

export const DEFAULT_ENVIRONMENT: EnvironmentName = "development"

export interface LoadedEnvironment {
  name: EnvironmentName
  file: string
  variables: Record<string, string>
}

export function validEnvironmentNames(): Array<string> {
  return ENVIRONMENTS.map((env) => `${env.name} (${env.aliases.join(", ")})`)
}

export function resolveEnvironment(input: string): EnvironmentDefinition {
  const wanted = input.trim().toLowerCase()
  const match = ENVIRONMENTS.find(
    (env) => env.name === wanted || env.aliases.includes(wanted),
  )
  if (!match) {
    throw new ConfigError(`Invalid environment: ${input}`, validEnvironmentNames())
  }
  return match
}

// Resolves the environment name and reads its dotenv file. ENV is always set
// to the canonical name so services pick the matching configuration.
export async function loadEnvironment(
  root: string,
  input: string,
): Promise<LoadedEnvironment> {
  const definition = resolveEnvironment(input)
  const file = path.join(root, definition.file)

  let content: string
  try {
    content = await fs.readFile(file, "utf8")
  } catch {
    throw new ConfigError(`Environment config file not found: ${file}`)
  }

  return {
    name: definition.name,
    file,
    variables: { ...parse(content), ENV: definition.name },
  }
}

export function registryUrlFrom(
  configured: string | undefined,
  variables: Record<string, string>,
  processEnv: NodeJS.ProcessEnv = process.env,
): string {
  if (configured) return configured
  const host = variables.CONSUL_HOST ?? processEnv.CONSUL_HOST ?? "localhost"
  const port = variables.CONSUL_PORT ?? processEnv.CONSUL_PORT ?? "8500"
  return `http://${host}:${port}/v1/agent/services`
}
