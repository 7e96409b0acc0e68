import type { ArgsDef } from "citty"
import consola from "consola"

import { InterruptGuard } from "../daemon/interrupt-guard"
import type { Orchestrator } from "../fleet/orchestrator"
import { loadFleet, type FleetContext } from "../fleet/setup"
import { DEFAULT_CONFIG_FILE } from "../lib/config"
import { DEFAULT_ENVIRONMENT } from "../lib/environment"
import { reportCommandError } from "../lib/error"
import { formatStatus } from "../lib/report"

export const fleetArgs = {
  env: {
    alias: "e",
    type: "string",
    default: DEFAULT_ENVIRONMENT,
    description: "Environment (development/dev, test, staging/stag, production/prod)",
  },
  config: {
    alias: "c",
    type: "string",
    default: DEFAULT_CONFIG_FILE,
    description: "Path to the fleet config file",
  },
  verbose: {
    alias: "v",
    type: "boolean",
    default: false,
    description: "Enable verbose logging",
  },
} as const satisfies ArgsDef

export interface FleetArgs {
  env: string
  config: string
  verbose: boolean
}

// citty hands missing positionals through as undefined or ""
export function optionalArg(value: string | undefined): string | undefined {
  return value ? value : undefined
}

export interface CommandRunOptions {
  // Stop the whole fleet if the operator interrupts the command
  guarded?: boolean
  // Passed to the interrupt guard; tests turn it off
  exitOnInterrupt?: boolean
}

export type FleetTask<C> = (ctx: C, signal: AbortSignal) => Promise<void>

interface StoppableFleet {
  orchestrator: Pick<Orchestrator, "stopFleet">
}

// An interrupt aborts the guarded command, then stops every service
export function guardFleet(
  ctx: StoppableFleet,
  opts: Pick<CommandRunOptions, "exitOnInterrupt"> = {},
): InterruptGuard {
  return new InterruptGuard({
    onInterrupt: () => ctx.orchestrator.stopFleet(),
    exitOnInterrupt: opts.exitOnInterrupt,
  })
}

export async function runFleetTask<C extends StoppableFleet>(
  ctx: C,
  task: FleetTask<C>,
  opts: CommandRunOptions = {},
): Promise<void> {
  if (!opts.guarded) {
    await task(ctx, new AbortController().signal)
    return
  }
  await guardFleet(ctx, opts).run((signal) => task(ctx, signal))
}

export async function runFleetCommand(
  args: FleetArgs,
  task: FleetTask<FleetContext>,
  opts: CommandRunOptions = {},
): Promise<void> {
  try {
    const ctx = await loadFleet({
      configFile: args.config,
      env: args.env,
      verbose: args.verbose,
    })
    await runFleetTask(ctx, task, opts)
  } catch (error) {
    process.exitCode = reportCommandError(error)
  }
}

export async function printStatus(ctx: FleetContext): Promise<void> {
  consola.start("Service status")
  const report = await ctx.orchestrator.status()
  for (const line of formatStatus(report)) {
    consola.log(line)
  }
}
