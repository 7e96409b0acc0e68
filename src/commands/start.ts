import { defineCommand } from "citty"
import consola from "consola"

import { formatSummary } from "../lib/report"

import { fleetArgs, printStatus, runFleetCommand } from "./shared"

const TIPS = [
  "View service status:        fleet status",
  "Stop all services:          fleet stop",
  "Restart all services:       fleet restart",
  "Restart a specific service: fleet restart <service>",
  "Use another environment:    fleet start --env test",
  "Development mode:           fleet dev <service>",
  "View service logs:          fleet logs <service>",
]

export const start = defineCommand({
  meta: {
    name: "start",
    description: "Start all services (stopping any previous instances first)",
  },
  args: {
    ...fleetArgs,
    parallel: {
      type: "boolean",
      default: false,
      description: "Start services concurrently instead of one after another",
    },
  },
  run({ args }) {
    return runFleetCommand(
      args,
      async (ctx, signal) => {
        consola.start(`Starting all services (environment: ${ctx.environment.name})`)

        const summary = await ctx.orchestrator.startFleet({ parallel: args.parallel, signal })

        consola.box(formatSummary(summary).join("\n"))
        await printStatus(ctx)

        consola.info(`Tips:\n${TIPS.map((tip) => `  • ${tip}`).join("\n")}`)
      },
      { guarded: true },
    )
  },
})
