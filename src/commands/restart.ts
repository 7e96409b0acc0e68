import { defineCommand } from "citty"
import consola from "consola"

import { formatSummary } from "../lib/report"

import { fleetArgs, optionalArg, runFleetCommand } from "./shared"

export const restart = defineCommand({
  meta: {
    name: "restart",
    description: "Restart all services, or a single one",
  },
  args: {
    ...fleetArgs,
    service: {
      type: "positional",
      required: false,
      description: "Service to restart (defaults to the whole fleet)",
    },
  },
  run({ args }) {
    const name = optionalArg(args.service)
    return runFleetCommand(
      args,
      async (ctx, signal) => {
        consola.start(name ? `Restarting ${name}` : "Restarting all services")
        const summary = await ctx.orchestrator.restart(name, signal)
        consola.box(formatSummary(summary).join("\n"))
      },
      { guarded: true },
    )
  },
})
