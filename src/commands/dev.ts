import { defineCommand } from "citty"
import consola from "consola"

import { MissingServiceError } from "../lib/error"
import { describeOutcome } from "../lib/report"

import { fleetArgs, optionalArg, runFleetCommand } from "./shared"

export const dev = defineCommand({
  meta: {
    name: "dev",
    description: "Start one service in development mode (auto-reload)",
  },
  args: {
    ...fleetArgs,
    service: {
      type: "positional",
      required: false,
      description: "Service to run in development mode",
    },
  },
  run({ args }) {
    return runFleetCommand(
      args,
      async (ctx, signal) => {
        const name = optionalArg(args.service)
        if (name === undefined) {
          throw new MissingServiceError("dev", ctx.orchestrator.registry.names())
        }

        consola.start(`Starting ${name} in development mode`)
        const result = await ctx.orchestrator.dev(name, signal)
        consola.info(`${result.service.name}: ${describeOutcome(result)}`)
      },
      { guarded: true },
    )
  },
})
