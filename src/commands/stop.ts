import { defineCommand } from "citty"

import { fleetArgs, optionalArg, runFleetCommand } from "./shared"

export const stop = defineCommand({
  meta: {
    name: "stop",
    description: "Stop all services, or a single one",
  },
  args: {
    ...fleetArgs,
    service: {
      type: "positional",
      required: false,
      description: "Service to stop (defaults to the whole fleet)",
    },
  },
  run({ args }) {
    return runFleetCommand(
      args,
      (ctx) => ctx.orchestrator.stop(optionalArg(args.service)),
      { guarded: true },
    )
  },
})
