import { defineCommand } from "citty"
import consola from "consola"

import { formatEndpointReport } from "../lib/report"

import { fleetArgs, runFleetCommand } from "./shared"

export const test = defineCommand({
  meta: {
    name: "test",
    description: "Call the health and docs endpoints of every service",
  },
  args: fleetArgs,
  run({ args }) {
    return runFleetCommand(args, async (ctx) => {
      consola.start("Testing all service endpoints")
      for (const report of await ctx.orchestrator.testEndpoints()) {
        consola.log(formatEndpointReport(report).join("\n"))
      }
    })
  },
})
