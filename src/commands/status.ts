import { defineCommand } from "citty"

import { fleetArgs, printStatus, runFleetCommand } from "./shared"

export const status = defineCommand({
  meta: {
    name: "status",
    description: "Show health and registry status of every service",
  },
  args: fleetArgs,
  run({ args }) {
    return runFleetCommand(args, printStatus)
  },
})
