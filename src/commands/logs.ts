import { defineCommand } from "citty"
import consola from "consola"

import { MissingServiceError } from "../lib/error"
import { followFile, readLastLines } from "../lib/log-tail"
import { logFileFor } from "../lib/paths"

import { fleetArgs, optionalArg, runFleetCommand } from "./shared"

export const logs = defineCommand({
  meta: {
    name: "logs",
    description: "Show a service's log file",
  },
  args: {
    ...fleetArgs,
    service: {
      type: "positional",
      required: false,
      description: "Service whose log to show",
    },
    lines: {
      alias: "n",
      type: "string",
      default: "50",
      description: "Number of trailing lines to print",
    },
    follow: {
      alias: "f",
      type: "boolean",
      default: false,
      description: "Keep printing new output until interrupted",
    },
  },
  run({ args }) {
    return runFleetCommand(args, async (ctx) => {
      const name = optionalArg(args.service)
      if (name === undefined) {
        throw new MissingServiceError("logs", ctx.orchestrator.registry.names())
      }

      const service = ctx.orchestrator.registry.get(name)
      const file = logFileFor(ctx.paths, service)
      const count = Number.parseInt(args.lines, 10)

      const lines = await readLastLines(file, Number.isNaN(count) ? 50 : count)
      if (lines === null) {
        consola.error(`Log file does not exist: ${file}`)
        return
      }
      for (const line of lines) {
        process.stdout.write(`${line}\n`)
      }

      if (args.follow) {
        const controller = new AbortController()
        const abort = () => controller.abort()
        process.once("SIGINT", abort)
        try {
          await followFile(file, (chunk) => process.stdout.write(chunk), {
            signal: controller.signal,
          })
        } finally {
          process.off("SIGINT", abort)
        }
      }
    })
  },
})
