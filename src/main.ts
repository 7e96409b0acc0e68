#!/usr/bin/env node

import { defineCommand, runMain, showUsage } from "citty"

import { dev } from "./commands/dev"
import { logs } from "./commands/logs"
import { restart } from "./commands/restart"
import { start } from "./commands/start"
import { status } from "./commands/status"
import { stop } from "./commands/stop"
import { test } from "./commands/test"

const commands = { start, stop, restart, dev, status, logs, test }

const help = defineCommand({
  meta: {
    name: "help",
    description: "Show this help message",
  },
  async run(): Promise<void> {
    await showUsage(main)
  },
})

const main = defineCommand({
  meta: {
    name: "fleet",
    description: "Start, stop and inspect a local fleet of services",
  },
  subCommands: { ...commands, help },
})

void runMain(main)
