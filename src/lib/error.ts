import consola from "consola"

export class FleetError extends Error {
  // Values the operator could have used instead, printed alongside the message
  readonly validValues: Array<string>

  constructor(message: string, validValues: Array<string> = []) {
    super(message)
    this.name = new.target.name
    this.validValues = validValues
  }
}

// Unknown environment, missing config source, unreadable fleet file
export class ConfigError extends FleetError {}

export class UnknownServiceError extends FleetError {
  constructor(
    readonly serviceName: string,
    validServices: Array<string>,
  ) {
    super(`Unknown service: ${serviceName}`, validServices)
  }
}

export class MissingServiceError extends FleetError {
  constructor(command: string, validServices: Array<string>) {
    super(`Please specify a service name: fleet ${command} <service>`, validServices)
  }
}

// Reason a guarded command is aborted with once the operator interrupts it
export class InterruptedError extends FleetError {
  constructor(readonly signal: string) {
    super(`Interrupted by ${signal}`)
  }
}

// Logs the error the way the CLI surfaces it and returns the exit code to use
export function reportCommandError(error: unknown): number {
  if (error instanceof FleetError) {
    consola.error(error.message)
    if (error.validValues.length > 0) {
      consola.info(`Valid values: ${error.validValues.join(", ")}`)
    }
    return 1
  }

  consola.error("Command failed:", error)
  return 1
}
