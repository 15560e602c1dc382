#!/usr/bin/env node
/**
 * tally CLI
 *
 * Logs this machine in to a tally account. The machine proves who it is with
 * a locally stored wallet key; no password is kept on disk.
 */

import { Command, Option } from "commander"
import chalk from "chalk"
import { readFileSync } from "fs"
import { join } from "path"
import { loginCommand, type LoginOptions } from "./commands/login.js"
import { CliError, UnauthenticatedError, formatError } from "./lib/errors.js"

function readVersion(): string {
  try {
    const pkg: unknown = JSON.parse(readFileSync(join(__dirname, "..", "package.json"), "utf-8"))
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version
    }
  } catch {
    // running from an unusual layout; fall through
  }
  return "0.0.0"
}

/**
 * Render an error and pick the exit code. The only place the process exits.
 */
export function handleFatal(error: unknown): number {
  if (error instanceof UnauthenticatedError) {
    return error.exitCode
  }

  if (error instanceof CliError) {
    console.error(chalk.red(error.message))
    for (const suggestion of error.getSuggestions()) {
      console.error(chalk.gray(`  • ${suggestion}`))
    }
    if (process.env.DEBUG && error.originalError) {
      console.error(chalk.gray(error.originalError.stack ?? error.originalError.message))
    }
    return 1
  }

  console.error(chalk.red(`Unexpected error: ${formatError(error)}`))
  return 1
}

export function buildProgram(): Command {
  const program = new Command()

  program
    .name("tally")
    .description("Log in to your tally accounts with this machine's wallet")
    .version(readVersion())

  program
    .command("login")
    .description("Log in to your different tally accounts")
    .option("-a, --accounts", "Show the accounts registered to this machine and pick one")
    .option("-s, --switch-user [username]", "Switch the active user")
    .addOption(
      new Option("-P, --set-password", "Set or update the password of the active user").conflicts([
        "accounts",
        "switchUser",
      ])
    )
    .option("-u, --username <username>", "The username to log in with")
    .option("-p, --password <password>", "The password to log in with")
    .action(async (options: LoginOptions) => {
      await loginCommand(options)
    })

  return program
}

if (require.main === module) {
  buildProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      process.exit(handleFatal(error))
    })
}
