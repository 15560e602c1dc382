/**
 * Username resolution for a machine identity
 *
 * The account service reports every username bound to the machine key. One
 * of them becomes the active username: the one asked for by name, the only
 * one there is, or the one the user picks from a numbered list.
 */

import chalk from "chalk"
import type { Prompter } from "../ui/prompts.js"
import type { AccountClient } from "../types/account.js"

export type Resolution =
  | { status: "resolved"; username: string }
  | { status: "unknown-user"; username: string }
  | { status: "account-created" }
  | { status: "cancelled" }

export interface ResolverDeps {
  prompter: Prompter
  /** Runs first-time account setup; called when no username is bound yet */
  createAccount: () => Promise<void>
}

export const RESOLVER_MESSAGES = {
  title: "Your registered usernames:",
  prompt: "Select the number of the account to log in with",
  invalidIndex: (max: number) => `Please enter a number between 1 and ${max}.`,
  unknownUser: (username: string) => `User "${username}" does not exist.`,
}

/**
 * Parse a 1-based selection. Only plain base-10 integers in [1, max] pass.
 */
export function parseSelection(input: string, max: number): number | null {
  const trimmed = input.trim()
  if (!/^[0-9]+$/.test(trimmed)) return null

  const index = Number.parseInt(trimmed, 10)
  if (index < 1 || index > max) return null
  return index
}

async function selectInteractively(usernames: string[], prompter: Prompter): Promise<Resolution> {
  console.log(chalk.bold(RESOLVER_MESSAGES.title))
  usernames.forEach((name, i) => {
    console.log(`${i + 1}- ${name}`)
  })

  for (;;) {
    const answer = await prompter.text({ message: RESOLVER_MESSAGES.prompt })
    if (answer.status === "cancelled") {
      return { status: "cancelled" }
    }

    const index = parseSelection(answer.value, usernames.length)
    if (index !== null) {
      return { status: "resolved", username: usernames[index - 1] }
    }

    console.log(chalk.yellow(RESOLVER_MESSAGES.invalidIndex(usernames.length)))
  }
}

export async function resolveUsername(
  client: AccountClient,
  explicitUsername: string | null,
  deps: ResolverDeps
): Promise<Resolution> {
  const { usernames } = await client.accountInfo()

  if (usernames.length === 0) {
    await deps.createAccount()
    return { status: "account-created" }
  }

  if (explicitUsername !== null) {
    if (usernames.includes(explicitUsername)) {
      return { status: "resolved", username: explicitUsername }
    }
    console.log(chalk.red(RESOLVER_MESSAGES.unknownUser(explicitUsername)))
    return { status: "unknown-user", username: explicitUsername }
  }

  if (usernames.length === 1) {
    return { status: "resolved", username: usernames[0] }
  }

  return selectInteractively(usernames, deps.prompter)
}
