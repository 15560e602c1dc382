/**
 * First-time setup: create a wallet if there is none, register a username
 * for it, and make that username the active session.
 */

import chalk from "chalk"
import ora from "ora"
import { ProviderError, UnauthenticatedError, toCliError } from "./errors.js"
import { MachineAuthWallet, resolveMachineAuth } from "./machine-auth.js"
import { bindSession } from "./session.js"
import { drawBox, theme } from "../ui/theme.js"
import { generateSeedPhrase, writeWalletFile } from "../utils/wallet.js"
import type { LoginContext, MachineIdentity } from "../types/account.js"

const USERNAME_PATTERN = /^[a-z0-9][a-z0-9_-]{2,31}$/

export const SETUP_MESSAGES = {
  confirmWallet: "No wallet found on this machine. Create one now?",
  usernamePrompt: "Choose a username for your tally account",
  invalidUsername:
    "Usernames are 3-32 characters: lowercase letters, digits, '-' and '_', starting with a letter or digit.",
  usernameTaken: (username: string) => `Username "${username}" is already taken.`,
  created: (username: string) => `Account ${username} created and logged in.`,
}

export function normalizeUsername(input: string): string | null {
  const username = input.trim().toLowerCase()
  return USERNAME_PATTERN.test(username) ? username : null
}

async function createWallet(ctx: LoginContext): Promise<MachineIdentity> {
  const confirmed = await ctx.prompter.confirm({
    message: SETUP_MESSAGES.confirmWallet,
    initialValue: true,
  })
  if (confirmed.status === "cancelled" || !confirmed.value) {
    throw new UnauthenticatedError("Wallet creation declined")
  }

  const seedPhrase = generateSeedPhrase(12)
  const wallet = writeWalletFile(ctx.walletPath, seedPhrase)

  console.log()
  console.log(theme.warningBold("YOUR SEED PHRASE - WRITE THIS DOWN"))
  const words = seedPhrase.split(" ")
  const rows: string[] = []
  for (let i = 0; i < words.length; i += 3) {
    rows.push(
      words
        .slice(i, i + 3)
        .map((word, j) => `${theme.dim(String(i + j + 1).padStart(2, " ") + ".")} ${word.padEnd(10)}`)
        .join(" ")
    )
  }
  console.log(drawBox(rows))
  console.log(chalk.gray(`Wallet saved to ${ctx.walletPath}`))
  console.log(chalk.gray("Address: ") + theme.accent(wallet.address))
  console.log()

  const identity = new MachineAuthWallet(seedPhrase)
  ctx.machineAuth = identity
  return identity
}

async function registerUsername(ctx: LoginContext, identity: MachineIdentity): Promise<string> {
  const client = ctx.createClient(identity)

  for (;;) {
    const answer = await ctx.prompter.text({ message: SETUP_MESSAGES.usernamePrompt })
    if (answer.status === "cancelled") {
      throw new UnauthenticatedError("Account setup cancelled")
    }

    const username = normalizeUsername(answer.value)
    if (!username) {
      console.log(chalk.yellow(SETUP_MESSAGES.invalidUsername))
      continue
    }

    const spinner = ora(`Creating account ${username}...`).start()
    try {
      await client.createAccount(username)
      spinner.succeed(`Created ${username}`)
      return username
    } catch (error) {
      spinner.stop()
      if (error instanceof ProviderError && error.status === 409) {
        console.log(chalk.yellow(SETUP_MESSAGES.usernameTaken(username)))
        continue
      }
      throw error
    }
  }
}

async function setupAccount(ctx: LoginContext): Promise<void> {
  const resolved = resolveMachineAuth(ctx)
  const identity = resolved.status === "resolved" ? resolved.identity : await createWallet(ctx)

  const username = await registerUsername(ctx, identity)
  bindSession(ctx.store, identity, username)
  ctx.username = username

  console.log(chalk.green(SETUP_MESSAGES.created(username)))
}

/**
 * Create a wallet and account, mapping service failures to user-facing errors.
 * A user who backs out ends the command with UnauthenticatedError.
 */
export async function createWalletAndAccount(ctx: LoginContext): Promise<void> {
  try {
    await setupAccount(ctx)
  } catch (error) {
    throw toCliError(error)
  }
}
