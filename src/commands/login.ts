import chalk from "chalk"
import ora from "ora"
import { createWalletAndAccount } from "../lib/account-setup.js"
import { RestAccountClient } from "../lib/account-client.js"
import { CliError, CliErrorType, ProviderError, toCliError } from "../lib/errors.js"
import { resolveUsername, type Resolution } from "../lib/identity-resolver.js"
import { resolveMachineAuth } from "../lib/machine-auth.js"
import { bindSession, readActiveSession } from "../lib/session.js"
import { TerminalPrompter, type Prompter } from "../ui/prompts.js"
import { ConfigStore } from "../utils/config.js"
import { TALLY_FILES, getApiUrl } from "../utils/paths.js"
import type { ClientFactory, LoginContext } from "../types/account.js"

const MIN_PASSWORD_LENGTH = 8

export const LOGIN_MESSAGES = {
  currentUser: (username: string) => `Currently logged in as: ${username}`,
  noAccount: 'No account found. Run "tally login" to create one.',
  usernamePrompt: "Username",
  emptyUsername: "Please enter a username.",
  passwordPrompt: "Password",
  newPasswordPrompt: (username: string) => `New password for ${username}`,
  confirmPasswordPrompt: "Confirm the new password",
  passwordTooShort: `Passwords must be at least ${MIN_PASSWORD_LENGTH} characters.`,
  passwordMismatch: "Passwords do not match.",
  passwordUpdated: (username: string) => `Password updated for ${username}`,
}

export interface LoginOptions {
  accounts?: boolean
  switchUser?: string | boolean
  setPassword?: boolean
  username?: string
  password?: string
}

export type SetPasswordResult = "updated" | "no-account" | "cancelled" | "account-created"

export function createLoginContext(
  overrides: Partial<Pick<LoginContext, "store" | "prompter" | "walletPath" | "createClient">> = {}
): LoginContext {
  const store = overrides.store ?? new ConfigStore()
  const createClient: ClientFactory =
    overrides.createClient ??
    ((identity, username) => new RestAccountClient({ baseUrl: getApiUrl(), identity, username }))

  return {
    store,
    prompter: overrides.prompter ?? new TerminalPrompter(),
    walletPath: overrides.walletPath ?? TALLY_FILES.defaultWallet,
    createClient,
    username: readActiveSession(store.load())?.username ?? null,
    machineAuth: null,
  }
}

async function promptNewPassword(prompter: Prompter, username: string): Promise<string | null> {
  for (;;) {
    const password = await prompter.password({ message: LOGIN_MESSAGES.newPasswordPrompt(username) })
    if (password.status === "cancelled") return null

    if (password.value.length < MIN_PASSWORD_LENGTH) {
      console.log(chalk.yellow(LOGIN_MESSAGES.passwordTooShort))
      continue
    }

    const confirmation = await prompter.password({ message: LOGIN_MESSAGES.confirmPasswordPrompt })
    if (confirmation.status === "cancelled") return null

    if (confirmation.value !== password.value) {
      console.log(chalk.yellow(LOGIN_MESSAGES.passwordMismatch))
      continue
    }

    return password.value
  }
}

/**
 * Set or change the password of the logged-in account
 */
export async function setPassword(ctx: LoginContext): Promise<SetPasswordResult> {
  const username = ctx.username
  if (!username) {
    console.log(LOGIN_MESSAGES.noAccount)
    return "no-account"
  }

  const auth = resolveMachineAuth(ctx)
  if (auth.status === "wallet-missing") {
    await createWalletAndAccount(ctx)
    return "account-created"
  }

  const password = await promptNewPassword(ctx.prompter, username)
  if (password === null) {
    return "cancelled"
  }

  const spinner = ora("Updating password...").start()
  try {
    await ctx.createClient(auth.identity, username).updatePassword(password)
    spinner.succeed(LOGIN_MESSAGES.passwordUpdated(username))
  } catch (error) {
    spinner.fail("Password update failed")
    throw toCliError(error)
  }
  return "updated"
}

/**
 * List the usernames bound to this machine and make one of them active
 */
export async function switchUser(ctx: LoginContext, requested: string | null): Promise<void> {
  if (ctx.username) {
    console.log(chalk.blue(LOGIN_MESSAGES.currentUser(ctx.username)))
  }

  const auth = resolveMachineAuth(ctx)
  if (auth.status === "wallet-missing") {
    await createWalletAndAccount(ctx)
    return
  }

  const client = ctx.createClient(auth.identity)
  let resolution: Resolution
  try {
    resolution = await resolveUsername(client, requested, {
      prompter: ctx.prompter,
      createAccount: () => createWalletAndAccount(ctx),
    })
  } catch (error) {
    throw toCliError(error)
  }

  if (resolution.status === "resolved") {
    bindSession(ctx.store, auth.identity, resolution.username)
    ctx.username = resolution.username
  }
}

/**
 * Log in with a username and password, binding the account to this machine
 */
export async function loginWithPassword(
  ctx: LoginContext,
  username?: string,
  password?: string
): Promise<void> {
  let user = username?.trim() ?? ""
  while (!user) {
    const answer = await ctx.prompter.text({ message: LOGIN_MESSAGES.usernamePrompt })
    if (answer.status === "cancelled") return
    user = answer.value.trim()
    if (!user) {
      console.log(chalk.yellow(LOGIN_MESSAGES.emptyUsername))
    }
  }

  let secret = password
  if (!secret) {
    const answer = await ctx.prompter.password({ message: LOGIN_MESSAGES.passwordPrompt })
    if (answer.status === "cancelled") return
    secret = answer.value
  }

  const auth = resolveMachineAuth(ctx)
  if (auth.status === "wallet-missing") {
    await createWalletAndAccount(ctx)
    return
  }

  const spinner = ora(`Logging in as ${user}...`).start()
  try {
    await ctx.createClient(auth.identity).login(user, secret)
    spinner.stop()
  } catch (error) {
    spinner.fail("Login failed")
    if (error instanceof ProviderError && (error.status === 401 || error.status === 403)) {
      throw new CliError(CliErrorType.INVALID_CREDENTIALS, { originalError: error })
    }
    throw toCliError(error)
  }

  bindSession(ctx.store, auth.identity, user)
  ctx.username = user
}

export async function loginCommand(options: LoginOptions = {}, ctx: LoginContext = createLoginContext()): Promise<void> {
  if (options.setPassword) {
    await setPassword(ctx)
    return
  }

  if (options.accounts || options.switchUser !== undefined) {
    const requested = typeof options.switchUser === "string" ? options.switchUser : null
    await switchUser(ctx, requested)
    return
  }

  await loginWithPassword(ctx, options.username, options.password)
}
