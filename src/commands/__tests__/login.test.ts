import * as fs from "fs"
import chalk from "chalk"
import {
  createLoginContext,
  LOGIN_MESSAGES,
  loginCommand,
  loginWithPassword,
  setPassword,
  switchUser,
} from "../login.js"
import { CliError, CliErrorType, ProviderUnavailableError, UnauthenticatedError } from "../../lib/errors.js"
import { RESOLVER_MESSAGES } from "../../lib/identity-resolver.js"
import { SETUP_MESSAGES } from "../../lib/account-setup.js"
import { ConfigStore } from "../../utils/config.js"
import {
  CANCEL,
  cleanup,
  createTestContext,
  createTmpDir,
  FakeAccountClient,
  FAKE_PUBKEY_B64,
  readConfigFile,
  ScriptedPrompter,
} from "../../__tests__/fakes.js"

describe("login command", () => {
  let dir: string
  let logSpy: jest.SpyInstance

  beforeAll(() => {
    chalk.level = 0
  })

  beforeEach(() => {
    dir = createTmpDir("login-test")
    logSpy = jest.spyOn(console, "log").mockImplementation()
  })

  afterEach(() => {
    logSpy.mockRestore()
    cleanup(dir)
  })

  function logged(): string[] {
    return logSpy.mock.calls.map((call) => String(call[0]))
  }

  describe("createLoginContext", () => {
    it("reads the active username from the config file", () => {
      const store = new ConfigStore({ cwd: dir })
      store.apply(store.load(), { username: "alice", mining_auth_pubkey: FAKE_PUBKEY_B64 })

      const ctx = createLoginContext({ store, prompter: new ScriptedPrompter(), walletPath: `${dir}/wallet.json` })

      expect(ctx.username).toBe("alice")
      expect(ctx.machineAuth).toBeNull()
    })

    it("leaves the username null when no session is stored", () => {
      const ctx = createLoginContext({ store: new ConfigStore({ cwd: dir }), prompter: new ScriptedPrompter() })
      expect(ctx.username).toBeNull()
    })
  })

  describe("setPassword", () => {
    it("stops before any network call when no account is bound", async () => {
      const ctx = createTestContext(dir)

      const result = await setPassword(ctx)

      expect(result).toBe("no-account")
      expect(ctx.client.calls).toEqual([])
      expect(logged()).toEqual([LOGIN_MESSAGES.noAccount])
    })

    it("updates the password after a confirmed entry", async () => {
      const prompter = new ScriptedPrompter(["short", "long-enough-1", "long-enough-1"])
      const ctx = createTestContext(dir, { prompter })
      ctx.username = "alice"

      const result = await setPassword(ctx)

      expect(result).toBe("updated")
      expect(ctx.client.calls).toEqual(["updatePassword:long-enough-1"])
      expect(logged()).toEqual([LOGIN_MESSAGES.passwordTooShort])
    })

    it("asks again when the confirmation does not match", async () => {
      const prompter = new ScriptedPrompter(["long-enough-1", "long-enough-2", "long-enough-3", "long-enough-3"])
      const ctx = createTestContext(dir, { prompter })
      ctx.username = "alice"

      await setPassword(ctx)

      expect(logged()).toEqual([LOGIN_MESSAGES.passwordMismatch])
      expect(ctx.client.calls).toEqual(["updatePassword:long-enough-3"])
    })

    it("treats a cancelled prompt as a silent no-op", async () => {
      const ctx = createTestContext(dir, { prompter: new ScriptedPrompter([CANCEL]) })
      ctx.username = "alice"

      const result = await setPassword(ctx)

      expect(result).toBe("cancelled")
      expect(ctx.client.calls).toEqual([])
      expect(logged()).toEqual([])
      expect(fs.existsSync(ctx.store.path)).toBe(false)
    })

    it("maps service failures to a user-facing error", async () => {
      const client = new FakeAccountClient()
      client.failWith = new ProviderUnavailableError("down")
      const ctx = createTestContext(dir, { client, prompter: new ScriptedPrompter(["long-enough-1", "long-enough-1"]) })
      ctx.username = "alice"

      await expect(setPassword(ctx)).rejects.toMatchObject({ type: CliErrorType.CONNECTION })
    })
  })

  describe("switchUser", () => {
    it("binds an explicitly requested account without prompting", async () => {
      const client = new FakeAccountClient(["alice", "bob", "carol"])
      const ctx = createTestContext(dir, { client })

      await switchUser(ctx, "bob")

      expect(ctx.prompter.asked).toEqual([])
      expect(ctx.username).toBe("bob")
      expect(readConfigFile(dir)).toEqual({ username: "bob", mining_auth_pubkey: FAKE_PUBKEY_B64 })
    })

    it("announces the current user before switching", async () => {
      const ctx = createTestContext(dir, { client: new FakeAccountClient(["alice", "bob"]) })
      ctx.username = "alice"

      await switchUser(ctx, "bob")

      expect(logged()[0]).toBe(LOGIN_MESSAGES.currentUser("alice"))
    })

    it("does not touch the config for an unknown account", async () => {
      const ctx = createTestContext(dir, { client: new FakeAccountClient(["alice"]) })

      await switchUser(ctx, "mallory")

      expect(fs.existsSync(ctx.store.path)).toBe(false)
      expect(ctx.username).toBeNull()
    })

    it("keeps the previous session when the unknown account is requested", async () => {
      const ctx = createTestContext(dir, { client: new FakeAccountClient(["alice"]) })
      await switchUser(ctx, "alice")

      await switchUser(ctx, "mallory")

      expect(readConfigFile(dir)).toEqual({ username: "alice", mining_auth_pubkey: FAKE_PUBKEY_B64 })
    })

    it("binds the account picked from the list", async () => {
      const prompter = new ScriptedPrompter(["5", "1"])
      const ctx = createTestContext(dir, { client: new FakeAccountClient(["alice", "bob"]), prompter })

      await switchUser(ctx, null)

      expect(readConfigFile(dir)).toEqual({ username: "alice", mining_auth_pubkey: FAKE_PUBKEY_B64 })
      expect(logged().filter((line) => line === RESOLVER_MESSAGES.invalidIndex(2))).toHaveLength(1)
    })

    it("writes nothing when the selection is cancelled", async () => {
      const prompter = new ScriptedPrompter([CANCEL])
      const ctx = createTestContext(dir, { client: new FakeAccountClient(["alice", "bob"]), prompter })

      await switchUser(ctx, null)

      expect(fs.existsSync(ctx.store.path)).toBe(false)
    })

    it("runs account creation when the wallet has no accounts", async () => {
      const prompter = new ScriptedPrompter([CANCEL])
      const ctx = createTestContext(dir, { client: new FakeAccountClient([]), prompter })

      await expect(switchUser(ctx, null)).rejects.toBeInstanceOf(UnauthenticatedError)

      expect(ctx.client.calls).toEqual(["accountInfo"])
      expect(prompter.asked).toEqual([SETUP_MESSAGES.usernamePrompt])
      expect(fs.existsSync(ctx.store.path)).toBe(false)
    })

    it("runs account creation before any client call when the wallet file is missing", async () => {
      const prompter = new ScriptedPrompter([false])
      const ctx = createTestContext(dir, { identity: null, client: new FakeAccountClient(["alice"]), prompter })

      await expect(switchUser(ctx, null)).rejects.toBeInstanceOf(UnauthenticatedError)

      expect(prompter.asked).toEqual([SETUP_MESSAGES.confirmWallet])
      expect(ctx.client.calls).toEqual([])
    })

    it("renders provider failures as a connection error", async () => {
      const client = new FakeAccountClient(["alice"])
      client.failWith = new ProviderUnavailableError("down")
      const ctx = createTestContext(dir, { client })

      const error = await switchUser(ctx, null).catch((e: unknown) => e)

      expect(error).toBeInstanceOf(CliError)
      expect(error).toMatchObject({ type: CliErrorType.CONNECTION })
    })
  })

  describe("loginWithPassword", () => {
    it("logs in with the given credentials without prompting", async () => {
      const ctx = createTestContext(dir)

      await loginWithPassword(ctx, "alice", "correct-horse")

      expect(ctx.prompter.asked).toEqual([])
      expect(ctx.client.calls).toEqual(["login:alice"])
      expect(readConfigFile(dir)).toEqual({ username: "alice", mining_auth_pubkey: FAKE_PUBKEY_B64 })
    })

    it("prompts for missing credentials", async () => {
      const prompter = new ScriptedPrompter([" alice ", "correct-horse"])
      const ctx = createTestContext(dir, { prompter })

      await loginWithPassword(ctx)

      expect(prompter.asked).toEqual([LOGIN_MESSAGES.usernamePrompt, LOGIN_MESSAGES.passwordPrompt])
      expect(ctx.username).toBe("alice")
    })

    it("asks again when the username is blank", async () => {
      const prompter = new ScriptedPrompter(["   ", "", "alice", "correct-horse"])
      const ctx = createTestContext(dir, { prompter })

      await loginWithPassword(ctx)

      expect(logged().filter((line) => line === LOGIN_MESSAGES.emptyUsername)).toHaveLength(2)
      expect(ctx.client.calls).toEqual(["login:alice"])
      expect(readConfigFile(dir)).toEqual({ username: "alice", mining_auth_pubkey: FAKE_PUBKEY_B64 })
    })

    it("prompts for the username when the given one is blank", async () => {
      const prompter = new ScriptedPrompter(["bob"])
      const ctx = createTestContext(dir, { prompter })

      await loginWithPassword(ctx, "  ", "correct-horse")

      expect(prompter.asked).toEqual([LOGIN_MESSAGES.usernamePrompt])
      expect(ctx.client.calls).toEqual(["login:bob"])
    })

    it("rejects wrong credentials and leaves the config alone", async () => {
      const ctx = createTestContext(dir)

      await expect(loginWithPassword(ctx, "alice", "wrong")).rejects.toMatchObject({
        type: CliErrorType.INVALID_CREDENTIALS,
      })
      expect(fs.existsSync(ctx.store.path)).toBe(false)
    })

    it("does nothing when a prompt is cancelled", async () => {
      const ctx = createTestContext(dir, { prompter: new ScriptedPrompter(["alice", CANCEL]) })

      await loginWithPassword(ctx)

      expect(ctx.client.calls).toEqual([])
      expect(fs.existsSync(ctx.store.path)).toBe(false)
    })
  })

  describe("loginCommand", () => {
    it("routes --set-password to the password flow", async () => {
      const ctx = createTestContext(dir)

      await loginCommand({ setPassword: true }, ctx)

      expect(logged()).toEqual([LOGIN_MESSAGES.noAccount])
    })

    it("routes --switch-user <name> to explicit selection", async () => {
      const ctx = createTestContext(dir, { client: new FakeAccountClient(["alice", "bob"]) })

      await loginCommand({ switchUser: "bob" }, ctx)

      expect(ctx.username).toBe("bob")
    })

    it("routes --accounts to interactive selection", async () => {
      const prompter = new ScriptedPrompter(["2"])
      const ctx = createTestContext(dir, { client: new FakeAccountClient(["alice", "bob"]), prompter })

      await loginCommand({ accounts: true }, ctx)

      expect(prompter.asked).toEqual([RESOLVER_MESSAGES.prompt])
      expect(ctx.username).toBe("bob")
    })

    it("falls back to password login", async () => {
      const ctx = createTestContext(dir)

      await loginCommand({ username: "alice", password: "correct-horse" }, ctx)

      expect(ctx.client.calls).toEqual(["login:alice"])
    })
  })
})
