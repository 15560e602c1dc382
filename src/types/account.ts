import type { Address, Hex } from "viem"
import type { ConfigStore } from "../utils/config.js"
import type { Prompter } from "../ui/prompts.js"

/**
 * Device-bound identity derived from the local wallet key
 */
export interface MachineIdentity {
  readonly address: Address
  /** Compressed secp256k1 public key (33 bytes) */
  publicKeyFingerprint(): Uint8Array
  signMessage(message: string): Promise<Hex>
}

export interface AccountInfo {
  /** Usernames bound to the machine identity, in server order */
  usernames: string[]
}

export interface AccountClient {
  accountInfo(): Promise<AccountInfo>
  createAccount(username: string): Promise<void>
  login(username: string, password: string): Promise<void>
  updatePassword(newPassword: string): Promise<void>
}

/**
 * Persisted (username, public key) pair for the logged-in account
 */
export interface ActiveSession {
  username: string
  mining_auth_pubkey: string
}

export type ClientFactory = (identity: MachineIdentity, username?: string) => AccountClient

/**
 * Everything a login flow needs for one invocation.
 * `username` and `machineAuth` stay null until known.
 */
export interface LoginContext {
  readonly store: ConfigStore
  readonly prompter: Prompter
  readonly walletPath: string
  readonly createClient: ClientFactory
  username: string | null
  machineAuth: MachineIdentity | null
}
