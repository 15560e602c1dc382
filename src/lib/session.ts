/**
 * Active session persistence
 *
 * The session is the (username, machine public key) pair in the config file.
 * Both keys are written by one flush of a freshly loaded snapshot.
 */

import chalk from "chalk"
import { encodePublicKey } from "./machine-auth.js"
import { getString, type ConfigPatch, type ConfigSnapshot, type ConfigStore } from "../utils/config.js"
import type { ActiveSession, MachineIdentity } from "../types/account.js"

export const SESSION_KEYS = {
  username: "username",
  pubkey: "mining_auth_pubkey",
} as const

export function computeSessionPatch(identity: MachineIdentity, username: string): ConfigPatch {
  return {
    [SESSION_KEYS.username]: username,
    [SESSION_KEYS.pubkey]: encodePublicKey(identity),
  }
}

/**
 * Make `username` on this machine the active session
 */
export function bindSession(store: ConfigStore, identity: MachineIdentity, username: string): ActiveSession {
  const patch = computeSessionPatch(identity, username)

  console.log(chalk.yellow(`Logging in ${username}`))

  const snapshot = store.load()
  store.apply(snapshot, patch)

  return {
    username,
    mining_auth_pubkey: encodePublicKey(identity),
  }
}

/**
 * Read the active session, if both halves are present
 */
export function readActiveSession(snapshot: ConfigSnapshot): ActiveSession | null {
  const username = getString(snapshot, SESSION_KEYS.username)
  const pubkey = getString(snapshot, SESSION_KEYS.pubkey)
  if (!username || !pubkey) return null
  return { username, mining_auth_pubkey: pubkey }
}
