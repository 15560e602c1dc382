/**
 * Machine authentication
 *
 * A MachineIdentity is the wallet's first BIP-44 key. The account service
 * knows a machine by its compressed public key and checks request
 * signatures made with the matching private key.
 */

import type { Address, Hex } from "viem"
import { privateKeyToAccount, type PrivateKeyAccount } from "viem/accounts"
import { CliError, CliErrorType } from "./errors.js"
import { deriveKey, readWalletFile, walletFileExists } from "../utils/wallet.js"
import { debug } from "../utils/debug.js"
import type { LoginContext, MachineIdentity } from "../types/account.js"

export class MachineAuthWallet implements MachineIdentity {
  private account: PrivateKeyAccount
  private publicKey: Uint8Array

  constructor(seedPhrase: string) {
    const key = deriveKey(seedPhrase, 0)
    this.account = privateKeyToAccount(key.privateKey)
    this.publicKey = key.publicKey
  }

  get address(): Address {
    return this.account.address
  }

  publicKeyFingerprint(): Uint8Array {
    return Uint8Array.from(this.publicKey)
  }

  signMessage(message: string): Promise<Hex> {
    return this.account.signMessage({ message })
  }
}

export function encodePublicKey(identity: MachineIdentity): string {
  return Buffer.from(identity.publicKeyFingerprint()).toString("base64")
}

export type MachineAuthResolution =
  | { status: "resolved"; identity: MachineIdentity }
  | { status: "wallet-missing" }

/**
 * Find the identity for this invocation: the one already on the context, or
 * the one in the wallet file. A missing wallet file is reported, not thrown;
 * the caller decides to run account setup.
 */
export function resolveMachineAuth(ctx: LoginContext): MachineAuthResolution {
  if (ctx.machineAuth) {
    return { status: "resolved", identity: ctx.machineAuth }
  }

  if (!walletFileExists(ctx.walletPath)) {
    debug("machine-auth", `no wallet at ${ctx.walletPath}`)
    return { status: "wallet-missing" }
  }

  let identity: MachineIdentity
  try {
    identity = new MachineAuthWallet(readWalletFile(ctx.walletPath).seedPhrase)
  } catch (error) {
    throw new CliError(CliErrorType.WALLET_INVALID, {
      originalError: error instanceof Error ? error : undefined,
      context: { walletPath: ctx.walletPath },
    })
  }

  debug("machine-auth", `loaded wallet ${identity.address}`)
  ctx.machineAuth = identity
  return { status: "resolved", identity }
}
