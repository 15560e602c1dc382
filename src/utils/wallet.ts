/**
 * Wallet utilities for tally CLI
 *
 * Local wallet generation and storage for machine authentication.
 * The seed phrase never leaves the user's machine.
 */

import { generateMnemonic, validateMnemonic, mnemonicToSeedSync } from '@scure/bip39'
import { wordlist } from '@scure/bip39/wordlists/english'
import { HDKey } from '@scure/bip32'
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs'
import { dirname } from 'path'
import type { Hex } from 'viem'
import { privateKeyToAccount } from 'viem/accounts'

const WALLET_FILE_VERSION = 1

// BIP-44 path: m/44'/60'/0'/0/index (Ethereum)
const DERIVATION_PREFIX = "m/44'/60'/0'/0"

export interface WalletFile {
  version: number
  seedPhrase: string
  address: string
  createdAt: string
}

export interface DerivedKey {
  privateKey: Hex
  /** 33-byte compressed secp256k1 point */
  publicKey: Uint8Array
  address: string
}

/**
 * Generate a BIP-39 seed phrase
 */
export function generateSeedPhrase(wordCount: 12 | 24 = 12): string {
  const strength = wordCount === 12 ? 128 : 256
  return generateMnemonic(wordlist, strength)
}

/**
 * Validate a BIP-39 seed phrase
 */
export function validateSeedPhrase(phrase: string): boolean {
  return validateMnemonic(phrase, wordlist)
}

/**
 * Derive the signing key pair from a seed phrase using BIP-32/BIP-44
 */
export function deriveKey(seedPhrase: string, index: number = 0): DerivedKey {
  if (!validateSeedPhrase(seedPhrase)) {
    throw new Error('Invalid seed phrase')
  }

  const seed = mnemonicToSeedSync(seedPhrase)
  const derived = HDKey.fromMasterSeed(seed).derive(`${DERIVATION_PREFIX}/${index}`)

  if (!derived.privateKey || !derived.publicKey) {
    throw new Error('Failed to derive key from seed phrase')
  }

  const privateKey: Hex = `0x${Buffer.from(derived.privateKey).toString('hex')}`

  return {
    privateKey,
    publicKey: derived.publicKey,
    address: privateKeyToAccount(privateKey).address,
  }
}

export function walletFileExists(walletPath: string): boolean {
  return existsSync(walletPath)
}

function isWalletFile(value: unknown): value is WalletFile {
  if (typeof value !== 'object' || value === null) return false
  return (
    'version' in value && typeof value.version === 'number' &&
    'seedPhrase' in value && typeof value.seedPhrase === 'string' &&
    'address' in value && typeof value.address === 'string' &&
    'createdAt' in value && typeof value.createdAt === 'string'
  )
}

/**
 * Read and validate the wallet file. Throws on a malformed file.
 */
export function readWalletFile(walletPath: string): WalletFile {
  const parsed: unknown = JSON.parse(readFileSync(walletPath, 'utf-8'))

  if (!isWalletFile(parsed)) {
    throw new Error(`Unrecognized wallet file format: ${walletPath}`)
  }
  if (parsed.version !== WALLET_FILE_VERSION) {
    throw new Error(`Unsupported wallet file version ${parsed.version}`)
  }
  if (!validateSeedPhrase(parsed.seedPhrase)) {
    throw new Error('Wallet file holds an invalid seed phrase')
  }

  return parsed
}

/**
 * Write a new wallet file (owner read/write only)
 */
export function writeWalletFile(walletPath: string, seedPhrase: string): WalletFile {
  const { address } = deriveKey(seedPhrase)
  const wallet: WalletFile = {
    version: WALLET_FILE_VERSION,
    seedPhrase,
    address,
    createdAt: new Date().toISOString(),
  }

  mkdirSync(dirname(walletPath), { recursive: true, mode: 0o700 })
  writeFileSync(walletPath, JSON.stringify(wallet, null, 2) + '\n', { mode: 0o600 })

  return wallet
}
