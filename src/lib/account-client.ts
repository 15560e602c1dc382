/**
 * tally account service client
 *
 * Thin typed wrapper around the account REST API. Every request is signed
 * with the machine identity; failures surface as ProviderUnavailableError
 * (no response) or ProviderError (error status, unusable body).
 */

import axios, {
  type AxiosAdapter,
  type AxiosInstance,
  type InternalAxiosRequestConfig,
} from "axios"
import { ProviderError, ProviderUnavailableError } from "./errors.js"
import { encodePublicKey } from "./machine-auth.js"
import { debug } from "../utils/debug.js"
import type { AccountClient, AccountInfo, MachineIdentity } from "../types/account.js"

const REQUEST_TIMEOUT_MS = 10_000

export interface RestAccountClientConfig {
  baseUrl: string
  identity: MachineIdentity
  username?: string
  /** Replaces the HTTP transport (tests) */
  adapter?: AxiosAdapter
}

/**
 * The exact string a request signature covers
 */
export function signingPayload(method: string, path: string, timestamp: string, body: string): string {
  return `${method.toUpperCase()} ${path} ${timestamp} ${body}`
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string")
}

function serializeBody(data: unknown): string {
  if (data === undefined || data === null) return ""
  return typeof data === "string" ? data : JSON.stringify(data)
}

export class RestAccountClient implements AccountClient {
  private http: AxiosInstance
  private identity: MachineIdentity
  private username: string | null

  constructor(config: RestAccountClientConfig) {
    this.identity = config.identity
    this.username = config.username ?? null

    this.http = axios.create({
      baseURL: config.baseUrl,
      timeout: REQUEST_TIMEOUT_MS,
      headers: { "Content-Type": "application/json" },
      adapter: config.adapter,
    })

    this.http.interceptors.request.use((request) => this.sign(request))
  }

  // ==========================================================================
  // Accounts
  // ==========================================================================

  async accountInfo(): Promise<AccountInfo> {
    const data = await this.request<unknown>("GET", "/v1/accounts/machine")

    if (typeof data !== "object" || data === null || !("usernames" in data) || !isStringArray(data.usernames)) {
      throw new ProviderError("Malformed account info response", 200, data)
    }

    return { usernames: [...data.usernames] }
  }

  async createAccount(username: string): Promise<void> {
    await this.request("POST", "/v1/accounts", {
      username,
      address: this.identity.address,
    })
  }

  async login(username: string, password: string): Promise<void> {
    await this.request("POST", "/v1/auth/login", { username, password })
  }

  async updatePassword(newPassword: string): Promise<void> {
    if (!this.username) {
      throw new Error("updatePassword needs a client bound to a username")
    }
    await this.request(
      "PUT",
      `/v1/accounts/${encodeURIComponent(this.username)}/password`,
      { password: newPassword }
    )
  }

  // ==========================================================================
  // Transport
  // ==========================================================================

  private async sign(request: InternalAxiosRequestConfig): Promise<InternalAxiosRequestConfig> {
    const timestamp = Math.floor(Date.now() / 1000).toString()
    const method = request.method ?? "get"
    const path = request.url ?? "/"
    const payload = signingPayload(method, path, timestamp, serializeBody(request.data))
    const signature = await this.identity.signMessage(payload)

    request.headers.set("X-Machine-Pubkey", encodePublicKey(this.identity))
    request.headers.set("X-Machine-Timestamp", timestamp)
    request.headers.set("Authorization", `AuthMachine ${signature}`)
    return request
  }

  private async request<T = unknown>(method: "GET" | "POST" | "PUT", url: string, data?: unknown): Promise<T> {
    debug("account-client", `${method} ${url}`)

    try {
      const response = await this.http.request<T>({ method, url, data })
      return response.data
    } catch (error) {
      if (axios.isAxiosError(error)) {
        if (!error.response) {
          throw new ProviderUnavailableError(
            `Account service unreachable: ${error.message}`,
            { cause: error }
          )
        }
        debug("account-client", `${method} ${url} -> ${error.response.status} ${JSON.stringify(error.response.data)}`)
        throw new ProviderError(
          `Account service returned ${error.response.status}`,
          error.response.status,
          error.response.data
        )
      }
      throw error
    }
  }
}
