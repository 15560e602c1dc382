/**
 * tally Prompts - Wrapper around @clack/prompts
 *
 * Prompts resolve to an explicit result instead of clack's cancel symbol, so
 * a cancelled prompt is a value callers branch on.
 */

import * as clack from "@clack/prompts"

export type PromptResult<T> =
  | { status: "completed"; value: T }
  | { status: "cancelled" }

export const cancelled: { status: "cancelled" } = { status: "cancelled" }

export function completed<T>(value: T): PromptResult<T> {
  return { status: "completed", value }
}

interface TextOptions {
  message: string
  placeholder?: string
  defaultValue?: string
}

interface PasswordOptions {
  message: string
}

interface ConfirmOptions {
  message: string
  initialValue?: boolean
}

export interface Prompter {
  text(opts: TextOptions): Promise<PromptResult<string>>
  password(opts: PasswordOptions): Promise<PromptResult<string>>
  confirm(opts: ConfirmOptions): Promise<PromptResult<boolean>>
}

function settle<T>(value: T | symbol): PromptResult<T> {
  if (clack.isCancel(value)) return cancelled
  return completed(value)
}

// clack resolves an empty submission to undefined
function settleText(value: string | symbol | undefined): PromptResult<string> {
  return settle<string>(value ?? "")
}

/**
 * Interactive terminal prompter
 */
export class TerminalPrompter implements Prompter {
  async text(opts: TextOptions): Promise<PromptResult<string>> {
    const value: string | symbol | undefined = await clack.text({
      message: opts.message,
      placeholder: opts.placeholder,
      defaultValue: opts.defaultValue,
    })
    return settleText(value)
  }

  async password(opts: PasswordOptions): Promise<PromptResult<string>> {
    const value: string | symbol | undefined = await clack.password({ message: opts.message, mask: "•" })
    return settleText(value)
  }

  async confirm(opts: ConfirmOptions): Promise<PromptResult<boolean>> {
    const value = await clack.confirm({
      message: opts.message,
      initialValue: opts.initialValue,
    })
    return settle(value)
  }
}
