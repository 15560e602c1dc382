/**
 * tally Theme System
 * Consistent colors and styling across the CLI
 */

import chalk from "chalk"

// ============================================================================
// COLOR PALETTE
// ============================================================================

export const colors = {
  accent: "#7FDBCA",        // Teal - brand
  dim: "#888888",
  warning: "#FFAA00",
}

// ============================================================================
// THEME HELPERS
// ============================================================================

export const theme = {
  dim: (s: string) => chalk.hex(colors.dim)(s),
  accent: (s: string) => chalk.hex(colors.accent)(s),
  warningBold: (s: string) => chalk.hex(colors.warning).bold(s),
}

// ============================================================================
// BOX DRAWING
// ============================================================================

export const box = {
  topLeft: "┌",
  topRight: "┐",
  bottomLeft: "└",
  bottomRight: "┘",
  horizontal: "─",
  vertical: "│",
}

export function drawBox(content: string[]): string {
  const maxLen = Math.max(...content.map((l) => stripAnsi(l).length))
  const lines: string[] = []

  lines.push(theme.dim(box.topLeft + box.horizontal.repeat(maxLen + 2) + box.topRight))

  for (const line of content) {
    const stripped = stripAnsi(line)
    const padding = " ".repeat(Math.max(0, maxLen - stripped.length))
    lines.push(theme.dim(box.vertical) + " " + line + padding + " " + theme.dim(box.vertical))
  }

  lines.push(theme.dim(box.bottomLeft + box.horizontal.repeat(maxLen + 2) + box.bottomRight))

  return lines.join("\n")
}

// Strip ANSI codes for length calculation
function stripAnsi(str: string): string {
  return str.replace(/\x1B\[[0-9;]*m/g, "")
}
