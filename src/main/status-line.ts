// SPDX-License-Identifier: GPL-2.0-or-later
// Terminal consumer of KeyboardState: a status line redrawn when it changes.

import chalk from 'chalk'
import { PRESSED_THRESHOLD, STATUS_POLL_MS } from '../shared/constants/protocol'
import { usageLabel } from '../shared/keycodes/hid-usage'
import type { KeyboardState } from './keyboard-state'

/** Pressed keys as "Label NN%", in usage-code order */
export function formatPressedKeys(values: readonly number[]): string {
  const parts: string[] = []
  values.forEach((v, code) => {
    if (v > PRESSED_THRESHOLD) {
      parts.push(`${usageLabel(code)} ${Math.round(v * 100)}%`)
    }
  })
  return parts.join('  ')
}

export function formatStatusLine(state: KeyboardState): string {
  const keys = formatPressedKeys(state.values())
  return keys ? `${state.status()} | ${keys}` : state.status()
}

export interface StatusLineOptions {
  intervalMs?: number
  write?: (text: string) => void
}

/**
 * Poll the state and print a line each time its text or the active flag changes.
 * Green while analog data streams, yellow otherwise.
 */
export function startStatusLine(state: KeyboardState, options: StatusLineOptions = {}): () => void {
  const write = options.write ?? ((text: string) => process.stdout.write(text))
  let lastLine = ''
  let lastActive = false

  const tick = (): void => {
    const line = formatStatusLine(state)
    const active = state.isActive()
    if (line === lastLine && active === lastActive) return
    lastLine = line
    lastActive = active
    write(`${active ? chalk.green(line) : chalk.yellow(line)}\n`)
  }

  tick()
  const timer = setInterval(tick, options.intervalMs ?? STATUS_POLL_MS)
  return () => clearInterval(timer)
}
