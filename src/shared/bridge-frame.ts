// SPDX-License-Identifier: GPL-2.0-or-later
// Bridge wire framing: [type: 1][reserved: 1][payload: N]

import { FRAME_HEADER_LEN, FRAME_MIN_LEN } from './constants/protocol'
import type { BridgeFrame } from './types/protocol'

/**
 * Split a binary frame into its type byte and payload.
 * Returns null for frames too short to carry a payload; those are noise.
 */
export function parseBridgeFrame(data: Uint8Array): BridgeFrame | null {
  if (data.length < FRAME_MIN_LEN) return null
  return {
    type: data[0],
    payload: data.subarray(FRAME_HEADER_LEN),
  }
}

export function formatHex(data: Uint8Array): string {
  return Array.from(data)
    .map((b) => b.toString(16).padStart(2, '0'))
    .join(' ')
}

/** Render a 16-bit id as the 0x-prefixed, 4-digit upper-case literal the page expects */
export function formatUsbId(id: number): string {
  return `0x${(id & 0xffff).toString(16).toUpperCase().padStart(4, '0')}`
}
