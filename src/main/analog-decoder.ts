// SPDX-License-Identifier: GPL-2.0-or-later
// Analog report decoding: one report carries one key's raw Hall sensor reading.

import {
  ANALOG_REPORT_ID,
  ANALOG_REPORT_MIN_LEN,
  ANALOG_KEY_OFFSET,
  ANALOG_RAW_OFFSET,
  ANALOG_DEADZONE,
  ANALOG_MAX,
} from '../shared/constants/protocol'
import type { AnalogSample } from '../shared/types/protocol'
import type { KeyboardState } from './keyboard-state'

/**
 * Map a raw sensor reading to key travel in [0, 1].
 * Readings at or below the deadzone are rest-position noise.
 */
export function normalizeAnalogRaw(raw: number): number {
  if (raw <= ANALOG_DEADZONE) return 0
  return Math.min(1, Math.max(0, (raw - ANALOG_DEADZONE) / ANALOG_MAX))
}

/**
 * Decode an analog report payload.
 * Layout: [0xA0][pad][pad][key][raw_hi][raw_lo], raw is big-endian.
 * Returns null for short payloads and other report ids.
 */
export function parseAnalogReport(payload: Uint8Array): AnalogSample | null {
  if (payload.length < ANALOG_REPORT_MIN_LEN || payload[0] !== ANALOG_REPORT_ID) {
    return null
  }
  const keyIndex = payload[ANALOG_KEY_OFFSET]
  const raw = (payload[ANALOG_RAW_OFFSET] << 8) | payload[ANALOG_RAW_OFFSET + 1]
  return { keyIndex, raw, value: normalizeAnalogRaw(raw) }
}

/** Decode a payload and write the one key it carries. Returns false when discarded. */
export function applyAnalogReport(payload: Uint8Array, state: KeyboardState): boolean {
  const sample = parseAnalogReport(payload)
  if (!sample) return false
  state.setValue(sample.keyIndex, sample.value)
  return true
}
