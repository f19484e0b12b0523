// SPDX-License-Identifier: GPL-2.0-or-later
// Live analog key state shared between the bridge (writer) and any consumer (reader).

import {
  HID_USAGE_COUNT,
  PRESSED_THRESHOLD,
  STATUS_STARTING,
} from '../shared/constants/protocol'
import { log, type LogLevel } from './logger'

type StatusListener = (status: string) => void

function clampUnit(v: number): number {
  if (Number.isNaN(v)) return 0
  return Math.min(1, Math.max(0, v))
}

function isUsageCode(code: number): boolean {
  return Number.isInteger(code) && code >= 0 && code < HID_USAGE_COUNT
}

/**
 * Per-key analog values (0.0 released .. 1.0 bottomed out) indexed by HID usage code,
 * plus the bridge activity flag and a human-readable status line.
 *
 * Readers may poll at any cadence. Accessors never throw; bad input yields
 * 0 / false / the current status.
 */
export class KeyboardState {
  private readonly vendorId: number
  private readonly productId: number
  private keyValues: Float64Array = new Float64Array(HID_USAGE_COUNT)
  private activeFlag = false
  private statusText = STATUS_STARTING
  private readonly statusListeners: StatusListener[] = []

  constructor(vendorId: number, productId: number) {
    this.vendorId = vendorId & 0xffff
    this.productId = productId & 0xffff
  }

  vid(): number {
    return this.vendorId
  }

  pid(): number {
    return this.productId
  }

  /** Snapshot copy of all 256 values */
  values(): number[] {
    return Array.from(this.keyValues)
  }

  value(code: number): number {
    if (!isUsageCode(code)) return 0
    return this.keyValues[code]
  }

  /**
   * Replace every value at once (digital fallback input).
   * Short input is zero-filled; entries past 255 are dropped.
   */
  setValues(seq: ArrayLike<number>): void {
    const next = new Float64Array(HID_USAGE_COUNT)
    const len = Math.min(seq.length, HID_USAGE_COUNT)
    for (let i = 0; i < len; i++) {
      next[i] = clampUnit(seq[i])
    }
    this.keyValues = next
  }

  /** Write a single key; used by the analog decoder. */
  setValue(code: number, value: number): void {
    if (!isUsageCode(code)) return
    this.keyValues[code] = clampUnit(value)
  }

  /** Number of keys currently above the pressed threshold */
  pressedCount(threshold = PRESSED_THRESHOLD): number {
    let count = 0
    for (const v of this.keyValues) {
      if (v > threshold) count++
    }
    return count
  }

  isActive(): boolean {
    return this.activeFlag
  }

  setActive(active: boolean): void {
    this.activeFlag = active
  }

  status(): string {
    return this.statusText
  }

  /**
   * Publish a new status line. Each change is logged when it is set;
   * repeating the current status is a no-op.
   */
  setStatus(status: string, level: LogLevel = 'info'): void {
    if (status === this.statusText) return
    this.statusText = status
    log(level, `[HID] ${status}`)
    for (const listener of [...this.statusListeners]) {
      try {
        listener(status)
      } catch (err) {
        log('warn', `Status listener failed: ${err instanceof Error ? err.message : String(err)}`)
      }
    }
  }

  onStatusChange(listener: StatusListener): () => void {
    this.statusListeners.push(listener)
    return () => {
      const idx = this.statusListeners.indexOf(listener)
      if (idx >= 0) this.statusListeners.splice(idx, 1)
    }
  }
}
