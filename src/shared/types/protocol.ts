// SPDX-License-Identifier: GPL-2.0-or-later

/** Detected HID device info */
export interface DeviceInfo {
  vendorId: number
  productId: number
  productName: string
  path: string | null
}

/** One binary frame received from the capture page */
export interface BridgeFrame {
  type: number
  /** Bytes after the two-byte frame header */
  payload: Uint8Array
}

/** A decoded analog report: one key, one sample */
export interface AnalogSample {
  keyIndex: number
  raw: number
  /** Normalized travel, 0.0 (released) to 1.0 (bottomed out) */
  value: number
}

export type WatcherState = 'searching' | 'bridging'

/** Why a bridge launch returned control to the watcher */
export type SessionOutcome = 'ended' | 'bind-failed' | 'aborted'
