// SPDX-License-Identifier: GPL-2.0-or-later
// node-hid based device presence checks.
// The analog stream itself arrives through the browser bridge; node-hid is only
// used to notice that the keyboard is plugged in.

import HID from 'node-hid'
import { log } from './logger'
import type { DeviceInfo } from '../shared/types/protocol'

/**
 * List attached HID interfaces, optionally narrowed to one vendor/product pair.
 * A keyboard exposes several interfaces, so a match may appear more than once.
 */
export async function listDevices(vendorId?: number, productId?: number): Promise<DeviceInfo[]> {
  const devices = await HID.devicesAsync()
  const result: DeviceInfo[] = []

  for (const d of devices) {
    if (vendorId !== undefined && d.vendorId !== vendorId) continue
    if (productId !== undefined && d.productId !== productId) continue
    result.push({
      vendorId: d.vendorId,
      productId: d.productId,
      productName: d.product ?? '',
      path: d.path ?? null,
    })
  }

  return result
}

/**
 * True when a device with the given ids is attached.
 * Enumeration failures (no hidapi backend, permission errors) read as "absent".
 */
export async function isDevicePresent(vendorId: number, productId: number): Promise<boolean> {
  try {
    const matches = await listDevices(vendorId, productId)
    return matches.length > 0
  } catch (err) {
    log('warn', `HID enumeration failed: ${err instanceof Error ? err.message : String(err)}`)
    return false
  }
}
