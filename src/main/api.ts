// SPDX-License-Identifier: GPL-2.0-or-later
// Library entry: everything a consumer (game loop, overlay, script) may depend on.

import type { BridgeConfig } from '../shared/types/app-config'
import { sanitizeBridgeConfig } from './app-config'
import { BridgeServer } from './bridge/bridge-server'
import { DeviceWatcher } from './device-watcher'
import { KeyboardState } from './keyboard-state'
import { log } from './logger'

export { KeyboardState } from './keyboard-state'
export { BridgeServer, type BridgeServerOptions } from './bridge/bridge-server'
export { DeviceWatcher, type DeviceWatcherOptions, type SessionHost } from './device-watcher'
export { normalizeAnalogRaw, parseAnalogReport, applyAnalogReport } from './analog-decoder'
export type { BridgeConfig } from '../shared/types/app-config'
export type { AnalogSample, SessionOutcome, WatcherState } from '../shared/types/protocol'

/**
 * Create the shared state and start watching for the keyboard in the background.
 * Poll the returned state from any timer or frame loop; it is written as frames arrive.
 */
export function startAnalogKeyboard(
  config: Partial<BridgeConfig> = {},
  signal?: AbortSignal,
): KeyboardState {
  // Missing, undefined or out-of-range fields fall back to their defaults
  const c = sanitizeBridgeConfig(config)
  const keyboard = new KeyboardState(c.vendorId, c.productId)
  const bridge = new BridgeServer(keyboard, {
    reconnectDelayMs: c.reconnectDelayMs,
    openBrowser: c.openBrowser,
  })
  const watcher = new DeviceWatcher(keyboard, bridge, {
    searchIntervalMs: c.searchIntervalMs,
    retryDelayMs: c.retryDelayMs,
  })

  watcher
    .run(signal)
    .then(() => bridge.close())
    .catch((err: unknown) => {
      log('error', `Watcher stopped: ${err instanceof Error ? err.stack ?? err.message : String(err)}`)
    })
  return keyboard
}
