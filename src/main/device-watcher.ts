// SPDX-License-Identifier: GPL-2.0-or-later
// Top-level driver: poll for the keyboard, run a bridge session while it is present.

import {
  SEARCH_INTERVAL_MS,
  RETRY_DELAY_MS,
  STATUS_NOT_FOUND,
  STATUS_DETECTED,
} from '../shared/constants/protocol'
import type { SessionOutcome, WatcherState } from '../shared/types/protocol'
import type { KeyboardState } from './keyboard-state'
import { isDevicePresent } from './hid-service'
import { log } from './logger'
import { sleep } from './timing'

export interface SessionHost {
  serveSession(signal?: AbortSignal): Promise<SessionOutcome>
}

export type PresenceCheck = (vendorId: number, productId: number) => Promise<boolean>

export interface DeviceWatcherOptions {
  searchIntervalMs?: number
  retryDelayMs?: number
  isPresent?: PresenceCheck
}

/**
 * Two-state loop:
 *   searching --device found--> bridging --session ended / bind failed--> searching
 *
 * Unplugging is only noticed when the browser session drops; there is no
 * hotplug notification.
 */
export class DeviceWatcher {
  private current: WatcherState = 'searching'
  private readonly searchIntervalMs: number
  private readonly retryDelayMs: number
  private readonly isPresent: PresenceCheck

  constructor(
    private readonly keyboard: KeyboardState,
    private readonly bridge: SessionHost,
    options: DeviceWatcherOptions = {},
  ) {
    this.searchIntervalMs = options.searchIntervalMs ?? SEARCH_INTERVAL_MS
    this.retryDelayMs = options.retryDelayMs ?? RETRY_DELAY_MS
    this.isPresent = options.isPresent ?? isDevicePresent
  }

  state(): WatcherState {
    return this.current
  }

  /** Runs until `signal` aborts; without one it never resolves. */
  async run(signal?: AbortSignal): Promise<void> {
    while (!signal?.aborted) {
      if (this.current === 'searching') {
        await this.search(signal)
      } else {
        await this.bridgeOnce(signal)
      }
    }
  }

  private transition(next: WatcherState): void {
    if (next === this.current) return
    log('debug', `Watcher: ${this.current} -> ${next}`)
    this.current = next
  }

  private async search(signal?: AbortSignal): Promise<void> {
    let found = false
    try {
      found = await this.isPresent(this.keyboard.vid(), this.keyboard.pid())
    } catch (err) {
      log('warn', `Device check failed: ${err instanceof Error ? err.message : String(err)}`)
    }
    if (found) {
      this.transition('bridging')
      return
    }
    this.keyboard.setStatus(STATUS_NOT_FOUND)
    await sleep(this.searchIntervalMs, signal)
  }

  private async bridgeOnce(signal?: AbortSignal): Promise<void> {
    this.keyboard.setStatus(STATUS_DETECTED)
    let outcome: SessionOutcome
    try {
      outcome = await this.bridge.serveSession(signal)
    } catch (err) {
      log('error', `Bridge session failed: ${err instanceof Error ? err.message : String(err)}`)
      outcome = 'ended'
    }
    log('debug', `Bridge session returned: ${outcome}`)
    await sleep(this.retryDelayMs, signal)
    this.transition('searching')
  }
}
