// SPDX-License-Identifier: GPL-2.0-or-later
// Bridge configuration backed by conf

import { dirname } from 'node:path'
import Conf from 'conf'
import {
  DEFAULT_BRIDGE_CONFIG,
  LOG_LEVELS,
  type BridgeConfig,
  type LogLevel,
} from '../shared/types/app-config'

let store: Conf<BridgeConfig> | null = null

export function getAppConfigStore(): Conf<BridgeConfig> {
  if (!store) {
    store = new Conf<BridgeConfig>({
      projectName: 'hallbridge',
      configName: 'config',
      defaults: DEFAULT_BRIDGE_CONFIG,
    })
  }
  return store
}

export function getConfigDir(): string {
  return dirname(getAppConfigStore().path)
}

export function isValidUsbId(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= 0xffff
}

function isValidDelay(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0
}

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value)
}

/**
 * Coerce an arbitrary stored object into a BridgeConfig.
 * Each invalid or missing field falls back to its default independently.
 */
export function sanitizeBridgeConfig(raw: unknown): BridgeConfig {
  const obj: Record<string, unknown> =
    raw && typeof raw === 'object' ? { ...raw } : {}
  const d = DEFAULT_BRIDGE_CONFIG
  return {
    vendorId: isValidUsbId(obj.vendorId) ? obj.vendorId : d.vendorId,
    productId: isValidUsbId(obj.productId) ? obj.productId : d.productId,
    searchIntervalMs: isValidDelay(obj.searchIntervalMs) ? obj.searchIntervalMs : d.searchIntervalMs,
    retryDelayMs: isValidDelay(obj.retryDelayMs) ? obj.retryDelayMs : d.retryDelayMs,
    reconnectDelayMs: isValidDelay(obj.reconnectDelayMs) ? obj.reconnectDelayMs : d.reconnectDelayMs,
    openBrowser: typeof obj.openBrowser === 'boolean' ? obj.openBrowser : d.openBrowser,
    logLevel: isLogLevel(obj.logLevel) ? obj.logLevel : d.logLevel,
  }
}

export function loadBridgeConfig(): BridgeConfig {
  return sanitizeBridgeConfig(getAppConfigStore().store)
}

/**
 * Persist a subset of keys. Values are validated against the current config
 * first, so an invalid value is replaced by what is already stored.
 */
export function saveBridgeConfig(partial: Partial<BridgeConfig>): BridgeConfig {
  const next = sanitizeBridgeConfig({ ...loadBridgeConfig(), ...partial })
  getAppConfigStore().set(next)
  return next
}

/**
 * Parse a USB id given on the command line: "0x41e4" or "41e4".
 * Bare digits are read as hex, matching how lsusb prints ids.
 */
export function parseUsbId(text: string): number | null {
  const trimmed = text.trim().toLowerCase()
  const hex = trimmed.startsWith('0x') ? trimmed.slice(2) : trimmed
  if (!/^[0-9a-f]{1,4}$/.test(hex)) return null
  const value = parseInt(hex, 16)
  return isValidUsbId(value) ? value : null
}
