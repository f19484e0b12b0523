// SPDX-License-Identifier: GPL-2.0-or-later

import {
  DEFAULT_VENDOR_ID,
  DEFAULT_PRODUCT_ID,
  SEARCH_INTERVAL_MS,
  RETRY_DELAY_MS,
  RECONNECT_DELAY_MS,
} from '../constants/protocol'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

export interface BridgeConfig {
  vendorId: number
  productId: number
  searchIntervalMs: number
  retryDelayMs: number
  reconnectDelayMs: number
  openBrowser: boolean
  logLevel: LogLevel
}

export const DEFAULT_BRIDGE_CONFIG: BridgeConfig = {
  vendorId: DEFAULT_VENDOR_ID,
  productId: DEFAULT_PRODUCT_ID,
  searchIntervalMs: SEARCH_INTERVAL_MS,
  retryDelayMs: RETRY_DELAY_MS,
  reconnectDelayMs: RECONNECT_DELAY_MS,
  openBrowser: true,
  logLevel: 'info',
}
