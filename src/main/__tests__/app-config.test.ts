// SPDX-License-Identifier: GPL-2.0-or-later

import { describe, it, expect, beforeEach, vi } from 'vitest'

// --- Mock conf: an in-memory store with the same surface ---

const storeData: Record<string, unknown> = {}
const mockSet = vi.fn((value: Record<string, unknown>) => {
  Object.assign(storeData, value)
})

vi.mock('conf', () => ({
  default: class {
    path = '/mock/config/hallbridge/config.json'
    get store(): Record<string, unknown> {
      return { ...storeData }
    }
    set(value: Record<string, unknown>): void {
      mockSet(value)
    }
  },
}))

// --- Import after mocking ---

import {
  getConfigDir,
  loadBridgeConfig,
  saveBridgeConfig,
  sanitizeBridgeConfig,
  parseUsbId,
  isLogLevel,
} from '../app-config'
import { DEFAULT_BRIDGE_CONFIG } from '../../shared/types/app-config'

beforeEach(() => {
  vi.clearAllMocks()
  for (const key of Object.keys(storeData)) delete storeData[key]
})

describe('sanitizeBridgeConfig', () => {
  it('returns defaults for non-objects', () => {
    expect(sanitizeBridgeConfig(null)).toEqual(DEFAULT_BRIDGE_CONFIG)
    expect(sanitizeBridgeConfig('config')).toEqual(DEFAULT_BRIDGE_CONFIG)
  })

  it('keeps valid fields', () => {
    const config = {
      vendorId: 0x1234,
      productId: 0xffff,
      searchIntervalMs: 500,
      retryDelayMs: 0,
      reconnectDelayMs: 250,
      openBrowser: false,
      logLevel: 'debug',
    }
    expect(sanitizeBridgeConfig(config)).toEqual(config)
  })

  it('replaces each invalid field with its default independently', () => {
    const result = sanitizeBridgeConfig({
      vendorId: 0x10000,
      productId: 0x5678,
      searchIntervalMs: -1,
      retryDelayMs: 1.5,
      reconnectDelayMs: '500',
      openBrowser: 'yes',
      logLevel: 'verbose',
    })

    expect(result).toEqual({
      ...DEFAULT_BRIDGE_CONFIG,
      productId: 0x5678,
    })
  })
})

describe('loadBridgeConfig / saveBridgeConfig', () => {
  it('loads defaults from an empty store', () => {
    expect(loadBridgeConfig()).toEqual(DEFAULT_BRIDGE_CONFIG)
  })

  it('loads stored values', () => {
    storeData.vendorId = 0x1234
    storeData.logLevel = 'warn'

    expect(loadBridgeConfig()).toEqual({ ...DEFAULT_BRIDGE_CONFIG, vendorId: 0x1234, logLevel: 'warn' })
  })

  it('persists a merged, validated config', () => {
    storeData.productId = 0x0042

    const saved = saveBridgeConfig({ vendorId: 0xabcd })

    const expected = { ...DEFAULT_BRIDGE_CONFIG, vendorId: 0xabcd, productId: 0x0042 }
    expect(saved).toEqual(expected)
    expect(mockSet).toHaveBeenCalledWith(expected)
    expect(loadBridgeConfig()).toEqual(expected)
  })

  it('does not persist an invalid value', () => {
    storeData.vendorId = 0x1234

    const saved = saveBridgeConfig({ vendorId: -5 })

    expect(saved.vendorId).toBe(DEFAULT_BRIDGE_CONFIG.vendorId)
  })
})

describe('getConfigDir', () => {
  it('is the directory holding the store file', () => {
    expect(getConfigDir()).toBe('/mock/config/hallbridge')
  })
})

describe('parseUsbId', () => {
  it('accepts prefixed and bare hex', () => {
    expect(parseUsbId('0x41e4')).toBe(0x41e4)
    expect(parseUsbId('0X41E4')).toBe(0x41e4)
    expect(parseUsbId('2103')).toBe(0x2103)
    expect(parseUsbId(' ff ')).toBe(0xff)
  })

  it('rejects non-hex and values wider than 16 bits', () => {
    expect(parseUsbId('')).toBeNull()
    expect(parseUsbId('0x')).toBeNull()
    expect(parseUsbId('xyz')).toBeNull()
    expect(parseUsbId('0x10000')).toBeNull()
    expect(parseUsbId('-1')).toBeNull()
  })
})

describe('isLogLevel', () => {
  it('accepts the four levels only', () => {
    expect(isLogLevel('debug')).toBe(true)
    expect(isLogLevel('error')).toBe(true)
    expect(isLogLevel('trace')).toBe(false)
    expect(isLogLevel(3)).toBe(false)
  })
})
