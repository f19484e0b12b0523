// SPDX-License-Identifier: GPL-2.0-or-later

import { describe, it, expect, beforeEach, vi } from 'vitest'

// --- Mock logger and node-hid wrapper ---

vi.mock('../logger', () => ({
  log: vi.fn(),
  logBridgeFrame: vi.fn(),
}))

const mockIsDevicePresent = vi.fn()

vi.mock('../hid-service', () => ({
  isDevicePresent: (...args: unknown[]) => mockIsDevicePresent(...args),
}))

// --- Import after mocking ---

import { startAnalogKeyboard } from '../api'

let controller: AbortController

beforeEach(() => {
  vi.clearAllMocks()
  mockIsDevicePresent.mockResolvedValue(false)
  controller = new AbortController()
  controller.abort()
})

describe('startAnalogKeyboard', () => {
  it('uses the default keyboard ids when none are given', () => {
    const keyboard = startAnalogKeyboard({}, controller.signal)

    expect(keyboard.vid()).toBe(0x41e4)
    expect(keyboard.pid()).toBe(0x2103)
  })

  it('keeps the defaults for fields passed as undefined', () => {
    const keyboard = startAnalogKeyboard(
      { vendorId: undefined, productId: 0x1234 },
      controller.signal,
    )

    expect(keyboard.vid()).toBe(0x41e4)
    expect(keyboard.pid()).toBe(0x1234)
  })

  it('replaces out-of-range ids with the defaults', () => {
    const keyboard = startAnalogKeyboard({ vendorId: 0x10000, productId: -1 }, controller.signal)

    expect(keyboard.vid()).toBe(0x41e4)
    expect(keyboard.pid()).toBe(0x2103)
  })

  it('does not poll the device once the signal is aborted', async () => {
    const keyboard = startAnalogKeyboard({}, controller.signal)

    await vi.waitFor(() => expect(keyboard.isActive()).toBe(false))
    expect(mockIsDevicePresent).not.toHaveBeenCalled()
    expect(keyboard.status()).toBe('Starting...')
  })
})
