// SPDX-License-Identifier: GPL-2.0-or-later

import { describe, it, expect, beforeEach, vi } from 'vitest'

// --- Mock node-hid ---

const mockDevicesAsync = vi.fn()

vi.mock('node-hid', () => ({
  default: {
    devicesAsync: (...args: unknown[]) => mockDevicesAsync(...args),
  },
}))

// --- Mock logger ---

vi.mock('../logger', () => ({
  log: vi.fn(),
  logBridgeFrame: vi.fn(),
}))

// --- Import after mocking ---

import { listDevices, isDevicePresent } from '../hid-service'
import { log } from '../logger'

function createMockDeviceInfo(overrides?: Record<string, unknown>) {
  return {
    vendorId: 0x41e4,
    productId: 0x2103,
    path: '/dev/hidraw0',
    product: 'Test Analog Keyboard',
    usagePage: 0x01,
    usage: 0x06,
    ...overrides,
  }
}

beforeEach(() => {
  vi.clearAllMocks()
})

describe('listDevices', () => {
  it('returns every device when no ids are given', async () => {
    mockDevicesAsync.mockResolvedValue([
      createMockDeviceInfo(),
      createMockDeviceInfo({ vendorId: 0x1111, path: '/dev/hidraw1', product: undefined }),
    ])

    const result = await listDevices()

    expect(result).toEqual([
      { vendorId: 0x41e4, productId: 0x2103, productName: 'Test Analog Keyboard', path: '/dev/hidraw0' },
      { vendorId: 0x1111, productId: 0x2103, productName: '', path: '/dev/hidraw1' },
    ])
  })

  it('filters by vendor and product id', async () => {
    mockDevicesAsync.mockResolvedValue([
      createMockDeviceInfo(),
      createMockDeviceInfo({ productId: 0x9999 }),
      createMockDeviceInfo({ vendorId: 0x9999 }),
    ])

    const result = await listDevices(0x41e4, 0x2103)

    expect(result).toHaveLength(1)
    expect(result[0].productId).toBe(0x2103)
  })

  it('keeps every interface of a matching keyboard', async () => {
    mockDevicesAsync.mockResolvedValue([
      createMockDeviceInfo({ path: '/dev/hidraw0' }),
      createMockDeviceInfo({ path: '/dev/hidraw1', usagePage: 0xff60 }),
    ])

    const result = await listDevices(0x41e4, 0x2103)

    expect(result.map((d) => d.path)).toEqual(['/dev/hidraw0', '/dev/hidraw1'])
  })

  it('maps a missing path to null', async () => {
    mockDevicesAsync.mockResolvedValue([createMockDeviceInfo({ path: undefined })])

    const result = await listDevices()

    expect(result[0].path).toBeNull()
  })
})

describe('isDevicePresent', () => {
  it('returns true when the pair is attached', async () => {
    mockDevicesAsync.mockResolvedValue([createMockDeviceInfo()])
    await expect(isDevicePresent(0x41e4, 0x2103)).resolves.toBe(true)
  })

  it('returns false when only other devices are attached', async () => {
    mockDevicesAsync.mockResolvedValue([createMockDeviceInfo({ productId: 0x0001 })])
    await expect(isDevicePresent(0x41e4, 0x2103)).resolves.toBe(false)
  })

  it('returns false when nothing is attached', async () => {
    mockDevicesAsync.mockResolvedValue([])
    await expect(isDevicePresent(0x41e4, 0x2103)).resolves.toBe(false)
  })

  it('treats an enumeration failure as absent and logs it', async () => {
    mockDevicesAsync.mockRejectedValue(new Error('hidapi backend unavailable'))

    await expect(isDevicePresent(0x41e4, 0x2103)).resolves.toBe(false)
    expect(log).toHaveBeenCalledWith('warn', 'HID enumeration failed: hidapi backend unavailable')
  })
})
