// SPDX-License-Identifier: GPL-2.0-or-later
// HID keyboard usage codes (page 0x07) to short display labels

import labels from './hid-usage-labels.json'

const USAGE_LABELS: ReadonlyMap<number, string> = new Map(
  Object.entries(labels).map(([code, label]) => [Number(code), label]),
)

/** Short label for a usage code, or its hex form when unnamed */
export function usageLabel(code: number): string {
  return USAGE_LABELS.get(code) ?? `0x${code.toString(16).toUpperCase().padStart(2, '0')}`
}
