// SPDX-License-Identifier: GPL-2.0-or-later
// Capture page served to the browser; WebHID runs there, not here.

import { readFileSync } from 'node:fs'
import {
  WS_PORT_PLACEHOLDER,
  VID_PLACEHOLDER,
  PID_PLACEHOLDER,
} from '../../shared/constants/protocol'
import { formatUsbId } from '../../shared/bridge-frame'

let template: string | null = null

export function loadBridgeTemplate(): string {
  if (template === null) {
    template = readFileSync(new URL('./bridge.html', import.meta.url), 'utf-8')
  }
  return template
}

export function renderBridgePage(
  wsPort: number,
  vendorId: number,
  productId: number,
  source: string = loadBridgeTemplate(),
): string {
  return source
    .replaceAll(WS_PORT_PLACEHOLDER, String(wsPort))
    .replaceAll(VID_PLACEHOLDER, formatUsbId(vendorId))
    .replaceAll(PID_PLACEHOLDER, formatUsbId(productId))
}
