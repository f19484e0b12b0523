// SPDX-License-Identifier: GPL-2.0-or-later

import { join } from 'node:path'
import { Command, InvalidArgumentError } from 'commander'
import { formatUsbId } from '../shared/bridge-frame'
import type { BridgeConfig } from '../shared/types/app-config'
import {
  getConfigDir,
  isLogLevel,
  loadBridgeConfig,
  parseUsbId,
  saveBridgeConfig,
} from './app-config'
import { startAnalogKeyboard } from './api'
import { configureLogger, getLogPath, log } from './logger'
import { startStatusLine } from './status-line'

interface CliOptions {
  vid?: number
  pid?: number
  browser: boolean
  logLevel?: BridgeConfig['logLevel']
  save: boolean
}

function usbIdOption(value: string): number {
  const id = parseUsbId(value)
  if (id === null) throw new InvalidArgumentError('Expected a 16-bit hex id such as 0x41e4.')
  return id
}

function logLevelOption(value: string): BridgeConfig['logLevel'] {
  if (!isLogLevel(value)) throw new InvalidArgumentError('Expected debug, info, warn or error.')
  return value
}

function resolveConfig(opts: CliOptions): BridgeConfig {
  const stored = loadBridgeConfig()
  const ids: Partial<BridgeConfig> = {}
  if (opts.vid !== undefined) ids.vendorId = opts.vid
  if (opts.pid !== undefined) ids.productId = opts.pid
  const base = opts.save ? saveBridgeConfig(ids) : { ...stored, ...ids }
  return {
    ...base,
    openBrowser: base.openBrowser && opts.browser,
    logLevel: opts.logLevel ?? base.logLevel,
  }
}

const program = new Command()
  .name('hallbridge')
  .description('Relay analog key travel from a Hall-effect keyboard through a WebHID browser tab')
  .option('--vid <hex>', 'keyboard vendor id', usbIdOption)
  .option('--pid <hex>', 'keyboard product id', usbIdOption)
  .option('--no-browser', 'do not open the capture page automatically')
  .option('--log-level <level>', 'debug, info, warn or error', logLevelOption)
  .option('--save', 'remember --vid/--pid for later runs', false)
  .action((opts: CliOptions) => {
    const config = resolveConfig(opts)
    configureLogger({ dir: join(getConfigDir(), 'logs'), level: config.logLevel })
    log('info', `hallbridge starting for ${formatUsbId(config.vendorId)}:${formatUsbId(config.productId)}`)
    process.stdout.write(`Logging to ${getLogPath()}\n`)

    const controller = new AbortController()
    const keyboard = startAnalogKeyboard(config, controller.signal)
    const stopStatusLine = startStatusLine(keyboard)
    process.once('SIGINT', () => {
      log('info', 'Interrupted, shutting down')
      stopStatusLine()
      controller.abort()
    })
  })

program.parse()
