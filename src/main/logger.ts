// SPDX-License-Identifier: GPL-2.0-or-later
// Rotation logger, writes to <config dir>/logs/

import { homedir } from 'node:os'
import { join } from 'node:path'
import { existsSync, mkdirSync, statSync, renameSync, rmSync, appendFileSync } from 'node:fs'
import { LOG_LEVELS, type LogLevel } from '../shared/types/app-config'
import { formatHex } from '../shared/bridge-frame'

export type { LogLevel }

const MAX_FILE_SIZE = 5 * 1024 * 1024 // 5 MB
const MAX_GENERATIONS = 5 // hallbridge-0.log (current) .. hallbridge-4.log (oldest)

let logDir = ''
let minLevel: LogLevel = 'info'
// Directory already created for this process; the env override may point elsewhere
let preparedDir: string | null = null

export interface LoggerOptions {
  dir?: string
  level?: LogLevel
}

/**
 * Point the logger at a directory and threshold.
 * HALLBRIDGE_LOG_DIR still wins over `dir` so a session can be redirected from the shell.
 */
export function configureLogger(options: LoggerOptions): void {
  if (options.dir !== undefined) logDir = options.dir
  if (options.level !== undefined) minLevel = options.level
}

function getLogDir(): string {
  const fromEnv = process.env.HALLBRIDGE_LOG_DIR
  if (fromEnv) return fromEnv
  if (!logDir) {
    logDir = join(homedir(), '.hallbridge', 'logs')
  }
  return logDir
}

const generationFile = (dir: string, generation: number): string =>
  join(dir, `hallbridge-${generation}.log`)

/** Shift every generation up by one; whatever sat in the last slot is dropped. */
function rotate(dir: string): void {
  rmSync(generationFile(dir, MAX_GENERATIONS - 1), { force: true })
  for (let gen = MAX_GENERATIONS - 1; gen > 0; gen--) {
    const older = generationFile(dir, gen - 1)
    if (existsSync(older)) renameSync(older, generationFile(dir, gen))
  }
}

export function isLevelEnabled(level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(minLevel)
}

export function log(level: LogLevel, message: string): void {
  if (!isLevelEnabled(level)) return
  const line = `[${new Date().toISOString()}] [${level.toUpperCase()}] ${message}\n`
  const dir = getLogDir()
  const current = generationFile(dir, 0)
  try {
    if (preparedDir !== dir) {
      mkdirSync(dir, { recursive: true })
      preparedDir = dir
    }
    const size = statSync(current, { throwIfNoEntry: false })?.size ?? 0
    if (size >= MAX_FILE_SIZE) rotate(dir)
    appendFileSync(current, line, 'utf-8')
  } catch (err) {
    // Log file unusable (permissions, full disk); keep the line on stderr
    const reason = err instanceof Error ? err.message : String(err)
    process.stderr.write(`${line.trimEnd()} (log write failed: ${reason})\n`)
  }
}

export function logBridgeFrame(direction: 'TX' | 'RX', data: Uint8Array): void {
  if (!process.env.HALLBRIDGE_DEBUG_FRAMES) return
  log('debug', `WS ${direction}: ${formatHex(data)}`)
}

export function getLogPath(): string {
  return getLogDir()
}
