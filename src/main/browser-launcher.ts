// SPDX-License-Identifier: GPL-2.0-or-later
// Open a URL in the user's browser. This is the only platform-specific step of the bridge.

import { spawn } from 'node:child_process'

export interface LaunchCommand {
  command: string
  args: string[]
}

/**
 * Candidate commands for a platform, tried in order.
 * WebHID needs a Chromium browser, so macOS asks for Chrome before the default handler.
 */
export function browserCommands(url: string, platform: NodeJS.Platform = process.platform): LaunchCommand[] {
  if (platform === 'darwin') {
    return [
      { command: 'open', args: ['-a', 'Google Chrome', url] },
      { command: 'open', args: [url] },
    ]
  }
  if (platform === 'win32') {
    return [{ command: 'rundll32', args: ['url.dll,FileProtocolHandler', url] }]
  }
  return [{ command: 'xdg-open', args: [url] }]
}

/** Launchers hand the URL off and exit; a non-zero exit means nothing was opened. */
function runLauncher({ command, args }: LaunchCommand): Promise<void> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { detached: true, stdio: 'ignore' })
    child.once('error', reject)
    child.once('exit', (code: number | null) => {
      if (code === 0) {
        resolve()
      } else {
        reject(new Error(`${command} exited with code ${code}`))
      }
    })
  })
}

export type BrowserOpener = (url: string) => Promise<void>

/**
 * Open `url` with the first launch command that succeeds.
 * Rejects with the last launcher error when none does.
 */
export async function openInBrowser(url: string): Promise<void> {
  let parsed: URL
  try { parsed = new URL(url) } catch { throw new Error('Invalid URL') }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new Error('Invalid URL scheme')
  }

  let lastError: Error | undefined
  for (const candidate of browserCommands(url)) {
    try {
      await runLauncher(candidate)
      return
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err))
    }
  }
  throw lastError ?? new Error('No browser launch command available')
}
