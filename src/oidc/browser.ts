import fs from 'node:fs'
import process from 'node:process'
import { spawn } from 'node:child_process'

import { APP_DISPLAY_NAME } from './utils.js'

export type BrowserPlatform = 'windows' | 'wsl' | 'darwin' | 'unix'

export interface BrowserCommand {
  command: string
  args: string[]
}

const KERNEL_VERSION_PATH = '/proc/version'

function readKernelVersion(): string {
  return fs.readFileSync(KERNEL_VERSION_PATH, 'utf8')
}

/** WSL kernels report a Microsoft build string in /proc/version. */
export function detectPlatform(
  platform: NodeJS.Platform = process.platform,
  readVersion: () => string = readKernelVersion,
): BrowserPlatform {
  if (platform === 'win32') return 'windows'
  if (platform === 'darwin') return 'darwin'

  let version: string
  try {
    version = readVersion()
  } catch {
    console.error(`[${APP_DISPLAY_NAME}] unable to read ${KERNEL_VERSION_PATH}`)
    return 'unix'
  }
  return version.toLowerCase().includes('microsoft') ? 'wsl' : 'unix'
}

function windowsStart(url: string): BrowserCommand {
  // cmd.exe treats & as a command separator
  return { command: 'cmd.exe', args: ['/c', 'start', url.replace(/&/g, '^&')] }
}

const BROWSER_COMMANDS: Record<BrowserPlatform, (url: string) => BrowserCommand> = {
  windows: windowsStart,
  wsl: windowsStart,
  darwin: (url) => ({ command: 'open', args: [url] }),
  unix: (url) => ({ command: 'xdg-open', args: [url] }),
}

export function browserCommand(platform: BrowserPlatform, url: string): BrowserCommand {
  return BROWSER_COMMANDS[platform](url)
}

/** Launch the default browser on `url`. Resolves once the opener process has spawned. */
export function openUrl(url: string, platform: BrowserPlatform = detectPlatform()): Promise<void> {
  const { command, args } = browserCommand(platform, url)
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      detached: true,
      stdio: 'ignore',
    })
    child.once('error', reject)
    child.once('spawn', () => {
      child.unref()
      resolve()
    })
  })
}
