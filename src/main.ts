#!/usr/bin/env node
import fs from 'node:fs'
import process from 'node:process'
import { fileURLToPath } from 'node:url'

import { InterruptedError, commandLogin } from './oidc/login.js'
import { parseArgs, printHelp } from './oidc/utils.js'

async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  const [command, ...rest] = argv
  if (!command || command === '--help' || command === '-h' || command === 'help') {
    printHelp()
    return
  }

  if (command === 'login') {
    const { options, config } = parseArgs(rest)
    if (options.help !== undefined) {
      printHelp()
      return
    }
    await commandLogin(options, config)
    return
  }

  throw new Error(`Unknown command: ${command}`)
}

/** Exit status for an error that escaped `main`. */
function exitCodeFor(error: unknown): number {
  return error instanceof InterruptedError ? 130 : 1
}

function resolveBinPath(): string {
  return fileURLToPath(import.meta.url)
}

const isDirectRun = (() => {
  if (!process.argv[1]) return false
  try {
    const argvPath = fs.realpathSync(process.argv[1])
    const binPath = fs.realpathSync(resolveBinPath())
    return argvPath === binPath
  } catch {
    return false
  }
})()

if (isDirectRun) {
  main().catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error))
    process.exit(exitCodeFor(error))
  })
}

export { main, exitCodeFor }
