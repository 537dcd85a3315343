#!/usr/bin/env node
/**
 * CLI entry point for oidc-keyring.
 *
 * Each subcommand is lazy-loaded via dynamic import() to minimize startup
 * time: only the requested command's module (and its dependencies) is loaded.
 *
 * argv layout: [node, script, subcommand, ...commandArgs]
 * parseArgs consumes argv[2..] and extracts the subcommand as positionals[0].
 * commandArgs is argv[3..]: everything after the subcommand.
 *
 * @internal
 */

import { parseArgs } from 'node:util'

const { positionals } = parseArgs({
  allowPositionals: true,
  strict: false,
})

const subcommand = positionals[0]
// argv[0]=node, argv[1]=script, argv[2]=subcommand, argv[3..]=commandArgs
const commandArgs = process.argv.slice(3)

function printHelp(): void {
  process.stdout.write(
    'Usage: oidc-keyring <command> [options]\n\n' +
      'Commands:\n' +
      '  create-key   Create a named signing key\n' +
      '  read-key     Show the configuration of a named key\n' +
      '  rotate-key   Replace the signing key of a named key now\n' +
      '  issue-token  Issue an identity token for a subject\n' +
      '  keys         Print the public keys valid for verification (JWKS)\n' +
      '  sweep        Remove expired public keys\n' +
      '  config       Manage configuration\n',
  )
}

async function main(): Promise<number> {
  if (subcommand === undefined || subcommand === '--help' || subcommand === '-h') {
    printHelp()
    return 0
  }

  switch (subcommand) {
    case 'create-key': {
      const { createKeyCommand } = await import('./commands/create-key.js')
      return createKeyCommand(commandArgs)
    }
    case 'read-key': {
      const { readKeyCommand } = await import('./commands/read-key.js')
      return readKeyCommand(commandArgs)
    }
    case 'rotate-key': {
      const { rotateKeyCommand } = await import('./commands/rotate-key.js')
      return rotateKeyCommand(commandArgs)
    }
    case 'issue-token': {
      const { issueTokenCommand } = await import('./commands/issue-token.js')
      return issueTokenCommand(commandArgs)
    }
    case 'keys': {
      const { keysCommand } = await import('./commands/keys.js')
      return keysCommand(commandArgs)
    }
    case 'sweep': {
      const { sweepCommand } = await import('./commands/sweep.js')
      return sweepCommand(commandArgs)
    }
    case 'config': {
      const { configCommand } = await import('./commands/config.js')
      return configCommand(commandArgs)
    }
    default:
      process.stderr.write(`Unknown command: ${subcommand}\n`)
      printHelp()
      return 1
  }
}

main()
  .then((code) => {
    process.exitCode = code
  })
  .catch((err: unknown) => {
    process.stderr.write(`Fatal: ${err instanceof Error ? err.message : String(err)}\n`)
    process.exitCode = 1
  })
