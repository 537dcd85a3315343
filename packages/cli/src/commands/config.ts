import { parseArgs } from 'node:util'
import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import {
  CONFIG_FILE_NAME,
  defaultConfig,
  getDefaultConfigDir,
  loadConfig,
  writeConfig,
} from 'oidc-keyring'
import { formatError } from '../output.js'
import { configDirFromEnv } from '../provider.js'

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath)
    return true
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return false
    }
    throw err
  }
}

export async function configCommand(args: string[]): Promise<number> {
  const { positionals } = parseArgs({
    args,
    allowPositionals: true,
    strict: false,
  })

  const subcommand = positionals[0]
  const configDir = configDirFromEnv() ?? getDefaultConfigDir()

  switch (subcommand) {
    case 'init': {
      try {
        const configPath = path.join(configDir, CONFIG_FILE_NAME)
        if (await exists(configPath)) {
          process.stderr.write(`Config already exists at ${configPath}\n`)
          return 1
        }

        await writeConfig(defaultConfig(), configDir)
        process.stdout.write(`Config created at ${configPath}\n`)
        return 0
      } catch (err) {
        process.stderr.write(`${formatError(err)}\n`)
        return 1
      }
    }

    case 'show': {
      try {
        const config = await loadConfig(configDir)
        process.stdout.write(`${JSON.stringify(config, null, 2)}\n`)
        return 0
      } catch (err) {
        process.stderr.write(`${formatError(err)}\n`)
        return 1
      }
    }

    default:
      process.stderr.write('Usage: oidc-keyring config <init|show>\n')
      return 1
  }
}
