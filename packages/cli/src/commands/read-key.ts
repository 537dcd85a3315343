import { parseArgs } from 'node:util'
import { formatError, formatKeyConfig } from '../output.js'
import { openProvider } from '../provider.js'

export async function readKeyCommand(args: string[]): Promise<number> {
  try {
    const { positionals } = parseArgs({ args, allowPositionals: true, strict: true })

    const name = positionals[0]
    if (name === undefined) {
      process.stderr.write('Error: <name> is required\n')
      process.stderr.write('Usage: oidc-keyring read-key <name>\n')
      return 1
    }

    const provider = await openProvider()
    process.stdout.write(formatKeyConfig(await provider.readKey(name)))
    return 0
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
}
