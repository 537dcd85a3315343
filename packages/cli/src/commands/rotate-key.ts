import { parseArgs } from 'node:util'
import { formatError } from '../output.js'
import { openProvider } from '../provider.js'

export async function rotateKeyCommand(args: string[]): Promise<number> {
  try {
    const { positionals } = parseArgs({ args, allowPositionals: true, strict: true })

    const name = positionals[0]
    if (name === undefined) {
      process.stderr.write('Error: <name> is required\n')
      process.stderr.write('Usage: oidc-keyring rotate-key <name>\n')
      return 1
    }

    const provider = await openProvider()
    const key = await provider.rotateKey(name)
    process.stdout.write(`Key "${name}" rotated; now signing with ${key.id}.\n`)
    return 0
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
}
