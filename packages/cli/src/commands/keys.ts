import { parseArgs } from 'node:util'
import { formatError } from '../output.js'
import { openProvider } from '../provider.js'

export async function keysCommand(args: string[]): Promise<number> {
  try {
    const { values } = parseArgs({
      args,
      options: {
        name: { type: 'string' },
      },
      strict: true,
    })

    const provider = await openProvider()
    const jwks = await provider.publicKeys(values.name)
    process.stdout.write(`${JSON.stringify(jwks, null, 2)}\n`)
    return 0
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
}
