import { parseArgs } from 'node:util'
import { formatError, formatKeyConfig } from '../output.js'
import { openProvider } from '../provider.js'

const USAGE =
  'Usage: oidc-keyring create-key <name> [--rotation-period <duration>] ' +
  '[--verification-ttl <duration>] [--algorithm RS256] [--audience <aud>]\n'

export async function createKeyCommand(args: string[]): Promise<number> {
  try {
    const { values, positionals } = parseArgs({
      args,
      options: {
        'rotation-period': { type: 'string' },
        'verification-ttl': { type: 'string' },
        algorithm: { type: 'string' },
        audience: { type: 'string' },
      },
      allowPositionals: true,
      strict: true,
    })

    const name = positionals[0]
    if (name === undefined) {
      process.stderr.write('Error: <name> is required\n')
      process.stderr.write(USAGE)
      return 1
    }

    const provider = await openProvider()
    const config = await provider.createKey(name, {
      rotationPeriod: values['rotation-period'],
      verificationTtl: values['verification-ttl'],
      algorithm: values.algorithm,
      audience: values.audience,
    })
    process.stdout.write(formatKeyConfig(config))
    return 0
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
}
