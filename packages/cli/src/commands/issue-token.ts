import { parseArgs } from 'node:util'
import { SUBJECT_CREDENTIAL_PREFIX } from 'oidc-keyring'
import { formatError } from '../output.js'
import { openProvider } from '../provider.js'

const USAGE = 'Usage: oidc-keyring issue-token <name> --subject <entity-id>\n'

export async function issueTokenCommand(args: string[]): Promise<number> {
  try {
    const { values, positionals } = parseArgs({
      args,
      options: {
        subject: { type: 'string' },
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
    if (values.subject === undefined) {
      process.stderr.write('Error: --subject is required\n')
      process.stderr.write(USAGE)
      return 1
    }

    const provider = await openProvider()
    const { token } = await provider.issueToken(`${SUBJECT_CREDENTIAL_PREFIX}${values.subject}`, name)
    process.stdout.write(`${token}\n`)
    return 0
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
}
