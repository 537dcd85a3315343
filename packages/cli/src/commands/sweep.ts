import { formatError } from '../output.js'
import { openProvider } from '../provider.js'

export async function sweepCommand(_args: string[]): Promise<number> {
  try {
    const provider = await openProvider()
    const removed = await provider.sweepExpiredKeys()
    process.stdout.write(
      `Removed ${String(removed)} expired public ${removed === 1 ? 'key' : 'keys'}.\n`,
    )
    return 0
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
}
