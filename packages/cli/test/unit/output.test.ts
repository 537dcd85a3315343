import { describe, it, expect, afterEach } from 'vitest'
import { bold, formatError, formatKeyConfig } from '../../src/output.js'

function setTTY(value: boolean | undefined): void {
  Object.defineProperty(process.stdout, 'isTTY', { value, configurable: true })
}

describe('formatError', () => {
  it('should format Error instances with name and message', () => {
    const err = new Error('something broke')
    expect(formatError(err)).toBe('Error: something broke')
  })

  it('should format custom error classes', () => {
    class NotFoundError extends Error {
      constructor(message: string) {
        super(message)
        this.name = 'NotFoundError'
      }
    }
    expect(formatError(new NotFoundError('no named key was stored at "svc"'))).toBe(
      'NotFoundError: no named key was stored at "svc"',
    )
  })

  it('should stringify non-Error values', () => {
    expect(formatError('string error')).toBe('string error')
    expect(formatError(42)).toBe('42')
    expect(formatError(null)).toBe('null')
  })
})

describe('bold', () => {
  afterEach(() => {
    setTTY(undefined)
  })

  it('should return plain text when stdout is not a TTY', () => {
    setTTY(false)
    expect(bold('hello')).toBe('hello')
  })

  it('should return plain text when stdout.isTTY is undefined', () => {
    setTTY(undefined)
    expect(bold('world')).toBe('world')
  })

  it('should wrap in ANSI bold when stdout is a TTY', () => {
    setTTY(true)
    expect(bold('hello')).toBe('\x1b[1mhello\x1b[22m')
  })
})

describe('formatKeyConfig', () => {
  afterEach(() => {
    setTTY(undefined)
  })

  it('should align fields in a column', () => {
    setTTY(false)
    const output = formatKeyConfig({
      name: 'svc',
      algorithm: 'RS256',
      rotationPeriod: '1h',
      verificationTtl: '1h',
      audience: 'oidc-keyring',
    })
    expect(output).toBe(
      'name              svc\n' +
        'algorithm         RS256\n' +
        'rotation_period   1h\n' +
        'verification_ttl  1h\n' +
        'audience          oidc-keyring\n',
    )
  })
})
