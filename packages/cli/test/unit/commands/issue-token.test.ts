import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'

const mockInit = vi.fn()

vi.mock('oidc-keyring', () => ({
  OidcProvider: {
    init: mockInit,
  },
  StaticIdentityResolver: class {},
  SUBJECT_CREDENTIAL_PREFIX: 'subject:',
}))

describe('issueTokenCommand', () => {
  let stderrOutput: string
  let stdoutOutput: string

  beforeEach(() => {
    stderrOutput = ''
    stdoutOutput = ''
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk) => {
      stderrOutput += String(chunk)
      return true
    })
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk) => {
      stdoutOutput += String(chunk)
      return true
    })
  })

  afterEach(() => {
    vi.restoreAllMocks()
    vi.clearAllMocks()
  })

  it('should require a subject', async () => {
    const { issueTokenCommand } = await import('../../../src/commands/issue-token.js')
    expect(await issueTokenCommand(['svc'])).toBe(1)
    expect(stderrOutput).toContain('Error: --subject is required')
    expect(mockInit).not.toHaveBeenCalled()
  })

  it('should print only the token', async () => {
    const mockProvider = {
      issueToken: vi.fn().mockResolvedValue({ token: 'header.payload.signature', keys: { keys: [] } }),
    }
    mockInit.mockResolvedValue(mockProvider)
    const { issueTokenCommand } = await import('../../../src/commands/issue-token.js')

    expect(await issueTokenCommand(['svc', '--subject', 'entity-42'])).toBe(0)
    expect(mockProvider.issueToken).toHaveBeenCalledWith('subject:entity-42', 'svc')
    expect(stdoutOutput).toBe('header.payload.signature\n')
  })
})
