import { OidcProvider, StaticIdentityResolver } from 'oidc-keyring'

/**
 * Config directory override. Unset or empty means the platform default.
 * @internal
 */
export function configDirFromEnv(): string | undefined {
  const dir = process.env.OIDC_KEYRING_CONFIG_DIR
  return dir === undefined || dir === '' ? undefined : dir
}

/**
 * Open the provider for the configured directory. Tokens are issued for
 * `subject:<id>` credentials only.
 * @internal
 */
export function openProvider(): Promise<OidcProvider> {
  return OidcProvider.init({
    configDir: configDirFromEnv(),
    resolver: new StaticIdentityResolver({}, { allowSubjectCredentials: true }),
  })
}
