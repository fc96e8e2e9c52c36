// packages/client/src/transport/auth.ts
import type { SheetsClientConfig } from '../config/client.config.js'
import { InvalidArgumentError, TransportError } from '../core/errors.js'

/**
 * Source of bearer tokens for the HTTP executor. Implementations cache and
 * refresh as they see fit; the executor asks once per request.
 */
export interface AccessTokenProvider {
  getAccessToken(): Promise<string>
}

export class StaticTokenProvider implements AccessTokenProvider {
  private readonly token: string

  constructor(token: string) {
    if (!token) {
      throw new InvalidArgumentError('access token must not be empty')
    }
    this.token = token
  }

  async getAccessToken(): Promise<string> {
    return this.token
  }
}

export type ServiceAccountOptions = {
  email?: string | null
  privateKey?: string | null
  keyFile?: string | null
  scopes: string[]
}

type JwtClient = {
  getAccessToken(): Promise<{ token?: string | null }>
}

/**
 * Service-account (JWT) credentials through googleapis. The library is
 * imported on first use; the JWT client caches and refreshes its token.
 */
export class ServiceAccountTokenProvider implements AccessTokenProvider {
  private readonly opts: ServiceAccountOptions
  private clientPromise: Promise<JwtClient> | null = null

  constructor(opts: ServiceAccountOptions) {
    if (!opts.keyFile && !(opts.email && opts.privateKey)) {
      throw new InvalidArgumentError('service account needs a key file, or an email and a private key')
    }
    this.opts = opts
  }

  async getAccessToken(): Promise<string> {
    let res: { token?: string | null }
    try {
      const client = await this.getClient()
      res = await client.getAccessToken()
    } catch (err) {
      throw new TransportError(`service account token request failed: ${errorMessage(err)}`, { cause: err })
    }
    if (!res.token) {
      throw new TransportError('service account token request returned no token')
    }
    return res.token
  }

  private getClient(): Promise<JwtClient> {
    if (this.clientPromise) return this.clientPromise

    this.clientPromise = (async () => {
      const { google } = await import('googleapis')
      return new google.auth.JWT({
        email: this.opts.email ?? undefined,
        key: this.opts.privateKey ?? undefined,
        keyFile: this.opts.keyFile ?? undefined,
        scopes: this.opts.scopes,
      })
    })()
    // a failed import or construction is retried on the next call
    this.clientPromise.catch(() => {
      this.clientPromise = null
    })

    return this.clientPromise
  }
}

/**
 * A pre-acquired token wins; otherwise service-account credentials.
 */
export function createTokenProvider(cfg: SheetsClientConfig): AccessTokenProvider {
  if (cfg.accessToken) return new StaticTokenProvider(cfg.accessToken)
  if (cfg.keyFile || (cfg.serviceAccountEmail && cfg.privateKey)) {
    return new ServiceAccountTokenProvider({
      email: cfg.serviceAccountEmail,
      privateKey: cfg.privateKey,
      keyFile: cfg.keyFile,
      scopes: cfg.scopes,
    })
  }
  throw new InvalidArgumentError('no credentials configured')
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
