import { CredentialsProvider } from './credentials-provider.interface'
import { MissingCredentialsError } from './error/missing-credentials-error'

export interface AppCodeCredentialsConfig {
  appId?: string
  appCode?: string
}

/** HERE generation 6.2 `app_id` + `app_code` pair. */
export class AppCodeCredentials implements CredentialsProvider {
  private readonly appId: string
  private readonly appCode: string

  constructor(config: AppCodeCredentialsConfig) {
    if (!config.appId || !config.appCode) {
      throw new MissingCredentialsError('app_id/app_code')
    }

    this.appId = config.appId
    this.appCode = config.appCode
  }

  params(): Record<string, string> {
    return { app_id: this.appId, app_code: this.appCode }
  }
}
