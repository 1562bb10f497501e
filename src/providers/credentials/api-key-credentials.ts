import { CredentialsProvider } from './credentials-provider.interface'
import { MissingCredentialsError } from './error/missing-credentials-error'

/** Single API key, sent as `apikey` unless the service names it differently. */
export class ApiKeyCredentials implements CredentialsProvider {
  private readonly apiKey: string

  constructor(
    apiKey: string | undefined,
    private readonly paramName = 'apikey',
  ) {
    if (!apiKey) {
      throw new MissingCredentialsError(paramName)
    }

    this.apiKey = apiKey
  }

  params(): Record<string, string> {
    return { [this.paramName]: this.apiKey }
  }
}
