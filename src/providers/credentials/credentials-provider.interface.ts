/**
 * Supplies the authentication query parameters attached to every outbound call.
 * The values are opaque to the providers.
 */
export interface CredentialsProvider {
  params(): Record<string, string>
}
