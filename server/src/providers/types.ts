/**
 * Provider Interfaces
 *
 * Narrow contracts for the collaborators a relay session depends on but does
 * not implement: upstream credential acquisition and email delivery.
 */

/**
 * Credential Provider - produces the auth headers for the upstream connection
 */
export interface CredentialProvider {
  readonly name: string;

  /**
   * Resolve headers for a new upstream connection. Called once per session,
   * so short-lived tokens are fetched fresh every time.
   */
  getAuthHeaders(): Promise<Record<string, string>>;
}

/**
 * Email Provider - delivers call summaries
 */
export interface EmailProvider {
  readonly name: string;

  /**
   * @returns true when the message was accepted for delivery
   */
  sendCallSummary(message: CallSummaryEmail): Promise<boolean>;
}

export interface CallSummaryEmail {
  to: string;
  subject: string;
  summary: string;
  /** Session the summary belongs to */
  callId?: string;
}
