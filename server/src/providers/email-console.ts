/**
 * Console Email Provider
 *
 * Simulates delivery by writing the message to the log. Always succeeds.
 */

import type { CallSummaryEmail, EmailProvider } from './types.js';

export class ConsoleEmailProvider implements EmailProvider {
  readonly name = 'console';

  async sendCallSummary(message: CallSummaryEmail): Promise<boolean> {
    const rule = '='.repeat(60);
    console.log(rule);
    console.log('[Email] SIMULATED EMAIL SENT');
    console.log(`[Email] To: ${message.to}`);
    console.log(`[Email] Subject: ${message.subject}`);
    console.log(`[Email] Call ID: ${message.callId ?? 'N/A'}`);
    console.log('-'.repeat(60));
    console.log(message.summary);
    console.log(rule);
    return true;
  }
}
