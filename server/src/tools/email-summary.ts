/**
 * Email Summary Tool
 *
 * Sends a summary of the call to an address the caller provides.
 */

import type { EmailProvider } from '../providers/types.js';
import { stringArg, type Tool, type ToolArguments, type ToolParameterSchema, type ToolResult } from './types.js';

export class EmailSummaryTool implements Tool {
  readonly name = 'send_email_summary';
  readonly description =
    'Sends an email with a summary of the call conversation. ' +
    'Use this when the caller asks for a summary or when the call is ending.';
  readonly parameters: ToolParameterSchema = {
    type: 'object',
    properties: {
      email: { type: 'string', description: "The recipient's email address" },
      summary: {
        type: 'string',
        description: 'A concise summary of the call including the key points discussed',
      },
    },
    required: ['email', 'summary'],
  };

  /**
   * @param resolveSessionId - returns the id of the session the tool belongs to at send time
   */
  constructor(
    private readonly emailProvider: EmailProvider,
    private readonly resolveSessionId: () => string | undefined
  ) {}

  async execute(args: ToolArguments): Promise<ToolResult> {
    const email = stringArg(args, 'email');
    const summary = stringArg(args, 'summary');

    if (!email || !summary) {
      return { success: false, message: 'Email and summary are required' };
    }

    const sent = await this.emailProvider.sendCallSummary({
      to: email,
      subject: 'Call Summary',
      summary,
      callId: this.resolveSessionId(),
    });

    return {
      success: sent,
      message: sent ? 'Email sent successfully' : 'Failed to send email',
    };
  }
}
