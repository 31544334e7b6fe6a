/**
 * Tool Factory
 *
 * Builds the per-session tool registry and the session configuration that
 * advertises those tools upstream. To add a tool, implement `Tool` and
 * register it in createToolRegistry().
 */

import type { EmailProvider } from '../providers/types.js';
import type { SessionUpdateMessage } from '../protocol.js';
import { ToolRegistry } from './registry.js';
import { EmailSummaryTool } from './email-summary.js';
import { AppointmentBookingTool } from './appointment-booking.js';
import { KnowledgeBaseTool } from './knowledge-base.js';
import { OrderStatusTool } from './order-status.js';

export * from './types.js';
export { ToolRegistry, ToolNotFoundError } from './registry.js';
export { EmailSummaryTool } from './email-summary.js';
export { AppointmentBookingTool } from './appointment-booking.js';
export { KnowledgeBaseTool, KNOWLEDGE_BASE } from './knowledge-base.js';
export { OrderStatusTool } from './order-status.js';

export interface ToolContext {
  emailProvider: EmailProvider;
  /** Session id to stamp on outgoing messages, resolved at call time */
  resolveSessionId: () => string | undefined;
}

export function createToolRegistry(context: ToolContext): ToolRegistry {
  const registry = new ToolRegistry();

  registry.register(new EmailSummaryTool(context.emailProvider, context.resolveSessionId));
  registry.register(new AppointmentBookingTool());
  registry.register(new KnowledgeBaseTool());
  registry.register(new OrderStatusTool());

  console.log(`[Tools] Initialized tool registry with ${registry.list().length} tools`);
  return registry;
}

const TOOL_USAGE_HINTS: Record<string, string> = {
  send_email_summary: 'when the customer wants a summary of the call or the call is ending',
  book_appointment: 'when the customer wants to schedule a meeting',
  lookup_information: 'when asked about policies, hours, or company info',
  check_order_status: 'when the customer asks about their order',
};

export function buildInstructions(registry: ToolRegistry): string {
  const names = registry.list().map((tool) => tool.name);
  const hints = names
    .filter((name) => TOOL_USAGE_HINTS[name] !== undefined)
    .map((name) => `- Use '${name}' ${TOOL_USAGE_HINTS[name]}`);

  return [
    'You are a helpful AI assistant for a customer service call center. ' +
      `You have access to the following tools to help customers: ${names.join(', ')}. ` +
      "Use these tools proactively when appropriate based on the customer's needs.",
    ...(hints.length > 0 ? ['For example:', ...hints] : []),
    'Always be polite, professional, and helpful.',
  ].join('\n');
}

export interface SessionOptions {
  voiceName: string;
}

export function buildSessionUpdate(registry: ToolRegistry, options: SessionOptions): SessionUpdateMessage {
  return {
    type: 'session.update',
    session: {
      instructions: buildInstructions(registry),
      turn_detection: {
        type: 'azure_semantic_vad',
        threshold: 0.3,
        prefix_padding_ms: 200,
        silence_duration_ms: 200,
        remove_filler_words: false,
        end_of_utterance_detection: {
          model: 'semantic_detection_v1',
          threshold: 0.01,
          timeout: 2,
        },
      },
      input_audio_noise_reduction: { type: 'azure_deep_noise_suppression' },
      input_audio_echo_cancellation: { type: 'server_echo_cancellation' },
      voice: {
        name: options.voiceName,
        type: 'azure-standard',
        temperature: 0.8,
      },
      tools: registry.getFunctionDefinitions(),
      tool_choice: 'auto',
    },
  };
}
