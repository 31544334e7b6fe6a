/**
 * Knowledge Base Tool
 *
 * Answers company-information questions from a fixed topic table.
 */

import { stringArg, type Tool, type ToolArguments, type ToolParameterSchema, type ToolResult } from './types.js';

export const KNOWLEDGE_BASE: Readonly<Record<string, string>> = {
  business_hours: 'Our business hours are Monday-Friday 9am-5pm EST',
  return_policy:
    'We offer a 30-day money-back guarantee on all products. Items must be in original condition.',
  shipping:
    'Standard shipping takes 5-7 business days. Express shipping is available for 2-3 day delivery.',
  support: 'For technical support, email support@example.com or call 1-800-SUPPORT',
  pricing:
    'Our pricing varies by plan. Basic plan starts at $9.99/month, Professional at $29.99/month, and Enterprise is custom priced.',
  contact: 'You can reach us at contact@example.com or call 1-800-CONTACT',
  cancellation:
    'You can cancel your subscription anytime from your account settings. No cancellation fees apply.',
  warranty:
    'All products come with a 1-year manufacturer warranty covering defects in materials and workmanship.',
};

export class KnowledgeBaseTool implements Tool {
  readonly name = 'lookup_information';
  readonly description =
    'Looks up information from the company knowledge base. ' +
    'Use this when the caller asks about business hours, policies, pricing, shipping, ' +
    'support, or other company information.';
  readonly parameters: ToolParameterSchema = {
    type: 'object',
    properties: {
      topic: {
        type: 'string',
        description:
          'The topic to look up. Examples: business_hours, return_policy, ' +
          'shipping, support, pricing, contact, cancellation, warranty',
      },
      query: {
        type: 'string',
        description: 'Additional context or specific question about the topic',
      },
    },
    required: ['topic'],
  };

  constructor(private readonly entries: Readonly<Record<string, string>> = KNOWLEDGE_BASE) {}

  async execute(args: ToolArguments): Promise<ToolResult> {
    const topic = (stringArg(args, 'topic') ?? '').trim().toLowerCase();
    const availableTopics = Object.keys(this.entries);

    if (topic) {
      const exact = this.entries[topic];
      if (exact !== undefined) {
        return found(topic, exact);
      }

      // Partial match in either direction: "hours" -> business_hours, "shipping_cost" -> shipping
      for (const [key, information] of Object.entries(this.entries)) {
        if (key.includes(topic) || topic.includes(key)) {
          return found(key, information);
        }
      }
    }

    return {
      success: false,
      message: `No information found for topic: ${topic}`,
      available_topics: availableTopics,
    };
  }
}

function found(topic: string, information: string): ToolResult {
  return {
    success: true,
    topic,
    information,
    message: `Found information about ${topic}`,
  };
}
