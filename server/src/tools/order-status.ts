/**
 * Order Status Tool
 *
 * Mock order lookup against a small in-memory order table.
 */

import { stringArg, type Tool, type ToolArguments, type ToolParameterSchema, type ToolResult } from './types.js';

export interface OrderRecord {
  order_id: string;
  status: 'processing' | 'shipped' | 'delivered';
  items: string[];
  total: string;
  tracking_number: string | null;
  estimated_delivery: string;
}

const DAY_MS = 24 * 60 * 60 * 1000;

function formatDate(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${date.getFullYear()}-${month}-${day}`;
}

export function createMockOrders(now: Date): Map<string, OrderRecord> {
  const orders: OrderRecord[] = [
    {
      order_id: 'ORD-12345',
      status: 'shipped',
      items: ['Product A', 'Product B'],
      total: '$149.99',
      tracking_number: '1Z999AA10123456784',
      estimated_delivery: formatDate(new Date(now.getTime() + 2 * DAY_MS)),
    },
    {
      order_id: 'ORD-67890',
      status: 'processing',
      items: ['Product C'],
      total: '$79.99',
      tracking_number: null,
      estimated_delivery: formatDate(new Date(now.getTime() + 5 * DAY_MS)),
    },
  ];
  return new Map(orders.map((order) => [order.order_id, order]));
}

export class OrderStatusTool implements Tool {
  readonly name = 'check_order_status';
  readonly description =
    "Checks the status of a customer's order. " +
    'Use this when the caller wants to know about their order status, tracking, or delivery information.';
  readonly parameters: ToolParameterSchema = {
    type: 'object',
    properties: {
      order_id: {
        type: 'string',
        description: 'The order ID or order number (e.g., ORD-12345)',
      },
      email: {
        type: 'string',
        description: "Customer's email address associated with the order (for verification)",
      },
    },
    required: ['order_id'],
  };

  private readonly orders: Map<string, OrderRecord>;

  constructor(now: Date = new Date()) {
    this.orders = createMockOrders(now);
  }

  async execute(args: ToolArguments): Promise<ToolResult> {
    const orderId = (stringArg(args, 'order_id') ?? '').trim().toUpperCase();
    const order = this.orders.get(orderId);

    if (!order) {
      return {
        success: false,
        message: `Order ${orderId} not found. Please verify the order number is correct.`,
        suggestion: 'Try checking your order confirmation email for the correct order number.',
      };
    }

    console.log(`[Tools] Order status retrieved: ${orderId}`);

    const result: ToolResult = {
      success: true,
      message: order.tracking_number
        ? `Order ${orderId} is ${order.status}. Tracking number: ${order.tracking_number}`
        : `Order ${orderId} is ${order.status}. No tracking number yet.`,
      order_id: order.order_id,
      status: order.status,
      items: [...order.items],
      total: order.total,
      estimated_delivery: order.estimated_delivery,
    };

    if (order.tracking_number) {
      result.tracking_number = order.tracking_number;
    }

    return result;
  }
}
