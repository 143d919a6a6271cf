import { RunContext, tool } from '@openai/agents';
import { z } from 'zod';
import { OrderChanges, OrderSummary, ShopifyAddress } from '../commerce/types';
import { ShopifyClient } from '../commerce/shopifyClient';
import { logger } from '../utils/logger';
import { CallContext, errorMessage, requireCallContext, toolLogContext } from './context';

const NO_ADDRESS = 'No address information available';
const NOT_CONNECTED = 'Order services are not available for this store right now.';

export interface FormattedOrder {
  order_number: number | string;
  order_date: string;
  total_price: string;
  payment_status: string;
  fulfillment_status: string;
  shipping_address: string;
  items: Array<{ name: string; quantity: number; price: string }>;
}

export interface OrderStatusResult {
  found: boolean;
  orders: FormattedOrder[];
  specific_order_id?: string | null;
  error?: string;
}

export interface OrderActionResult {
  success: boolean;
  order_id?: string;
  updated_fields?: string[];
  message?: string;
  error?: string;
}

export interface UpdateOrderArgs {
  order_id: string;
  email?: string | null;
  phone?: string | null;
  address1?: string | null;
  address2?: string | null;
  city?: string | null;
  last_name?: string | null;
  province_code?: string | null;
  country?: string | null;
  zip_code?: string | null;
}

/**
 * Name, street lines, "city, province, zip" and country, one per line.
 */
export const formatAddress = (address?: ShopifyAddress | null): string => {
  if (!address) {
    return NO_ADDRESS;
  }

  const lines: string[] = [];
  for (const part of [address.name, address.address1, address.address2]) {
    if (part) lines.push(part);
  }
  const locality = [address.city, address.province_code, address.zip].filter((part): part is string => Boolean(part));
  if (locality.length > 0) {
    lines.push(locality.join(', '));
  }
  if (address.country) {
    lines.push(address.country);
  }

  return lines.length > 0 ? lines.join('\n') : NO_ADDRESS;
};

export const formatOrder = (order: OrderSummary): FormattedOrder => ({
  order_number: order.order_number ?? 'N/A',
  order_date: order.created_at ? order.created_at.split('T')[0] : 'N/A',
  total_price: order.total_price ?? 'N/A',
  payment_status: order.financial_status ?? 'N/A',
  fulfillment_status: order.fulfillment_status || 'processing',
  shipping_address: formatAddress(order.shipping_address),
  items: (order.line_items ?? []).map((item) => ({
    name: item.name ?? 'Unknown item',
    quantity: item.quantity ?? 1,
    price: item.price ?? 'N/A'
  }))
});

const findOrderQuietly = async (commerce: ShopifyClient, orderId: string, ctx: CallContext) => {
  try {
    return await commerce.findOrder(orderId);
  } catch (error) {
    logger.error('Order lookup failed', error as Error, toolLogContext(ctx, 'find_order'), { orderId });
    return null;
  }
};

export const getOrderStatus = async (ctx: CallContext, orderId?: string | null): Promise<OrderStatusResult> => {
  const logContext = toolLogContext(ctx, 'get_order_status');
  logger.logToolCall('get_order_status', { orderId }, logContext);

  if (!ctx.commerce) {
    return { found: false, error: NOT_CONNECTED, orders: [] };
  }

  try {
    let orders: OrderSummary[] = [];
    let customerId: string | null = null;

    if (orderId) {
      const order = await findOrderQuietly(ctx.commerce, orderId, ctx);
      if (order) {
        orders = [order];
      }
    }

    if (orders.length === 0 && ctx.session.callerNumber) {
      customerId = ctx.session.customerId ?? (await ctx.commerce.fetchCustomerId(ctx.session.callerNumber));
      if (customerId) {
        ctx.session.customerId = customerId;
        orders = await ctx.commerce.getCustomerOrders(customerId);
      }
    }

    if (orders.length === 0) {
      let error = "I couldn't find any orders";
      if (orderId) error += ` matching #${orderId}`;
      if (customerId) error += ' associated with your account';
      logger.logToolResult('get_order_status', false, logContext);
      return { found: false, error, orders: [] };
    }

    logger.logToolResult('get_order_status', true, logContext);
    return {
      found: true,
      orders: orders.slice(0, 3).map(formatOrder),
      specific_order_id: orderId ?? null
    };
  } catch (error) {
    logger.error('Order status lookup failed', error as Error, logContext);
    return {
      found: false,
      error: `I encountered an error while retrieving order information: ${errorMessage(error)}`,
      orders: []
    };
  }
};

export const updatedFieldsOf = (args: UpdateOrderArgs): string[] => {
  const fields: string[] = [];
  if (args.email) fields.push('email');
  if (args.phone) fields.push('phone number');
  const addressParts = [args.address1, args.address2, args.city, args.last_name, args.province_code, args.country, args.zip_code];
  if (addressParts.some(Boolean)) fields.push('shipping address');
  return fields;
};

const toOrderChanges = (args: UpdateOrderArgs): OrderChanges => ({
  email: args.email ?? undefined,
  phone: args.phone ?? undefined,
  address1: args.address1 ?? undefined,
  address2: args.address2 ?? undefined,
  city: args.city ?? undefined,
  lastName: args.last_name ?? undefined,
  provinceCode: args.province_code ?? undefined,
  country: args.country ?? undefined,
  zip: args.zip_code ?? undefined
});

export const updateOrder = async (ctx: CallContext, args: UpdateOrderArgs): Promise<OrderActionResult> => {
  const logContext = toolLogContext(ctx, 'update_order');
  logger.logToolCall('update_order', { orderId: args.order_id, fields: updatedFieldsOf(args) }, logContext);

  if (!ctx.commerce) {
    return { success: false, error: NOT_CONNECTED };
  }

  try {
    const order = await findOrderQuietly(ctx.commerce, args.order_id, ctx);
    if (!order) {
      return { success: false, error: `I couldn't find order #${args.order_id}. Please verify the order number.` };
    }

    const updatedFields = updatedFieldsOf(args);
    if (updatedFields.length === 0) {
      return { success: false, error: "No update information provided. Please specify what you'd like to update." };
    }

    const updated = await ctx.commerce.updateOrder(String(order.id), toOrderChanges(args));
    if (!updated) {
      logger.logToolResult('update_order', false, logContext);
      return {
        success: false,
        error: `Unable to update order #${args.order_id}. The order may be fulfilled, canceled, or there might be a system error.`
      };
    }

    logger.logToolResult('update_order', true, logContext);
    return {
      success: true,
      order_id: args.order_id,
      updated_fields: updatedFields,
      message: `Successfully updated ${updatedFields.join(', ')} for order #${args.order_id}.`
    };
  } catch (error) {
    logger.error('Order update failed', error as Error, logContext);
    return { success: false, error: `I encountered an error while updating your order: ${errorMessage(error)}` };
  }
};

export const cancelOrder = async (
  ctx: CallContext,
  orderId: string,
  reason: string = 'Customer requested cancellation'
): Promise<OrderActionResult> => {
  const logContext = toolLogContext(ctx, 'cancel_order');
  logger.logToolCall('cancel_order', { orderId, reason }, logContext);

  if (!ctx.commerce) {
    return { success: false, error: NOT_CONNECTED };
  }

  try {
    const order = await findOrderQuietly(ctx.commerce, orderId, ctx);
    if (!order) {
      return { success: false, error: `I couldn't find order #${orderId}. Please verify the order number.` };
    }
    if (order.fulfillment_status === 'fulfilled') {
      return {
        success: false,
        error: `Order #${orderId} has already been fulfilled and cannot be canceled. Please contact customer support for assistance.`
      };
    }

    const cancelled = await ctx.commerce.cancelOrder(String(order.id), reason);
    logger.logToolResult('cancel_order', cancelled, logContext);
    if (!cancelled) {
      return {
        success: false,
        error: `Unable to cancel order #${orderId}. The order may already be fulfilled, shipped, or there might be a system error.`
      };
    }

    return {
      success: true,
      order_id: orderId,
      message: `Successfully canceled order #${orderId}. You'll receive a confirmation email shortly.`
    };
  } catch (error) {
    logger.error('Order cancellation failed', error as Error, logContext);
    return { success: false, error: `I encountered an error while canceling your order: ${errorMessage(error)}` };
  }
};

export const orderStatusTool = tool({
  name: 'get_order_status',
  description:
    'Get the status of a customer\'s order. With an order id or number it looks up that order, otherwise it finds recent orders for the caller.',
  parameters: z.object({
    order_id: z.string().nullable().describe('The order ID or order number, if the caller gave one')
  }),
  execute: async ({ order_id }, runContext?: RunContext<CallContext>) =>
    getOrderStatus(requireCallContext(runContext), order_id)
});

export const updateOrderTool = tool({
  name: 'update_order',
  description: 'Update a customer\'s order information, such as shipping address, email, or phone number.',
  parameters: z.object({
    order_id: z.string().describe('The order ID or order number to update'),
    email: z.string().nullable().describe('New email address'),
    phone: z.string().nullable().describe('New phone number'),
    address1: z.string().nullable().describe('New street address line 1'),
    address2: z.string().nullable().describe('New street address line 2'),
    city: z.string().nullable().describe('New city'),
    last_name: z.string().nullable().describe('New last name'),
    province_code: z.string().nullable().describe('New province/state code'),
    country: z.string().nullable().describe('New country'),
    zip_code: z.string().nullable().describe('New ZIP/postal code')
  }),
  execute: async (args, runContext?: RunContext<CallContext>) => updateOrder(requireCallContext(runContext), args)
});

export const cancelOrderTool = tool({
  name: 'cancel_order',
  description: 'Cancel a customer\'s order.',
  parameters: z.object({
    order_id: z.string().describe('The order ID or order number to cancel'),
    reason: z.string().nullable().describe('Reason for cancellation')
  }),
  execute: async ({ order_id, reason }, runContext?: RunContext<CallContext>) =>
    cancelOrder(requireCallContext(runContext), order_id, reason ?? undefined)
});
