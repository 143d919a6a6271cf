import axios, { AxiosError, AxiosInstance, AxiosResponse } from 'axios';
import { logger } from '../utils/logger';
import { CommerceAuthError, CommerceRequestError } from './errors';
import {
  OrderChanges,
  OrderSummary,
  ShopifyAddress,
  ShopifyCustomer,
  ShopifyOrder,
  ShopifyProduct,
  ShopifyShop
} from './types';

export interface ShopifyClientConfig {
  shopDomain: string;
  accessToken: string;
  apiVersion?: string;
  timeoutMs?: number;
}

const PAGE_LIMIT = 250;

/**
 * `my-store.myshopify.com`, `https://my-store.myshopify.com/` and a full admin
 * URL all resolve to `https://my-store.myshopify.com/admin/api/{version}`.
 */
export const adminBaseUrl = (shopDomain: string, apiVersion: string): string => {
  const domain = shopDomain.trim().replace(/^https?:\/\//i, '').replace(/\/.*$/, '');
  return `https://${domain}/admin/api/${apiVersion}`;
};

export const pickOrderFields = (order: ShopifyOrder): OrderSummary => {
  const {
    id,
    order_number,
    created_at,
    updated_at,
    processed_at,
    financial_status,
    fulfillment_status,
    total_price,
    subtotal_price,
    total_tax,
    currency,
    email,
    phone,
    line_items,
    shipping_address,
    fulfillments,
    payment_gateway_names,
    total_discounts,
    total_weight,
    tags
  } = order;
  return {
    id,
    order_number,
    created_at,
    updated_at,
    processed_at,
    financial_status,
    fulfillment_status,
    total_price,
    subtotal_price,
    total_tax,
    currency,
    email,
    phone,
    line_items,
    shipping_address,
    fulfillments,
    payment_gateway_names,
    total_discounts,
    total_weight,
    tags
  };
};

export const buildOrderUpdate = (orderId: string, changes: OrderChanges) => {
  const shippingAddress: ShopifyAddress = {};
  if (changes.address1) shippingAddress.address1 = changes.address1;
  if (changes.address2) shippingAddress.address2 = changes.address2;
  if (changes.city) shippingAddress.city = changes.city;
  if (changes.lastName) shippingAddress.last_name = changes.lastName;
  if (changes.country) shippingAddress.country = changes.country;
  if (changes.provinceCode) shippingAddress.province_code = changes.provinceCode;
  if (changes.zip) shippingAddress.zip = changes.zip;

  const order: {
    id: string;
    email?: string;
    contact_email?: string;
    phone?: string;
    shipping_address?: ShopifyAddress;
  } = { id: orderId };
  if (changes.email) {
    order.email = changes.email;
    order.contact_email = changes.email;
  }
  if (changes.phone) {
    order.phone = changes.phone;
  }
  if (Object.keys(shippingAddress).length > 0) {
    order.shipping_address = shippingAddress;
  }
  return { order };
};

const statusOf = (error: unknown): number | undefined =>
  axios.isAxiosError(error) ? error.response?.status : undefined;

/**
 * HTTP client for the Shopify Admin REST API of a single store.
 */
export class ShopifyClient {
  private readonly http: AxiosInstance;
  readonly shopName: string;

  constructor(config: ShopifyClientConfig) {
    const baseURL = adminBaseUrl(config.shopDomain, config.apiVersion ?? '2025-01');
    this.shopName = new URL(baseURL).hostname.split('.')[0];

    this.http = axios.create({
      baseURL,
      headers: {
        'Content-Type': 'application/json',
        'X-Shopify-Access-Token': config.accessToken
      },
      timeout: config.timeoutMs ?? 10000
    });

    this.http.interceptors.response.use(
      (response) => {
        logger.debug('Shopify API call succeeded', { operation: 'shopify_request' }, {
          method: response.config.method?.toUpperCase(),
          url: response.config.url,
          status: response.status
        });
        return response;
      },
      (error: AxiosError) => {
        logger.warn('Shopify API call failed', { operation: 'shopify_request' }, {
          method: error.config?.method?.toUpperCase(),
          url: error.config?.url,
          status: error.response?.status,
          message: error.message
        });
        return Promise.reject(error);
      }
    );
  }

  // Customers

  async fetchCustomerId(phone: string): Promise<string | null> {
    const data = await this.request('fetch_customer_id', () =>
      this.http.get<{ customers?: ShopifyCustomer[] }>('/customers/search.json', {
        params: { query: `phone:${phone}` }
      })
    );
    const customer = (data.customers ?? []).find((candidate) => candidate.phone === phone);
    return customer ? String(customer.id) : null;
  }

  async getCustomerById(customerId: string): Promise<ShopifyCustomer | null> {
    const data = await this.requestOrNull('get_customer', () =>
      this.http.get<{ customer?: ShopifyCustomer }>(`/customers/${customerId}.json`)
    );
    return data?.customer ?? null;
  }

  async getAllCustomers(): Promise<ShopifyCustomer[]> {
    const data = await this.request('get_all_customers', () =>
      this.http.get<{ customers?: ShopifyCustomer[] }>('/customers.json', { params: { limit: PAGE_LIMIT } })
    );
    return data.customers ?? [];
  }

  // Orders

  async getCustomerOrders(customerId: string): Promise<OrderSummary[]> {
    const data = await this.request('get_customer_orders', () =>
      this.http.get<{ orders?: ShopifyOrder[] }>(`/customers/${customerId}/orders.json`, {
        params: { status: 'any' }
      })
    );
    return (data.orders ?? []).map((order) => ({ customer_id: customerId, ...pickOrderFields(order) }));
  }

  async getAllOrders(): Promise<OrderSummary[]> {
    const data = await this.request('get_all_orders', () =>
      this.http.get<{ orders?: ShopifyOrder[] }>('/orders.json', {
        params: { status: 'any', limit: PAGE_LIMIT }
      })
    );
    return (data.orders ?? []).map(pickOrderFields);
  }

  async getOrder(orderId: string): Promise<OrderSummary | null> {
    const order = await this.fetchOrder(orderId);
    return order ? pickOrderFields(order) : null;
  }

  /**
   * Finds an order by its id or its customer-facing order number.
   */
  async findOrder(idOrNumber: string): Promise<OrderSummary | null> {
    const wanted = idOrNumber.trim().replace(/^#/, '');
    const orders = await this.getAllOrders();
    return orders.find((order) => String(order.id) === wanted || String(order.order_number) === wanted) ?? null;
  }

  /**
   * Returns false when the store refuses the cancellation (HTTP 422).
   */
  async cancelOrder(orderId: string, reason?: string): Promise<boolean> {
    try {
      await this.http.post(`/orders/${orderId}/cancel.json`, reason ? { reason } : {});
      return true;
    } catch (error) {
      if (statusOf(error) === 422) {
        logger.warn('Order cancellation refused by store', { operation: 'cancel_order' }, { orderId });
        return false;
      }
      return this.handleError(error, 'cancel_order');
    }
  }

  /**
   * Patches contact details and shipping address. Returns null when the order
   * does not exist, is fulfilled, or is cancelled.
   */
  async updateOrder(orderId: string, changes: OrderChanges): Promise<OrderSummary | null> {
    const current = await this.fetchOrder(orderId);
    if (!current) {
      logger.warn('Order not found for update', { operation: 'update_order' }, { orderId });
      return null;
    }
    if (current.fulfillment_status === 'fulfilled') {
      logger.warn('Order already fulfilled, update skipped', { operation: 'update_order' }, { orderId });
      return null;
    }
    if (current.cancelled_at) {
      logger.warn('Order cancelled, update skipped', { operation: 'update_order' }, { orderId });
      return null;
    }

    const payload = buildOrderUpdate(orderId, changes);
    const data = await this.request('update_order', () =>
      this.http.put<{ order?: ShopifyOrder }>(`/orders/${orderId}.json`, payload)
    );

    logger.info('Order updated', { operation: 'update_order' }, {
      orderId,
      fields: Object.keys(payload.order).filter((key) => key !== 'id')
    });
    return data.order ? pickOrderFields(data.order) : null;
  }

  // Products & shop

  async getAllProducts(): Promise<ShopifyProduct[]> {
    const data = await this.request('get_all_products', () =>
      this.http.get<{ products?: ShopifyProduct[] }>('/products.json', { params: { limit: PAGE_LIMIT } })
    );
    return data.products ?? [];
  }

  async getProductById(productId: string): Promise<ShopifyProduct | null> {
    const data = await this.requestOrNull('get_product', () =>
      this.http.get<{ product?: ShopifyProduct }>(`/products/${productId}.json`)
    );
    return data?.product ?? null;
  }

  async getShopDetails(): Promise<ShopifyShop> {
    const data = await this.request('get_shop_details', () => this.http.get<{ shop: ShopifyShop }>('/shop.json'));
    return data.shop;
  }

  private async fetchOrder(orderId: string): Promise<ShopifyOrder | null> {
    const data = await this.requestOrNull('get_order', () =>
      this.http.get<{ order?: ShopifyOrder }>(`/orders/${orderId}.json`)
    );
    return data?.order ?? null;
  }

  private async request<T>(operation: string, send: () => Promise<AxiosResponse<T>>): Promise<T> {
    try {
      const response = await send();
      return response.data;
    } catch (error) {
      return this.handleError(error, operation);
    }
  }

  private async requestOrNull<T>(operation: string, send: () => Promise<AxiosResponse<T>>): Promise<T | null> {
    try {
      const response = await send();
      return response.data;
    } catch (error) {
      if (statusOf(error) === 404) {
        return null;
      }
      return this.handleError(error, operation);
    }
  }

  private handleError(error: unknown, operation: string): never {
    const status = statusOf(error);
    if (status === 401) {
      throw new CommerceAuthError(operation);
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new CommerceRequestError(`Shopify ${operation} failed: ${message}`, operation, status);
  }
}
