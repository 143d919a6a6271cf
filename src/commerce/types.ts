/**
 * Shopify Admin REST resources, limited to the fields this service reads or writes.
 */

type Nullable<T> = T | null;

export interface ShopifyAddress {
  name?: Nullable<string>;
  first_name?: Nullable<string>;
  last_name?: Nullable<string>;
  address1?: Nullable<string>;
  address2?: Nullable<string>;
  city?: Nullable<string>;
  province?: Nullable<string>;
  province_code?: Nullable<string>;
  zip?: Nullable<string>;
  country?: Nullable<string>;
  phone?: Nullable<string>;
}

export interface ShopifyLineItem {
  id?: number;
  name?: string;
  title?: string;
  quantity?: number;
  price?: string;
}

export interface ShopifyFulfillment {
  id?: number;
  status?: Nullable<string>;
  tracking_company?: Nullable<string>;
  tracking_number?: Nullable<string>;
}

export interface ShopifyOrder {
  id: number;
  order_number?: number;
  created_at?: string;
  updated_at?: string;
  processed_at?: Nullable<string>;
  cancelled_at?: Nullable<string>;
  financial_status?: Nullable<string>;
  fulfillment_status?: Nullable<string>;
  total_price?: string;
  subtotal_price?: string;
  total_tax?: string;
  currency?: string;
  email?: Nullable<string>;
  phone?: Nullable<string>;
  line_items?: ShopifyLineItem[];
  shipping_address?: Nullable<ShopifyAddress>;
  fulfillments?: ShopifyFulfillment[];
  payment_gateway_names?: string[];
  total_discounts?: string;
  total_weight?: number;
  tags?: string;
}

export const ORDER_FIELDS = [
  'id',
  'order_number',
  'created_at',
  'updated_at',
  'processed_at',
  'financial_status',
  'fulfillment_status',
  'total_price',
  'subtotal_price',
  'total_tax',
  'currency',
  'email',
  'phone',
  'line_items',
  'shipping_address',
  'fulfillments',
  'payment_gateway_names',
  'total_discounts',
  'total_weight',
  'tags'
] as const;

export type OrderField = (typeof ORDER_FIELDS)[number];

export type OrderSummary = Pick<ShopifyOrder, OrderField> & { customer_id?: string };

export interface ShopifyCustomer {
  id: number;
  email?: Nullable<string>;
  phone?: Nullable<string>;
  first_name?: Nullable<string>;
  last_name?: Nullable<string>;
}

export interface ShopifyVariant {
  id?: number;
  price?: string;
}

export interface ShopifyProduct {
  id: number;
  title: string;
  body_html?: Nullable<string>;
  vendor?: Nullable<string>;
  product_type?: Nullable<string>;
  tags?: Nullable<string>;
  variants?: ShopifyVariant[];
}

export interface ShopifyShop {
  id: number;
  name: string;
  domain?: string;
  email?: Nullable<string>;
  phone?: Nullable<string>;
  currency?: string;
}

export interface OrderChanges {
  email?: string;
  phone?: string;
  address1?: string;
  address2?: string;
  city?: string;
  lastName?: string;
  provinceCode?: string;
  country?: string;
  zip?: string;
}
