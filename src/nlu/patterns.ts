/**
 * Pattern-based entity extraction, used when the model-based extractor fails.
 */

export type AddressField =
  | 'address1'
  | 'address2'
  | 'city'
  | 'last_name'
  | 'country'
  | 'zip'
  | 'province_code';

export type AddressEntities = Partial<Record<AddressField, string>>;

const ORDER_ID_PATTERNS = [
  /order\s+(?:#|number|id|no\.?)\s*(\d+)/i,
  /order\s+(\d+)/i,
  /#(\d+)/i,
  /(\d{6,})/
];

const EMAIL_PATTERN = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/;

const PHONE_PATTERNS = [
  /\b(?:\+\d{1,3}[-.\s]?)?(?:\(?\d{3}\)?[-.\s]?)?(?:\d{3}[-.\s]?\d{4})\b/,
  /\b\d{10}\b/,
  /\b\d{3}[-.\s]?\d{3}[-.\s]?\d{4}\b/
];

// Applied in order; a later match for the same field wins.
const ADDRESS_PATTERNS: Array<[RegExp, AddressField]> = [
  [/address(?:\s+\d+)?\s+(?:is|:)?\s+([^.,]+)/i, 'address1'],
  [/address\s*line\s*1\s*(?:is|:)?\s+([^.,]+)/i, 'address1'],
  [/address\s*line\s*2\s*(?:is|:)?\s+([^.,]+)/i, 'address2'],
  [/city\s+(?:is|:)?\s+([^.,]+)/i, 'city'],
  [/(?:last name|surname|family name)\s+(?:is|:)?\s+([^.,]+)/i, 'last_name'],
  [/country\s+(?:is|:)?\s+([^.,]+)/i, 'country'],
  [/(?:zip|postal|zip code|postal code)\s+(?:is|:)?\s+([^.,\s]+)/i, 'zip'],
  [/(?:state|province)\s+(?:is|:)?\s+([^.,]+)/i, 'province_code']
];

const PRODUCT_KEYWORD_PATTERN = /\b(?:shirt|shoes|jacket|pants|dress|product|item)\b/gi;

export const extractOrderId = (text: string): string | null => {
  for (const pattern of ORDER_ID_PATTERNS) {
    const match = pattern.exec(text);
    if (match) {
      return match[1];
    }
  }
  return null;
};

export const extractEmail = (text: string): string | null => EMAIL_PATTERN.exec(text)?.[0] ?? null;

export const extractPhone = (text: string): string | null => {
  for (const pattern of PHONE_PATTERNS) {
    const match = pattern.exec(text);
    if (match) {
      return match[0].replace(/[^\d+]/g, '');
    }
  }
  return null;
};

export const extractAddress = (text: string): AddressEntities => {
  const address: AddressEntities = {};
  for (const [pattern, field] of ADDRESS_PATTERNS) {
    const match = pattern.exec(text);
    if (match) {
      address[field] = match[1].trim();
    }
  }
  return address;
};

export const extractProductKeywords = (text: string): string[] => text.match(PRODUCT_KEYWORD_PATTERN) ?? [];
