import { cancelOrderTool, orderStatusTool, updateOrderTool } from './orders';
import { productInformationTool } from './product';
import { storeInformationTool } from './storeInfo';
import { transferTool } from './transfer';

export const storefrontTools = [
  productInformationTool,
  orderStatusTool,
  updateOrderTool,
  cancelOrderTool,
  storeInformationTool,
  transferTool
];

export type { CallContext, HandoffRequest } from './context';
