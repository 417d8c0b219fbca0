export { FORM_ERRORS, normalizePhone, validateFeedback, validateOrder } from './validation.js';
export {
  formatPhone,
  formatTimestamp,
  buildFeedbackMessage,
  buildOrderMessage,
} from './formatter.js';
export type { FeedbackForm, OrderItem, OrderRequest } from './types.js';
