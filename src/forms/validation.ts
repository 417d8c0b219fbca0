/**
 * Form Validation
 *
 * Checks run before anything is sent to the bot.
 * Error texts are returned to the browser as is.
 */

import type { FeedbackForm, OrderRequest } from './types.js';

export const FORM_ERRORS = {
  rateLimit: 'Too many requests. Please try again later.',
  privacyRequired: 'You must accept the personal data processing terms',
  nameRequired: 'Name is required',
  phoneRequired: 'Phone is required',
  phoneLength: 'Phone must contain 10 digits',
  nameTooShort: 'Name is too short',
  fakeName: 'Please enter your real name',
  submitFailed: 'Failed to send the request',
  orderFieldsMissing: 'Required fields are missing',
  orderPhoneInvalid: 'Invalid phone format',
  orderSubmitFailed: 'Failed to send the order',
  invalidPayload: 'Invalid request data',
  csrfInvalid: 'The form has expired. Please reload the page and try again.',
  internal: 'Internal server error',
} as const;

const PLACEHOLDER_NAMES = new Set(['test', 'example', 'тест', 'пример']);

/**
 * Keep digits only, then the last 10 (drops a leading 8 or +7)
 */
export function normalizePhone(raw: string): string {
  return raw.replace(/\D/g, '').slice(-10);
}

/**
 * Returns every problem found, in display order
 */
export function validateFeedback(form: FeedbackForm): string[] {
  const errors: string[] = [];

  if (!form.firstname) {
    errors.push(FORM_ERRORS.nameRequired);
  }

  if (!form.phone) {
    errors.push(FORM_ERRORS.phoneRequired);
  } else if (form.phone.length !== 10) {
    errors.push(FORM_ERRORS.phoneLength);
  } else if (form.firstname.length < 2) {
    errors.push(FORM_ERRORS.nameTooShort);
  } else if (PLACEHOLDER_NAMES.has(form.firstname.toLowerCase())) {
    errors.push(FORM_ERRORS.fakeName);
  }

  return errors;
}

/**
 * Returns the first problem, or null when the order can be sent
 */
export function validateOrder(request: OrderRequest): string | null {
  if (!request.name || !request.phone) {
    return FORM_ERRORS.orderFieldsMissing;
  }
  if (!/^\d{10}$/.test(request.phone)) {
    return FORM_ERRORS.orderPhoneInvalid;
  }
  return null;
}
