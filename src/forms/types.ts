/**
 * Types for submitted forms
 */

/**
 * Feedback form after trimming and phone normalization
 */
export interface FeedbackForm {
  firstname: string;
  lastname: string;
  patronymic: string;
  /** Last 10 digits of the submitted phone */
  phone: string;
  message: string;
}

export interface OrderItem {
  name: string;
  quantity: number | string;
  unit: string;
  pricePerUnit: number | string;
  price: number | string;
}

/**
 * JSON body of the order form
 */
export interface OrderRequest {
  name?: string;
  phone?: string;
  comment?: string;
  order: {
    items: OrderItem[];
    total: number | string;
  };
}
