/**
 * Customer Domain Types
 *
 * Type definitions for customer registry operations.
 */

import { z } from 'zod';

export interface Customer {
  readonly document: string;
  readonly name: string;
  readonly birthDate: string;
  readonly address: string;
  readonly createdAt: Date;
}

/**
 * Zod schema for the free-text customer fields.
 * The document is checked separately by the document validator.
 */
export const CreateCustomerSchema = z.object({
  document: z.string(),
  name: z.string().trim().min(1, 'name is required').max(200),
  birthDate: z.string().trim().min(1, 'birth date is required'),
  address: z.string().trim().min(1, 'address is required').max(300),
});

export type CreateCustomerParams = z.input<typeof CreateCustomerSchema>;
