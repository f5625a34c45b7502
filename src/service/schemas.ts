/**
 * Service Schemas
 */

import { z } from 'zod'

/** Create/update payload */
export const UserDataInputSchema = z.object({
  name: z.string().trim().min(1).max(100),
  email: z.string().email(),
  message: z.string().max(2000),
})

export const UserDataSchema = UserDataInputSchema.extend({
  id: z.number().int().positive(),
})

export const ItemIdSchema = z.coerce.number().int().positive()

export const PaginationSchema = z.object({
  skip: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(0).max(1000).default(100),
})

export type UserDataInput = z.infer<typeof UserDataInputSchema>
export type UserData = z.infer<typeof UserDataSchema>
export type Pagination = z.infer<typeof PaginationSchema>
