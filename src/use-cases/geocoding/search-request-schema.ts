import { z } from 'zod'

const optionalText = z
  .string()
  .trim()
  .nullish()
  .transform((value) => (value ? value : undefined))

export const searchRequestSchema = z.object({
  id: z.union([z.string().min(1), z.number()]).transform(String),
  address: optionalText,
  city: optionalText,
  state: optionalText,
  country: optionalText,
})

export const searchRequestListSchema = z.array(searchRequestSchema)

export type SearchRequestInput = z.input<typeof searchRequestSchema>
