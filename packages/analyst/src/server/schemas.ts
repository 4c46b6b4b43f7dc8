import { z } from "zod"

export const askInput = z.object({
  question: z.string().max(4_000),
})

export const documentInput = z.object({
  source: z.string().trim().min(1).max(256),
  text: z.string().min(1),
})

export const evaluateInput = z.object({
  limit: z.coerce.number().int().min(1).max(500).optional(),
})
