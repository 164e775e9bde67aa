import { z } from 'zod'
import { BadRequestError } from '@csvapi/gateway-core'
import { DEFAULT_HEAD_ROWS } from '../query/dataset-queries'

const BUCKET_PATH_REQUIRED = 'bucket_path parameter is required'
const FILTER_PARAMS_REQUIRED = 'Both column and value parameters are required'

function requiredString(message: string) {
  return z.string({ required_error: message, invalid_type_error: message }).min(1, message)
}

/** Integer row count; anything unparsable falls back to the default. */
function parseRowCount(raw: string | undefined): number {
  const value = raw?.trim()
  return value && /^[+-]?\d+$/.test(value) ? Number.parseInt(value, 10) : DEFAULT_HEAD_ROWS
}

export const datasetQuerySchema = z.object({
  bucket_path: requiredString(BUCKET_PATH_REQUIRED),
})

export const headQuerySchema = datasetQuerySchema.extend({
  n: z.string().optional().catch(undefined).transform(parseRowCount),
})

export const filterQuerySchema = datasetQuerySchema.extend({
  column: requiredString(FILTER_PARAMS_REQUIRED),
  value: requiredString(FILTER_PARAMS_REQUIRED),
})

export const columnParamsSchema = z.object({
  column: requiredString('column parameter is required'),
})

export const docsParamsSchema = z.object({
  user_id: requiredString('user_id parameter is required'),
})

export type DatasetQuery = z.infer<typeof datasetQuerySchema>
export type HeadQuery = z.infer<typeof headQuerySchema>
export type FilterQuery = z.infer<typeof filterQuerySchema>

/** Parses request input, answering the first issue as a 400. */
export function parseRequest<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input)
  if (!result.success) throw new BadRequestError(result.error.issues[0]?.message ?? 'Invalid request')
  return result.data
}
