import { z } from 'zod'

export const InferenceStatusValueSchema = z.enum(['PENDING', 'IN_PROGRESS', 'COMPLETE', 'FAILED', 'CANCELLED'])

/** Error member of the GraphQL result unions. */
export const RemoteErrorSchema = z.object({ message: z.string() })

export const SubmittedInferenceSchema = z.object({
  id: z.string().min(1),
  status: InferenceStatusValueSchema,
  createdAt: z.string()
})

export type SubmittedInference = z.infer<typeof SubmittedInferenceSchema>

export const ResultFileSchema = z.object({
  id: z.string(),
  url: z.string().url().nullable().optional(),
  name: z.string().nullable().optional()
})

export const InferenceStatusSchema = z.object({
  id: z.string().min(1),
  status: InferenceStatusValueSchema,
  files: z.array(ResultFileSchema).nullable().optional()
})

export type InferenceStatus = z.infer<typeof InferenceStatusSchema>

export const CreateInferenceDataSchema = z.object({
  createInference: z.union([SubmittedInferenceSchema, RemoteErrorSchema])
})

export const GetInferencesDataSchema = z.object({
  getInferencesById: z.union([z.object({ inferences: z.array(InferenceStatusSchema) }), RemoteErrorSchema])
})

/** Top-level GraphQL response envelope. */
export const GraphQLEnvelopeSchema = z.object({
  data: z.unknown().optional(),
  errors: z
    .array(
      z.object({
        message: z.string(),
        extensions: z.object({ code: z.string().optional() }).passthrough().optional()
      })
    )
    .optional()
})

/** Parameters forwarded to the remote generation call; `prompt` is the only required field. */
export const GenerationParametersSchema = z
  .object({
    prompt: z.string().trim().min(1)
  })
  .passthrough()

export type GenerationParameters = z.infer<typeof GenerationParametersSchema>
