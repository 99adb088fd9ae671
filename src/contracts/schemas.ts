import { z } from 'zod'
import path from 'path'

const requiredString = () =>
  z.string({ required_error: 'is required', invalid_type_error: 'must be a string' })

type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue }

// Anything stored must survive canonical JSON unchanged, or checksums and diffs lose it
const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ], { errorMap: () => ({ message: 'must be a JSON value' }) })
)

// Class records are opaque apart from the fields consistency checks read
export const ClassRecordSchema = z.object({
  name: z.string({ invalid_type_error: 'must be a string' }).optional(),
  file_path: z.string({ invalid_type_error: 'must be a string' }).optional(),
  last_modified: z.number({ invalid_type_error: 'must be a number' }).optional(),
}, { invalid_type_error: 'must be an object' }).catchall(JsonValueSchema)

export const ProjectStateSchema = z.object({
  project_path: requiredString()
    .min(1, 'must not be empty')
    .refine((value) => value.length === 0 || path.isAbsolute(value), 'must be an absolute path'),
  project_name: requiredString().min(1, 'must not be empty'),
  classes: z.array(ClassRecordSchema, {
    required_error: 'is required',
    invalid_type_error: 'must be an array',
  }),
  extensions: z.record(JsonValueSchema, { invalid_type_error: 'must be an object' }).optional(),
}, { invalid_type_error: 'must be an object' }).catchall(JsonValueSchema)

// Config schema
export const StatekeeperConfigSchema = z.object({
  history: z.object({
    maxSnapshots: z.number().int().positive().default(10),
    maxTransactions: z.number().int().positive().default(50),
  }).default({
    maxSnapshots: 10,
    maxTransactions: 50,
  }),
  consistency: z.object({
    mtimeToleranceMs: z.number().nonnegative().default(0),
  }).default({
    mtimeToleranceMs: 0,
  }),
})
