import { z, ZodError } from 'zod';
import { ControllerError } from '../lib/errors';

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

// Values past 2^53 only survive JSON as decimal strings; numbers are taken
// while they are safe integers.
const eui64Schema = z
  .union([z.string().regex(/^-?\d+$/, 'must be a base-10 integer'), z.number().int().safe()])
  .transform((value) => BigInt(value))
  .refine((value) => value >= INT64_MIN && value <= INT64_MAX, 'must fit in a signed 64-bit integer')
  .transform((value) => value.toString());

export const namespaceSpecSchema = z.object({
  subsystemId: z.string(),
  volumeId: z.string().min(1),
  hostNsid: z.number().int().positive(),
  uuid: z.string().optional(),
  nguid: z.string().optional(),
  eui64: eui64Schema.optional(),
});

export const createNamespaceRequestSchema = z.object({
  namespace: z.object({
    name: z.string().optional(),
    spec: namespaceSpecSchema,
  }),
  namespaceId: z.string().optional(),
});

export const deleteNamespaceRequestSchema = z.object({
  name: z.string().min(1),
  allowMissing: z.boolean().optional(),
});

export const updateNamespaceRequestSchema = z.object({
  namespace: z.object({
    name: z.string().min(1),
    spec: namespaceSpecSchema.partial().optional(),
  }),
  updateMask: z.array(z.string()).optional(),
  allowMissing: z.boolean().optional(),
});

export const listNamespacesRequestSchema = z.object({
  parent: z.string().min(1),
  pageSize: z.number().int().optional(),
  pageToken: z.string().optional(),
});

export const getNamespaceRequestSchema = z.object({
  name: z.string().min(1),
});

export const namespaceStatsRequestSchema = z.object({
  namespaceId: z.string().min(1),
});

export type CreateNamespaceRequest = z.infer<typeof createNamespaceRequestSchema>;
export type DeleteNamespaceRequest = z.infer<typeof deleteNamespaceRequestSchema>;
export type UpdateNamespaceRequest = z.infer<typeof updateNamespaceRequestSchema>;
export type ListNamespacesRequest = z.infer<typeof listNamespacesRequestSchema>;
export type GetNamespaceRequest = z.infer<typeof getNamespaceRequestSchema>;
export type NamespaceStatsRequest = z.infer<typeof namespaceStatsRequestSchema>;

/**
 * Parse a request payload, turning the first zod issue into an
 * INVALID_ARGUMENT error that names the offending field.
 */
export function parseRequest<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, payload: unknown): T {
  try {
    return schema.parse(payload);
  } catch (err) {
    if (err instanceof ZodError) {
      const issue = err.issues[0];
      const field = issue && issue.path.length > 0 ? issue.path.join('.') : undefined;
      const message = issue ? `${field ? `${field}: ` : ''}${issue.message}` : 'invalid request';
      throw ControllerError.invalidArgument(message, field ? { field } : {});
    }
    throw err;
  }
}
