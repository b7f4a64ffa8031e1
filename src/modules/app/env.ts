import { z } from 'zod';

const positiveIntString = (name: string) =>
  z
    .string()
    .optional()
    .refine((v) => (v ? Number.isInteger(Number(v)) && Number(v) > 0 : true), `${name} must be a positive integer`);

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  DATABASE_URL: z.string().trim().min(1, 'DATABASE_URL is required'),
  DATABASE_POOL_MAX: positiveIntString('DATABASE_POOL_MAX'),
  DATABASE_CONNECT_RETRIES: positiveIntString('DATABASE_CONNECT_RETRIES'),
  DATABASE_CONNECT_RETRY_DELAY_MS: positiveIntString('DATABASE_CONNECT_RETRY_DELAY_MS'),

  // HS256 signing secret; must be long enough to resist brute force.
  JWT_SECRET: z
    .string()
    .trim()
    .min(1, 'JWT_SECRET is required')
    .refine((v) => Buffer.byteLength(v, 'utf8') >= 32, 'JWT_SECRET must be at least 32 bytes'),
  JWT_TTL_SECONDS: z
    .string()
    .optional()
    .refine((v) => (v ? Number.isInteger(Number(v)) : true), 'JWT_TTL_SECONDS must be an integer'),

  HTTP_PORT: positiveIntString('HTTP_PORT'),
  // host:port the gRPC listener binds to.
  GRPC_URL: z.string().optional(),

  // Comma-separated list of allowed web origins for CORS.
  ALLOWED_ORIGINS: z.string().optional().default('http://localhost:8000,http://127.0.0.1:8000'),

  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug', 'verbose']).optional(),
  LOG_REQUESTS: z.string().optional(),

  HTTP_REQUEST_BODY_LIMIT_BYTES: positiveIntString('HTTP_REQUEST_BODY_LIMIT_BYTES'),
  HTTP_CONCURRENCY_LIMIT: positiveIntString('HTTP_CONCURRENCY_LIMIT'),
  HTTP_REQUEST_TIMEOUT_SECS: positiveIntString('HTTP_REQUEST_TIMEOUT_SECS'),
  GRPC_CONCURRENCY_LIMIT: positiveIntString('GRPC_CONCURRENCY_LIMIT'),
  GRPC_REQUEST_TIMEOUT_SECS: positiveIntString('GRPC_REQUEST_TIMEOUT_SECS'),
  GRPC_MAX_DECODING_MESSAGE_SIZE_BYTES: positiveIntString('GRPC_MAX_DECODING_MESSAGE_SIZE_BYTES'),
  GRPC_MAX_ENCODING_MESSAGE_SIZE_BYTES: positiveIntString('GRPC_MAX_ENCODING_MESSAGE_SIZE_BYTES'),
});

export type Env = z.infer<typeof envSchema>;

export function validateEnv<TSchema extends z.ZodTypeAny>(schema: TSchema) {
  return (config: Record<string, unknown>): z.infer<TSchema> => {
    const parsed = schema.safeParse(config);
    if (!parsed.success) {
      // Nest expects thrown errors to abort bootstrap.
      throw new Error(
        `Invalid environment variables:\n${parsed.error.issues
          .map((i) => `- ${i.path.join('.')}: ${i.message}`)
          .join('\n')}`,
      );
    }
    return parsed.data;
  };
}
