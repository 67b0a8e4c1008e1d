/**
 * @fileoverview Schemas de validación (zod) para la entrada del motor: tareas de descarga,
 * variables de entorno de configuración y registros de progreso leídos de disco.
 * @module schemas
 */

import { z } from 'zod';

export interface ZodValidationResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
}

const LOG_LEVELS = ['error', 'warn', 'info', 'verbose', 'debug', 'silly'] as const;

/** Entero desde una variable de entorno; vacío o ausente → undefined. */
const envInt = (min: number) =>
  z.preprocess(
    value => (value === undefined || value === '' ? undefined : value),
    z.coerce
      .number({ invalid_type_error: 'debe ser un número' })
      .int('debe ser un entero')
      .min(min, `debe ser >= ${min}`)
      .optional()
  );

export const envConfigSchema = z.object({
  DOWNLOAD_THREADS: envInt(1),
  CHUNK_SIZE: envInt(1),
  MAX_RETRIES: envInt(0),
  RETRY_BASE_DELAY_MS: envInt(0),
  RETRY_MAX_DELAY_MS: envInt(0),
  REQUEST_TIMEOUT_MS: envInt(1),
  LOG_LEVEL: z.preprocess(
    value => (value === '' ? undefined : value),
    z.enum(LOG_LEVELS).optional()
  ),
  LOG_FILE: z.preprocess(value => (value === '' ? undefined : value), z.string().optional()),
});

export type EnvConfig = z.infer<typeof envConfigSchema>;

export const taskInputSchema = z.object({
  url: z
    .string()
    .url('URL inválida')
    .refine(value => /^https?:\/\//i.test(value), 'La URL debe ser http o https'),
  destination: z.string().min(1, 'La ruta de destino no puede estar vacía'),
  totalSize: z.number().optional(),
  chunkSize: z.number().optional(),
  expectedDigest: z
    .string()
    .regex(/^[0-9a-fA-F]+$/, 'El digest esperado debe ser hexadecimal')
    .transform(value => value.toLowerCase())
    .optional(),
  digestAlgorithm: z.string().min(1).optional(),
});

export type TaskInput = z.input<typeof taskInputSchema>;

export const progressRecordSchema = z.object({
  version: z.literal(1),
  taskId: z.string().min(1),
  url: z.string(),
  destination: z.string(),
  totalSize: z.number().int().positive(),
  chunkSize: z.number().int().positive(),
  done: z.array(z.number().int().nonnegative()),
  updatedAt: z.number(),
});

export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(raíz)'}: ${issue.message}`)
    .join('; ');
}

export function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): ZodValidationResult<T> {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: formatZodIssues(result.error) };
}

/** Opciones numéricas de la CLI (llegan como string desde parseArgs). */
export const cliOptionsSchema = z.object({
  size: z.coerce.number().int('debe ser un entero').positive('debe ser > 0').optional(),
  threads: z.coerce.number().int('debe ser un entero').min(1, 'debe ser >= 1').optional(),
  chunkSize: z.coerce.number().int('debe ser un entero').positive('debe ser > 0').optional(),
  retries: z.coerce.number().int('debe ser un entero').min(0, 'debe ser >= 0').optional(),
  sha256: z
    .string()
    .regex(/^[0-9a-fA-F]{64}$/, 'debe ser un SHA-256 en hex (64 caracteres)')
    .optional(),
});

export type CliOptions = z.infer<typeof cliOptionsSchema>;
