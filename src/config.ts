import { z } from 'zod';
import { CodecError } from './errors.js';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Configuration shared by every codec core.
 */
export interface CodecConfig {
  /**
   * Key holding the type name of a tagged value on tree carriers.
   * Default is '@type'.
   */
  typeTagKey: string;

  /**
   * Key holding the encoded value of a tagged value on tree carriers.
   * Default is '@value'.
   */
  valueKey: string;

  /**
   * Character prepended to an inherited field name until it no longer
   * collides with a field already taken further down the class hierarchy.
   * Default is '*'.
   */
  fieldCollisionPrefix: string;

  /**
   * Minimum level emitted by the core's logger.
   * Default is 'warn'.
   */
  logLevel: LogLevel;

  /**
   * Whether the built-in proxy codecs (Date) are registered on construction.
   * Default is true.
   */
  registerDefaults: boolean;
}

export const DEFAULT_CONFIG: CodecConfig = {
  typeTagKey: '@type',
  valueKey: '@value',
  fieldCollisionPrefix: '*',
  logLevel: 'warn',
  registerDefaults: true,
};

export const codecConfigSchema = z
  .object({
    typeTagKey: z.string().min(1),
    valueKey: z.string().min(1),
    fieldCollisionPrefix: z.string().length(1),
    logLevel: z.enum(LOG_LEVELS),
    registerDefaults: z.boolean(),
  })
  .strict()
  .refine((config) => config.typeTagKey !== config.valueKey, {
    message: 'typeTagKey and valueKey must differ',
    path: ['valueKey'],
  });

/**
 * Merge caller options over the defaults and validate the result.
 */
export function resolveConfig(options: Partial<CodecConfig> = {}): CodecConfig {
  const result = codecConfigSchema.safeParse({ ...DEFAULT_CONFIG, ...options });
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new CodecError(`Invalid codec configuration: ${issues.join('; ')}`, {
      code: 'invalid_config',
      context: { issues },
      cause: result.error,
    });
  }
  return result.data;
}
