import { z } from 'zod/v4';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export const LocalKvConfigSchema = z.object({
  /** Directory holding one `<name>.json` file per store. Defaults to `<home>/stores`. */
  directory: z.string().min(1).optional(),
  /** Quiet period after the last mutation before the store is written to disk. */
  flushDelayMs: z.number().int().min(0).default(50),
  /** Indentation of the backing file; 0 writes compact JSON. */
  indent: z.number().int().min(0).max(8).default(2),
  logLevel: LogLevelSchema.default('info'),
  logJson: z.boolean().default(false),
});

export type LocalKvConfig = z.infer<typeof LocalKvConfigSchema>;
export type LocalKvConfigInput = z.input<typeof LocalKvConfigSchema>;

/**
 * Store names become file names, so they cannot carry path separators
 * or point at the directory itself.
 */
export const StoreNameSchema = z
  .string()
  .min(1, 'Store name must not be empty')
  .refine((name) => !/[/\\]/.test(name), 'Store name must not contain path separators')
  .refine((name) => name !== '.' && name !== '..', 'Store name must not be "." or ".."');
