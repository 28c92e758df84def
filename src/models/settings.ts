import { z } from 'zod';

/**
 * Settings file (config.yaml). Every field is optional; defaults are
 * applied by loadSettings().
 */
export const SettingsFileSchema = z
  .object({
    indexUrl: z.string().url().optional(),
    templateUrl: z
      .string()
      .refine((value) => value.includes('{name}') && value.includes('{category}'), {
        message: 'must contain both {category} and {name} placeholders',
      })
      .optional(),
    cacheDir: z.string().min(1).optional(),
    fetchTimeoutMs: z.number().int().positive().optional(),
    pager: z.string().min(1).optional(),
    diffCommand: z.string().min(1).optional(),
    useSudo: z.boolean().optional(),
  })
  .strict();

export type SettingsFile = z.infer<typeof SettingsFileSchema>;

/**
 * Fully resolved settings used by the CLI
 */
export interface Settings {
  indexUrl: string;
  templateUrl: string;
  cacheDir: string;
  fetchTimeoutMs: number;
  pager: string;
  diffCommand: string;
  useSudo: boolean;
}
