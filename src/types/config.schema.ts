import { z } from 'zod';
import { AnvilSettings, CURRENT_CONFIG_VERSION, DEFAULT_SETTINGS } from './config.types';
import { isValidTargetName } from '../utils/path.utils';

export const GitHubSettingsSchema = z.object({
  configRepo: z.string().default(''),
  branch: z
    .string()
    .min(1, 'github.branch cannot be empty')
    .default(DEFAULT_SETTINGS.github.branch),
  localPath: z
    .string()
    .min(1, 'github.localPath cannot be empty')
    .default(DEFAULT_SETTINGS.github.localPath),
  tokenEnvVar: z.string().default(DEFAULT_SETTINGS.github.tokenEnvVar),
});

export const GitIdentitySettingsSchema = z.object({
  username: z.string().default(''),
  email: z.string().default(''),
  sshKeyPath: z.string().default(''),
});

/**
 * Settings file schema. Missing sections fall back to defaults.
 */
export const AnvilSettingsSchema: z.ZodType<AnvilSettings, z.ZodTypeDef, unknown> = z.object({
  version: z.string().default(CURRENT_CONFIG_VERSION),
  github: GitHubSettingsSchema.default({}),
  git: GitIdentitySettingsSchema.default({}),
  configs: z
    .record(
      z
        .string()
        .refine(
          isValidTargetName,
          'App names may only contain letters, digits, ".", "_" and "-", and cannot be ".", ".." or ".git"',
        ),
      z.string().min(1, 'Config path cannot be empty'),
    )
    .default({}),
});
