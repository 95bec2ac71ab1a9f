/**
 * Configuration schema with validation
 */

import { z } from 'zod';
import { FailurePolicySchema, PlatformOSSchema } from '../models/index.js';

export const ConfigSchema = z
  .object({
    run: z.object({
      matrixFile: z.string().min(1).default('./release-matrix.yaml'),
      sourceDir: z.string().min(1).default('.'),
      failurePolicy: FailurePolicySchema.default('fail-independent'),
      maxConcurrency: z.number().int().positive().max(64).default(4),
      workspace: z.enum(['shared', 'copy']).default('copy'),
      // Unset means every target is scheduled on this process
      hostPlatform: PlatformOSSchema.optional(),
      targets: z.array(z.string()).default([]),
    }),

    timeouts: z.object({
      provisionSec: z.number().int().positive().default(900),
      buildSec: z.number().int().positive().default(3600),
      uploadSec: z.number().int().positive().default(300),
    }),

    upload: z.object({
      maxAttempts: z.number().int().positive().max(20).default(5),
      initialDelayMs: z.number().int().nonnegative().default(1000),
      backoffFactor: z.number().min(1).default(2),
      maxDelayMs: z.number().int().positive().default(30000),
    }),

    release: z.object({
      backend: z.enum(['github', 'directory']).default('github'),
      repository: z
        .string()
        .regex(/^[^/\s]+\/[^/\s]+$/, 'expected owner/name')
        .optional(),
      apiUrl: z.string().url().default('https://api.github.com'),
      uploadUrl: z.string().url().default('https://uploads.github.com'),
      token: z.string().min(1).optional(),
      directory: z.string().min(1).default('./release-out'),
    }),

    storage: z.object({
      mode: z.enum(['memory', 'sqlite']).default('memory'),
      sqlitePath: z.string().min(1),
    }),

    logging: z.object({
      level: z.enum(['trace', 'debug', 'info', 'warn', 'error']).default('info'),
      pretty: z.boolean().default(true),
    }),
  })
  .superRefine((config, ctx) => {
    if (config.release.backend !== 'github') {
      return;
    }
    if (!config.release.repository) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['release', 'repository'],
        message: 'GITHUB_REPOSITORY is required for the github release backend',
      });
    }
    if (!config.release.token) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['release', 'token'],
        message: 'GITHUB_TOKEN (or RELEASE_TOKEN) is required for the github release backend',
      });
    }
  });

export type Config = z.infer<typeof ConfigSchema>;
