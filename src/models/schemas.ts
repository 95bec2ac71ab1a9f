/**
 * Zod schemas for matrix files, outcomes and ledger records
 * Single source of truth for validation
 */

import { z } from 'zod';
import { isArtifactName, type ArtifactName, type brand } from './brands.js';
import { OutcomeStatuses, PipelineStates, FailurePolicies } from './states.js';

// ============================================================================
// Target descriptors
// ============================================================================

export const PlatformOSSchema = z.enum(['linux', 'macos', 'windows']);
export type PlatformOS = z.infer<typeof PlatformOSSchema>;

export const ArchitectureSchema = z.enum(['x64', 'arm64', 'x86', 'universal']);
export type Architecture = z.infer<typeof ArchitectureSchema>;

export const ToolNameSchema = z.enum(['llvm', 'nasm', 'rust', 'cmake', 'ninja']);
export type ToolName = z.infer<typeof ToolNameSchema>;

// Names people write in matrix files for the tools above
const TOOL_ALIASES: Readonly<Record<string, ToolName>> = {
  clang: 'llvm',
  libclang: 'llvm',
  assembler: 'nasm',
  cargo: 'rust',
  rustc: 'rust',
};

function normalizeToolName(value: unknown): unknown {
  if (typeof value !== 'string') {
    return value;
  }
  const lowered = value.trim().toLowerCase();
  return TOOL_ALIASES[lowered] ?? lowered;
}

const RelativePathSchema = z
  .string()
  .min(1)
  .refine((value) => !/^([A-Za-z]:)?[\\/]/.test(value), 'must be a relative path')
  .refine((value) => !value.split(/[\\/]/).includes('..'), 'must not leave the source tree');

const MINIMUM_VERSION_PATTERN = /^(>=\s*)?\d+(\.\d+){0,2}$/;

// rustup channel names, optionally dated: nightly, nightly-2021-03-01
const TOOLCHAIN_CHANNEL_PATTERN = /^(stable|beta|nightly)(-\d{4}-\d{2}-\d{2})?$/;

export function isToolchainChannel(constraint: string): boolean {
  return TOOLCHAIN_CHANNEL_PATTERN.test(constraint);
}

export const VersionConstraintSchema = z
  .string()
  .refine(
    (value) => MINIMUM_VERSION_PATTERN.test(value) || isToolchainChannel(value),
    'expected a minimum version such as "11", "11.0" or ">=11", or a rust channel such as "nightly"'
  );

const EnvVarNameSchema = z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'invalid environment variable name');

export const ToolRequirementSchema = z.union([
  z.preprocess(normalizeToolName, ToolNameSchema).transform((tool) => ({ tool })),
  z
    .object({
      tool: z.preprocess(normalizeToolName, ToolNameSchema),
      version: VersionConstraintSchema.optional(),
      platforms: z.array(PlatformOSSchema).min(1).optional(),
      exportLibraryPath: EnvVarNameSchema.optional(),
    })
    .strict()
    .superRefine((requirement, ctx) => {
      const channel = requirement.version !== undefined && isToolchainChannel(requirement.version);
      if (channel && requirement.tool !== 'rust') {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['version'],
          message: `channel "${requirement.version}" only applies to rust`,
        });
      }
    }),
]);

export interface ToolRequirement {
  readonly tool: ToolName;
  /** Minimum version; for rust also a channel, pinned through RUSTUP_TOOLCHAIN */
  readonly version?: string;
  readonly platforms?: readonly PlatformOS[];
  readonly exportLibraryPath?: string;
}

export const ArtifactNameSchema = z
  .string({ required_error: 'artifactName is required' })
  .refine((value): value is ArtifactName => isArtifactName(value), {
    message: 'artifactName must be a plain file name',
  });

const EnvMapSchema = z.record(EnvVarNameSchema, z.union([z.string(), z.number()]).transform(String));

export const MatrixEntrySchema = z
  .object({
    os: PlatformOSSchema,
    arch: ArchitectureSchema.optional(),
    artifactName: ArtifactNameSchema,
    procedure: z.string({ required_error: 'procedure is required' }).min(1),
    args: z.array(z.union([z.string(), z.number()]).transform(String)).default([]),
    requires: z.array(ToolRequirementSchema).default([]),
    workingDirectory: RelativePathSchema.optional(),
    artifactDirectory: RelativePathSchema.optional(),
    env: EnvMapSchema.default({}),
  })
  .strict();

export const MatrixDefaultsSchema = z
  .object({
    arch: ArchitectureSchema.optional(),
    requires: z.array(ToolRequirementSchema).default([]),
    env: EnvMapSchema.default({}),
  })
  .strict();

export const MatrixFileSchema = z
  .object({
    version: z.literal(1).default(1),
    defaults: MatrixDefaultsSchema.optional(),
    targets: z.array(MatrixEntrySchema).min(1, 'matrix must declare at least one target'),
  })
  .strict()
  .superRefine((file, ctx) => {
    const firstIndex = new Map<string, number>();
    file.targets.forEach((target, index) => {
      const seen = firstIndex.get(target.artifactName);
      if (seen !== undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['targets', index, 'artifactName'],
          message: `duplicate artifactName "${target.artifactName}" (first declared by targets[${seen}])`,
        });
      } else {
        firstIndex.set(target.artifactName, index);
      }
    });
  });

export type MatrixFile = z.infer<typeof MatrixFileSchema>;

export interface TargetDescriptor {
  readonly platformOS: PlatformOS;
  readonly architecture: Architecture;
  readonly artifactName: ArtifactName;
  readonly buildProcedureRef: string;
  readonly buildProcedureArgs: readonly string[];
  readonly toolchainRequirements: readonly ToolRequirement[];
  readonly workingDirectory?: string;
  readonly artifactDirectory?: string;
  readonly env: Readonly<Record<string, string>>;
}

// ============================================================================
// Outcomes and reports
// ============================================================================

export const OutcomeStatusSchema = z.enum([
  OutcomeStatuses.SUCCESS,
  OutcomeStatuses.PROVISION_FAILED,
  OutcomeStatuses.BUILD_FAILED,
  OutcomeStatuses.ARTIFACT_MISSING,
  OutcomeStatuses.UPLOAD_FAILED,
  OutcomeStatuses.CANCELLED,
]);

export const PipelineStateSchema = z.enum([
  PipelineStates.PENDING,
  PipelineStates.PROVISIONING,
  PipelineStates.BUILDING,
  PipelineStates.VALIDATING,
  PipelineStates.PUBLISHING,
  PipelineStates.SUCCEEDED,
  PipelineStates.FAILED,
  PipelineStates.CANCELLED,
]);

export const FailurePolicySchema = z.enum([FailurePolicies.FAIL_FAST, FailurePolicies.FAIL_INDEPENDENT]);

export const PublishedAssetSchema = z.object({
  assetName: z.string(),
  tagRef: z.string(),
  size: z.number().int().nonnegative(),
  url: z.string().optional(),
  attempts: z.number().int().positive(),
});

export type PublishedAsset = z.infer<typeof PublishedAssetSchema>;

export const BuildOutcomeSchema = z.object({
  artifactName: z.string(),
  platformOS: PlatformOSSchema,
  architecture: ArchitectureSchema,
  status: OutcomeStatusSchema,
  stage: PipelineStateSchema,
  artifactPath: z.string().optional(),
  asset: PublishedAssetSchema.optional(),
  diagnostics: z.string().optional(),
  startedAt: z.number().int().optional(),
  finishedAt: z.number().int().optional(),
  durationMs: z.number().int().nonnegative().optional(),
});

export type BuildOutcome = z.infer<typeof BuildOutcomeSchema>;

export const RunReportSchema = z.object({
  runId: z.string(),
  tagRef: z.string(),
  policy: FailurePolicySchema,
  startedAt: z.number().int(),
  finishedAt: z.number().int(),
  succeeded: z.boolean(),
  outcomes: z.record(z.string(), BuildOutcomeSchema),
  /** What the release held once the run finished; absent when nothing was published */
  releaseAssets: z.array(z.string()).optional(),
});

export type RunReport = z.infer<typeof RunReportSchema>;

// ============================================================================
// Ledger records
// ============================================================================

export const RunRecordSchema = z.object({
  id: z.string(),
  tagRef: z.string(),
  policy: FailurePolicySchema,
  startedAt: z.number().int(),
  finishedAt: z.number().int().nullable(),
  succeeded: z.boolean().nullable(),
  report: RunReportSchema.nullable(),
});

export type RunRecord = z.infer<typeof RunRecordSchema>;

export const EventRecordSchema = z.object({
  id: z.number().int(),
  runId: z.string(),
  artifactName: z.string(),
  ts: z.number().int(),
  fromState: PipelineStateSchema,
  toState: PipelineStateSchema,
  payload: z.record(z.unknown()),
});

export type EventRecord = z.infer<typeof EventRecordSchema>;
