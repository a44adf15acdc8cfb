/**
 * Zod Schemas
 *
 * Runtime validation for the configuration object and for every payload that
 * enters the pipeline from outside (HTTP ingress, scrapers, operators).
 * Validation happens at the boundary; once parsed, values are trusted.
 */

import { z } from 'zod';

// =============================================================================
// Primitive Schemas
// =============================================================================

export const UrlSchema = z.string().url('Invalid URL format');

/** Epoch milliseconds */
export const TimestampSchema = z.number().int().nonnegative();

export const UnitIntervalSchema = z
  .number()
  .min(0, 'Value cannot be negative')
  .max(1, 'Value cannot exceed 1');

export const PositiveIntSchema = z.number().int().positive();

const NonBlankString = z.string().trim().min(1, 'Must not be blank');

// =============================================================================
// Configuration
// =============================================================================

export const PipelineConfigSchema = z.object({
  port: z.number().int().min(0).max(65535),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']),
  persistence: z.enum(['memory', 'redis']),
  redisUrl: z.string().regex(/^rediss?:\/\//, 'REDIS_URL must start with redis:// or rediss://'),
  workerPoolSize: PositiveIntSchema,
  dailyApplicationQuota: z.number().int().nonnegative(),
  quotaExhaustedPolicy: z.enum(['skip', 'defer']),
  automationLevel: z.enum(['full-auto', 'review']),
  autoApproveQualityThreshold: UnitIntervalSchema,
  generation: z.object({
    timeoutMs: PositiveIntSchema,
    maxAttempts: PositiveIntSchema,
    retryDelayMs: z.number().int().nonnegative(),
  }),
  submission: z.object({
    retryBaseMs: z.number().int().nonnegative(),
    retryMultiplier: z.number().min(1),
    maxAttempts: PositiveIntSchema,
    retryMaxDelayMs: z.number().int().nonnegative(),
    platformConcurrency: PositiveIntSchema,
    tokensPerSecond: z.number().positive(),
    maxBurst: PositiveIntSchema,
    queueCapacity: PositiveIntSchema,
    deliveryTimeoutMs: PositiveIntSchema,
    defaultPlatform: NonBlankString,
    webhooks: z.record(UrlSchema),
  }),
  noResponseWindowMs: PositiveIntSchema,
  opportunityRetentionMs: PositiveIntSchema,
  sweepIntervalMs: PositiveIntSchema,
  feedbackLearningRate: UnitIntervalSchema,
  generatorUrl: UrlSchema.optional(),
  shutdownTimeoutMs: PositiveIntSchema,
});

// =============================================================================
// Inbound Payloads
// =============================================================================

export const OpportunityTypeSchema = z.enum([
  'job',
  'scholarship',
  'fellowship',
  'accelerator',
  'grant',
  'research',
  'event',
  'competition',
  'other',
]);

/**
 * Raw listing from a scraper or manual entry. Either a URL or a description
 * is needed to fingerprint the record.
 */
export const RawOpportunitySchema = z
  .object({
    source: NonBlankString,
    title: NonBlankString,
    organization: NonBlankString,
    url: UrlSchema.optional(),
    description: z.string().optional(),
    opportunityType: OpportunityTypeSchema.optional(),
    deadline: TimestampSchema.optional(),
    tags: z.array(z.string()).optional(),
    requiredSkills: z.array(z.string()).optional(),
    experienceYears: z.number().nonnegative().optional(),
    compensationMax: z.number().nonnegative().optional(),
    platform: NonBlankString.optional(),
    location: z.string().optional(),
    discoveredAt: TimestampSchema.optional(),
  })
  .refine(raw => Boolean(raw.url) || Boolean(raw.description?.trim()), {
    message: 'Either url or description is required',
    path: ['url'],
  });

export const UserProfileSchema = z.object({
  userId: NonBlankString,
  skills: z.array(z.string()).default([]),
  experienceYears: z.number().nonnegative().default(0),
  pastRoles: z.array(z.string()).default([]),
  interests: z.array(z.string()).default([]),
  careerGoals: z.string().optional(),
  minCompensation: z.number().nonnegative().optional(),
  successRates: z.record(OpportunityTypeSchema, UnitIntervalSchema).optional(),
});

export const DiscoverRequestSchema = z.object({
  raw: RawOpportunitySchema,
  profile: UserProfileSchema,
});

export const ApprovalDecisionSchema = z.object({
  decision: z.enum(['Approved', 'Rejected']),
  reviewer: NonBlankString,
});

export const OutcomeEventSchema = z.object({
  outcome: z.enum(['Accepted', 'Rejected', 'NoResponse']),
  observedAt: TimestampSchema.optional(),
});

export const CancelRequestSchema = z.object({
  reason: z.string().trim().min(1).default('operator_cancelled'),
});

const FeatureWeightsSchema = z
  .object({
    semanticSimilarity: z.number().nonnegative().finite(),
    skillMatch: z.number().nonnegative().finite(),
    experienceMatch: z.number().nonnegative().finite(),
    deadlineUrgency: z.number().nonnegative().finite(),
    historicalSuccessRate: z.number().nonnegative().finite(),
    prestige: z.number().nonnegative().finite(),
    compensationFit: z.number().nonnegative().finite(),
  })
  .partial()
  .strict()
  .refine(weights => Object.values(weights).some(w => w !== undefined && w > 0), {
    message: 'At least one weight must be positive',
  });

export const TierThresholdsSchema = z
  .object({
    tier1: UnitIntervalSchema,
    tier2: UnitIntervalSchema,
  })
  .refine(t => t.tier1 > t.tier2, { message: 'tier1 threshold must exceed tier2 threshold', path: ['tier1'] });

export const WeightsInstallSchema = z.object({
  weights: FeatureWeightsSchema,
  thresholds: TierThresholdsSchema.optional(),
});

export type PipelineConfigInput = z.infer<typeof PipelineConfigSchema>;
export type DiscoverRequest = z.infer<typeof DiscoverRequestSchema>;
export type WeightsInstallRequest = z.infer<typeof WeightsInstallSchema>;

// =============================================================================
// Validation Helpers
// =============================================================================

export interface ValidationIssue {
  path: string;
  message: string;
}

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; errors: ValidationIssue[] };

/**
 * Validate data against a schema and return a detailed result.
 * Does NOT throw.
 */
export function validateWithDetails<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown
): ValidationResult<T> {
  const result = schema.safeParse(data);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    errors: result.error.errors.map((e: z.ZodIssue) => ({
      path: e.path.join('.'),
      message: e.message,
    })),
  };
}

/**
 * Validate data and throw on failure.
 * Use at startup/load time and at ingress boundaries.
 */
export function validateOrThrow<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
  context: string
): T {
  const result = schema.safeParse(data);

  if (result.success) {
    return result.data;
  }

  const errorDetails = result.error.errors
    .map((e: z.ZodIssue) => `  - ${e.path.join('.')}: ${e.message}`)
    .join('\n');

  throw new Error(`Config validation failed for ${context}:\n${errorDetails}`);
}

/**
 * Create a validator function for a specific schema.
 */
export function createValidator<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  context: string
): (data: unknown) => T {
  return (data: unknown) => validateOrThrow(schema, data, context);
}

export const validatePipelineConfig = createValidator(PipelineConfigSchema, 'PipelineConfig');
