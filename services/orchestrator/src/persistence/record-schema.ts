import { z } from 'zod';
import { OpportunityTypeSchema } from '@pipeline/config';
import { ApplicationState } from '@pipeline/types';
import type { ApplicationRecord, GeneratedDraft, Opportunity } from '@pipeline/types';

const FeatureVectorSchema = z.object({
  semanticSimilarity: z.number(),
  skillMatch: z.number(),
  experienceMatch: z.number(),
  deadlineUrgency: z.number(),
  historicalSuccessRate: z.number(),
  prestige: z.number(),
  compensationFit: z.number(),
});

/** Shape of a record as serialized into the `data` field of its hash */
export const StoredApplicationRecordSchema: z.ZodType<ApplicationRecord, z.ZodTypeDef, unknown> = z.object({
  id: z.string(),
  opportunityId: z.string(),
  userId: z.string(),
  state: z.nativeEnum(ApplicationState),
  version: z.number().int().positive(),
  createdAt: z.number(),
  updatedAt: z.number(),
  score: z.number().optional(),
  tier: z.union([z.literal(1), z.literal(2), z.literal(3)]).optional(),
  weightsVersion: z.number().int().optional(),
  featureVector: FeatureVectorSchema.optional(),
  generatedContentRef: z.string().optional(),
  qualityScore: z.number().optional(),
  generationAttempts: z.number().int().nonnegative(),
  approvalDecision: z
    .object({
      decision: z.enum(['Approved', 'Rejected', 'AutoApproved']),
      reviewer: z.string(),
      decidedAt: z.number(),
    })
    .optional(),
  platform: z.string().optional(),
  submissionAttemptId: z.string().optional(),
  lastError: z.string().optional(),
  reason: z.string().optional(),
  outcome: z.enum(['Accepted', 'Rejected', 'NoResponse']).optional(),
  closedAt: z.number().optional(),
  archivedAt: z.number().optional(),
});

export const StoredOpportunitySchema: z.ZodType<Opportunity, z.ZodTypeDef, unknown> = z.object({
  id: z.string(),
  fingerprint: z.string(),
  source: z.string(),
  rawFields: z.object({
    title: z.string(),
    organization: z.string(),
    url: z.string().optional(),
    description: z.string().optional(),
    opportunityType: OpportunityTypeSchema,
    deadline: z.number().optional(),
    tags: z.array(z.string()),
    requiredSkills: z.array(z.string()),
    experienceYears: z.number().optional(),
    compensationMax: z.number().optional(),
    platform: z.string().optional(),
    location: z.string().optional(),
    sources: z.array(z.string()),
  }),
  tier: z.union([z.literal(1), z.literal(2), z.literal(3)]).optional(),
  score: z.number().optional(),
  discoveredAt: z.number(),
  updatedAt: z.number(),
  archivedAt: z.number().optional(),
});

export const StoredDraftSchema: z.ZodType<GeneratedDraft, z.ZodTypeDef, unknown> = z.object({
  content: z.string(),
  qualityScore: z.number(),
});
