/**
 * Zod validation schemas for Gemini REST responses
 *
 * Only the fields the client reads are declared; everything else passes through.
 */

import { z } from 'zod';

export const UploadFileResponseSchema = z.object({
  file: z.object({
    name: z.string().min(1),
    uri: z.string().min(1),
    mimeType: z.string().min(1),
    expirationTime: z.string().optional(),
    state: z.string().optional(),
  }),
});

export const CachedContentResponseSchema = z.object({
  name: z.string().min(1),
  expireTime: z.string().optional(),
});

const UsageMetadataSchema = z.object({
  promptTokenCount: z.number().int().nonnegative().optional(),
  candidatesTokenCount: z.number().int().nonnegative().optional(),
  totalTokenCount: z.number().int().nonnegative().optional(),
  cachedContentTokenCount: z.number().int().nonnegative().optional(),
});

export const GenerateContentResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional() })).optional(),
          })
          .optional(),
        finishReason: z.string().optional(),
      })
    )
    .optional(),
  usageMetadata: UsageMetadataSchema.optional(),
  modelVersion: z.string().optional(),
  promptFeedback: z
    .object({
      blockReason: z.string().optional(),
    })
    .optional(),
});

/**
 * Google API error envelope: {"error": {"code": 404, "message": "...", "status": "NOT_FOUND"}}
 */
export const GoogleApiErrorSchema = z.object({
  error: z.object({
    code: z.number().optional(),
    message: z.string().optional(),
    status: z.string().optional(),
  }),
});

export type UsageMetadata = z.infer<typeof UsageMetadataSchema>;
export type GenerateContentResponse = z.infer<typeof GenerateContentResponseSchema>;
