/**
 * Type definitions for the intent taxonomy.
 *
 * Intent definitions are loaded from JSON and validated with Zod, so the
 * schemas here are the source of truth for the on-disk taxonomy format.
 */

import { z } from 'zod';

// ============================================================================
// Intent Definition
// ============================================================================

/** Labels are snake_case identifiers, e.g. "order_inquiry". */
export const IntentLabelSchema = z
  .string()
  .min(1)
  .regex(/^[a-z][a-z0-9_]*$/, 'intent labels must be lowercase snake_case');

export const IntentDefinitionSchema = z.object({
  /** Stable identifier returned to callers */
  label: IntentLabelSchema,
  /** Human-readable description, shown in disambiguation prompts */
  description: z.string().min(1),
  /** Canonical example phrasings */
  examples: z.array(z.string().min(1)).default([]),
  /** Downstream action a consumer runs for this intent */
  action: z.string().min(1).nullable().default(null),
});

export type IntentDefinition = z.infer<typeof IntentDefinitionSchema>;

// ============================================================================
// Taxonomy File
// ============================================================================

export const TaxonomyFileSchema = z.object({
  fallbackIntent: IntentLabelSchema.default('general_inquiry'),
  intents: z.array(IntentDefinitionSchema).min(1),
});

export type TaxonomyFile = z.infer<typeof TaxonomyFileSchema>;
