/**
 * Validation Schemas and Helpers
 *
 * Zod schemas for engine content files plus validation utilities.
 * Provides runtime type safety for everything loaded at startup.
 *
 * @module utils/schemas
 */

import { z, type ZodError, type ZodTypeAny } from 'zod';
import { ValidationError } from './errors.js';
import { DEFAULT_ROOT_ID } from './constants.js';

// ==================== Base Schema Components ====================

/**
 * Phrase validation (vocabulary entries, synonyms, FAQ keywords).
 * Case is preserved; lookups normalize on their own.
 */
const phraseSchema = z.string()
  .trim()
  .min(1, 'Phrase cannot be empty')
  .max(200, 'Phrase cannot exceed 200 characters');

/**
 * Dialogue node id validation.
 */
const nodeIdSchema = z.string()
  .trim()
  .min(1, 'Node id cannot be empty')
  .max(100, 'Node id cannot exceed 100 characters');

/**
 * Option keyword validation. Keywords are stored lowercase.
 */
const keywordSchema = z.string()
  .trim()
  .min(1, 'Keyword cannot be empty')
  .max(100, 'Keyword cannot exceed 100 characters')
  .toLowerCase();

const positiveIntSchema = z.number().int().positive();

// ==================== Settings Schema ====================

/**
 * Optional `settings` block. Missing values fall back to DEFAULT_SETTINGS.
 */
export const EngineSettingsSchema = z.object({
  minPrefixLength: positiveIntSchema.optional(),
  completionLimit: positiveIntSchema.optional(),
  historyMaxDepth: positiveIntSchema.optional(),
  suggestionTopK: positiveIntSchema.optional(),
}).strict();

// ==================== Dialogue Schemas ====================

export const DialogueOptionSchema = z.object({
  keyword: keywordSchema,
  target: nodeIdSchema,
}).strict();

export const DialogueNodeSchema = z.object({
  id: nodeIdSchema,
  prompt: z.string().min(1, 'Prompt cannot be empty'),
  isLeaf: z.boolean().default(false),
  options: z.array(DialogueOptionSchema).default([]),
}).strict();

export const DialogueSchema = z.object({
  rootId: nodeIdSchema.default(DEFAULT_ROOT_ID),
  nodes: z.array(DialogueNodeSchema).min(1, 'Dialogue needs at least one node'),
}).strict();

// ==================== Suggestion and FAQ Schemas ====================

/**
 * Weighted next-action edge. Zero and negative weights are legal.
 */
export const SuggestionEdgeSchema = z.object({
  source: nodeIdSchema,
  target: nodeIdSchema,
  weight: z.number().finite('Weight must be a finite number'),
  label: z.string().trim().min(1, 'Label cannot be empty'),
}).strict();

export const FaqEntrySchema = z.object({
  keywords: z.array(phraseSchema).min(1, 'FAQ entry needs at least one keyword'),
  response: z.string().min(1, 'Response cannot be empty'),
  category: z.string().trim().min(1).default('general'),
}).strict();

/**
 * A synonym group lists its canonical label first.
 */
export const SynonymGroupSchema = z.array(phraseSchema)
  .min(2, 'A synonym group needs a canonical label and at least one synonym');

// ==================== Engine Config Schema ====================

/**
 * Complete engine content document (see data/default-engine.json).
 */
export const EngineConfigSchema = z.object({
  settings: EngineSettingsSchema.default({}),
  vocabulary: z.array(phraseSchema).default([]),
  synonymGroups: z.array(SynonymGroupSchema).default([]),
  dialogue: DialogueSchema,
  suggestions: z.array(SuggestionEdgeSchema).default([]),
  faqs: z.array(FaqEntrySchema).default([]),
}).strict();

/** Validated engine content with defaults applied. */
export type EngineConfig = z.output<typeof EngineConfigSchema>;

/** Engine content as written in a file or passed by a caller. */
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

// ==================== Validation Helpers ====================

/**
 * Formats Zod errors into human-readable strings.
 *
 * @param error - Zod error object
 * @returns Array of formatted error messages
 */
export function formatZodErrors(error: ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return `${path}${issue.message}`;
  });
}

/**
 * Validates data against a Zod schema and returns the typed result.
 * Throws ValidationError with formatted error messages on failure.
 *
 * @param data - The data to validate
 * @param schema - The Zod schema to validate against
 * @param errorMessage - Custom error message prefix (default: 'Validation failed')
 * @returns The validated data with schema defaults applied
 * @throws ValidationError if validation fails
 *
 * @example
 * ```typescript
 * const config = validateWithSchema(raw, EngineConfigSchema, 'Invalid engine config');
 * ```
 */
export function validateWithSchema<S extends ZodTypeAny>(
  data: unknown,
  schema: S,
  errorMessage: string = 'Validation failed'
): z.output<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const errors = formatZodErrors(result.error);
    throw new ValidationError(errorMessage, errors);
  }
  return result.data;
}

/**
 * Validates data and returns a result object instead of throwing.
 *
 * @example
 * ```typescript
 * const result = validateSafe(input, EngineConfigSchema);
 * if (!result.success) {
 *   console.error(result.errors);
 * }
 * ```
 */
export function validateSafe<S extends ZodTypeAny>(
  data: unknown,
  schema: S
): { success: true; data: z.output<S> } | { success: false; errors: string[] } {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: formatZodErrors(result.error) };
}
