/**
 * Command grammar types
 *
 * The daemon dumps its CLI grammar (`<daemon> -cli`) as a JSON array of
 * command descriptors. Each descriptor has a shared prefix ("vm info") and one
 * or more parsed patterns; every pattern item carries a bitmask type.
 */

import { z } from 'zod';

// =============================================================================
// Wire schemas
// =============================================================================

export const patternItemSchema = z.object({
  type: z.number().int().nonnegative(),
  key: z.string().optional(),
  text: z.string().optional(),
  options: z.array(z.string()).nullish(),
});

export const commandDescriptorSchema = z.object({
  shared_prefix: z.string(),
  parsed_patterns: z.array(z.array(patternItemSchema)),
  help_short: z.string().optional().default(''),
  help_long: z.string().optional().default(''),
  patterns: z.array(z.string()).optional().default([]),
}).passthrough();

export const descriptorListSchema = z.array(commandDescriptorSchema);

/** One item of a parsed pattern, as sent by the daemon */
export type PatternItem = z.infer<typeof patternItemSchema>;

/** One acceptable call shape, before classification */
export type ArgumentPattern = PatternItem[];

export type CommandDescriptor = z.infer<typeof commandDescriptorSchema>;

// =============================================================================
// Classified arguments
// =============================================================================

export type ArgumentKind = 'literal' | 'subcommand' | 'string' | 'choice' | 'list';

/**
 * User-facing shape of one argument slot.
 */
export interface ArgumentSpec {
  kind: ArgumentKind;
  optional: boolean;
  /** Slot name: the pattern key, or the literal text for literals */
  name: string;
  /** Required text for literal slots */
  literal?: string;
  /** Allowed values for choice slots */
  choices?: string[];
}

/** Classified pattern with the shared-prefix slots removed */
export type CandidatePattern = readonly ArgumentSpec[];
