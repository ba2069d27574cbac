/**
 * Arbor Loader — Grammar Source Schema
 *
 * Zod runtime schemas for declarative grammar sources (YAML or JSON).
 *
 * The schema is closed: every entry names its `kind`, unknown kinds and
 * unknown attributes are rejected, and attribute values are checked by type
 * (integers, booleans, strings). Code is never evaluated: callbacks,
 * candidate providers and extra variable types are referenced by name and
 * looked up in the caller's registry.
 *
 *   grammar:
 *     - kind: node
 *       name: show
 *       help: Show system state
 *       children:
 *         - kind: action
 *           help: Show everything
 *           callback: show
 */

import { z } from 'zod';

// ─── Raw entry types ─────────────────────────────────────────────────────────

/** Help text, or an ordered list of `[key, text]` pairs. */
export type RawHelp = string | [string, string][];

export interface RawAttributes {
  traversals?: number | undefined;
  matchCandidates?: boolean | undefined;
  helpGroup?: number | undefined;
  helpOrder?: number | undefined;
}

interface RawMatching extends RawAttributes {
  help?: RawHelp | undefined;
  pattern?: string | undefined;
  ignoreCase?: boolean | undefined;
  /** Registry name of a candidate provider. */
  candidates?: string | undefined;
}

export interface RawNode extends RawMatching {
  kind: 'node';
  name: string;
  children?: RawEntry[] | undefined;
}

export interface RawVariable extends RawMatching {
  kind: 'variable';
  name: string;
  /** Built-in or registry variable type name. */
  type?: string | undefined;
  varName?: string | undefined;
  children?: RawEntry[] | undefined;
}

export interface RawAction extends RawMatching {
  kind: 'action';
  name?: string | undefined;
  help: RawHelp;
  /** Registry name of the callback. */
  callback: string;
  withUserObject?: boolean | undefined;
}

export interface RawAlias {
  kind: 'alias';
  target: string;
}

export interface RawGroup extends RawAttributes {
  kind: 'group';
  children: RawEntry[];
}

export type RawEntry = RawNode | RawVariable | RawAction | RawAlias | RawGroup;

export interface RawGrammarSource {
  /** Application name, used for the shell prompt and history file. */
  name?: string | undefined;
  description?: string | undefined;
  grammar: RawEntry[];
}

// ─── Field schemas ───────────────────────────────────────────────────────────

const NameSchema = z
  .string()
  .regex(/^[^\s/]+$/, 'name must be non-empty and contain no whitespace or "/"');

const RegistryNameSchema = z.string().min(1, 'registry name must not be empty');

const HelpSchema = z.union([z.string(), z.array(z.tuple([z.string(), z.string()]))]);

const attributeFields = {
  traversals:      z.number().int().nonnegative().optional(),
  matchCandidates: z.boolean().optional(),
  helpGroup:       z.number().int().optional(),
  helpOrder:       z.number().int().optional(),
};

const matchingFields = {
  ...attributeFields,
  help:       HelpSchema.optional(),
  pattern:    z.string().min(1, 'pattern must not be empty').optional(),
  ignoreCase: z.boolean().optional(),
  candidates: RegistryNameSchema.optional(),
};

// ─── Entry schemas ───────────────────────────────────────────────────────────

export const EntrySchema: z.ZodType<RawEntry> = z.lazy(() =>
  z.discriminatedUnion('kind', [NodeSchema, VariableSchema, ActionSchema, AliasSchema, GroupSchema]),
);

const NodeSchema = z
  .object({
    kind:     z.literal('node'),
    name:     NameSchema,
    children: z.array(EntrySchema).optional(),
    ...matchingFields,
  })
  .strict();

const VariableSchema = z
  .object({
    kind:     z.literal('variable'),
    name:     NameSchema,
    type:     RegistryNameSchema.optional(),
    varName:  NameSchema.optional(),
    children: z.array(EntrySchema).optional(),
    ...matchingFields,
  })
  .strict();

const ActionSchema = z
  .object({
    kind:           z.literal('action'),
    name:           NameSchema.optional(),
    callback:       RegistryNameSchema,
    withUserObject: z.boolean().optional(),
    ...matchingFields,
    help:           HelpSchema,
  })
  .strict();

const AliasSchema = z
  .object({
    kind:   z.literal('alias'),
    target: z.string().min(1, 'alias target must not be empty'),
  })
  .strict();

const GroupSchema = z
  .object({
    kind:     z.literal('group'),
    children: z.array(EntrySchema),
    ...attributeFields,
  })
  .strict();

// ─── Document ────────────────────────────────────────────────────────────────

export const GrammarSourceSchema: z.ZodType<RawGrammarSource> = z
  .object({
    name:        NameSchema.optional(),
    description: z.string().optional(),
    grammar:     z.array(EntrySchema),
  })
  .strict();
