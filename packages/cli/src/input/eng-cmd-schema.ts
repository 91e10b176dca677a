/**
 * Zod schemas for engine commands written as JSON
 *
 * `ucikit format` reads one object per line, e.g.
 * `{"kind":"bestMove","best":"e2e4","ponder":"e7e6"}`, and prints the
 * canonical UCI line for it.
 */

import { z } from 'zod';
import { isUciMove, type EngCmd, type Info } from '@ucikit/protocol';

import { CommandFormatError } from '../errors/cli-errors.js';

const moveSchema = z
  .string()
  .refine(isUciMove, { message: 'Expected a move in coordinate notation' });
const movesSchema = z.array(moveSchema);
const countSchema = z.number().int().nonnegative();

export const scoreSchema = z.object({
  cp: z.number().int(),
  mate: z.number().int().optional(),
  bound: z.enum(['lower', 'upper']).optional(),
});

export const infoSchema = z
  .object({
    depth: countSchema.optional(),
    selDepth: countSchema.optional(),
    nodes: countSchema.optional(),
    timeMs: z.number().nonnegative().optional(),
    pv: movesSchema.optional(),
    multiPv: z.object({ rank: countSchema, moves: movesSchema }).optional(),
    score: scoreSchema.optional(),
    currMove: moveSchema.optional(),
    hashFull: countSchema.optional(),
    nps: countSchema.optional(),
    tbHits: countSchema.optional(),
    sbHits: countSchema.optional(),
    cpuLoad: countSchema.optional(),
    string: z.string().optional(),
    refutation: z.object({ move: moveSchema, line: movesSchema }).optional(),
    currLine: z.object({ cpu: countSchema.optional(), moves: movesSchema }).optional(),
  })
  .strict()
  .superRefine((info, ctx) => {
    if (info.selDepth !== undefined && info.depth === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['selDepth'],
        message: 'selDepth requires depth',
      });
    }
  })
  .transform(({ depth, selDepth, ...fields }): Info => {
    if (depth === undefined) return fields;
    if (selDepth === undefined) return { ...fields, depth };
    return { ...fields, depth, selDepth };
  });

export const optionDeclarationSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('check'), name: z.string().min(1), default: z.boolean() }),
  z.object({
    type: z.literal('spin'),
    name: z.string().min(1),
    default: z.number().int(),
    min: z.number().int(),
    max: z.number().int(),
  }),
  z.object({
    type: z.literal('combo'),
    name: z.string().min(1),
    default: z.string(),
    vars: z.array(z.string()),
  }),
  z.object({ type: z.literal('button'), name: z.string().min(1) }),
  z.object({ type: z.literal('string'), name: z.string().min(1), default: z.string() }),
]);

export const engCmdSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('idName'), name: z.string() }),
  z.object({ kind: z.literal('idAuthor'), author: z.string() }),
  z.object({ kind: z.literal('uciOk') }),
  z.object({ kind: z.literal('readyOk') }),
  z.object({ kind: z.literal('bestMove'), best: moveSchema, ponder: moveSchema.optional() }),
  z.object({ kind: z.literal('info'), info: infoSchema }),
  z.object({ kind: z.literal('option'), option: optionDeclarationSchema }),
]);

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
    )
    .join('; ');
}

/**
 * Validate an already decoded value as an engine command
 * @throws CommandFormatError if the value does not match
 */
export function toEngCmd(value: unknown, line?: number): EngCmd {
  const result = engCmdSchema.safeParse(value);
  if (!result.success) {
    throw new CommandFormatError(describeIssues(result.error), line);
  }
  return result.data;
}

/**
 * Decode one JSON line into an engine command
 * @throws CommandFormatError on invalid JSON or a schema mismatch
 */
export function parseEngCmdJson(text: string, line?: number): EngCmd {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    throw new CommandFormatError(
      `Invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
      line,
    );
  }
  return toEngCmd(value, line);
}
