/**
 * Code block model shared by extraction and matching.
 */
import { z } from 'zod';

export const BLOCK_KINDS = [
  'function',
  'method',
  'class',
  'interface',
  'enum',
  'type',
  'variable',
] as const;

/** Structural category of a block, when the extractor differentiates it. */
export type BlockKind = (typeof BLOCK_KINDS)[number];

/**
 * Where a block lives. Lines are 1-based; `endLine` is null when the
 * node boundary does not expose it.
 */
export interface SourceLocation {
  readonly file: string;
  readonly startLine: number;
  readonly endLine: number | null;
}

/**
 * One structurally matched function/method/class/etc.
 */
export interface CodeBlock {
  /** Identifiers and literal source text in document order */
  readonly tokens: readonly string[];
  readonly location: SourceLocation;
  readonly kind?: BlockKind;
}

/**
 * Runtime shape of a well-formed block. Blocks that fail this are treated
 * as unmatched by the duplicate matcher.
 */
export const CodeBlockSchema = z.object({
  tokens: z.array(z.string()),
  location: z.object({
    file: z.string().min(1),
    startLine: z.number().int().min(1),
    endLine: z.number().int().min(1).nullable(),
  }),
  kind: z.enum(BLOCK_KINDS).optional(),
});

export function isBlockKind(value: string): value is BlockKind {
  return BLOCK_KINDS.some((kind) => kind === value);
}

export function createSourceLocation(
  file: string,
  startLine: number,
  endLine: number | null
): SourceLocation {
  return Object.freeze({ file, startLine, endLine });
}

export function createCodeBlock(
  tokens: readonly string[],
  location: SourceLocation,
  kind?: BlockKind
): CodeBlock {
  const block: CodeBlock = kind
    ? { tokens: Object.freeze([...tokens]), location, kind }
    : { tokens: Object.freeze([...tokens]), location };
  return Object.freeze(block);
}

/**
 * Check that a value is a usable code block.
 */
export function isWellFormedBlock(value: unknown): value is CodeBlock {
  return CodeBlockSchema.safeParse(value).success;
}
