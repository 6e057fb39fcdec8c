/**
 * Tests for the code block model.
 */
import { describe, it, expect } from 'vitest';
import {
  BLOCK_KINDS,
  CodeBlockSchema,
  createCodeBlock,
  createSourceLocation,
  isBlockKind,
  isWellFormedBlock,
} from '../../../../src/core/blocks/types.js';

describe('code block model', () => {
  it('should copy tokens and freeze the block', () => {
    const tokens = ['add', 'a', 'b'];
    const block = createCodeBlock(tokens, createSourceLocation('m.py', 1, 2), 'function');
    tokens.push('c');

    expect(block.tokens).toEqual(['add', 'a', 'b']);
    expect(block.kind).toBe('function');
    expect(Object.isFrozen(block)).toBe(true);
    expect(Object.isFrozen(block.location)).toBe(true);
  });

  it('should leave kind out when not given', () => {
    const block = createCodeBlock([], createSourceLocation('m.py', 1, null));
    expect('kind' in block).toBe(false);
  });

  it('should recognise block kinds', () => {
    expect(isBlockKind('method')).toBe(true);
    expect(isBlockKind('lambda')).toBe(false);
  });

  it('should accept exactly the declared kinds in the schema', () => {
    const location = { file: 'a.cs', startLine: 1, endLine: 1 };

    for (const kind of BLOCK_KINDS) {
      expect(isBlockKind(kind)).toBe(true);
      expect(CodeBlockSchema.safeParse({ tokens: [], location, kind }).success).toBe(true);
    }
    expect(CodeBlockSchema.safeParse({ tokens: [], location, kind: 'lambda' }).success).toBe(false);
  });

  describe('isWellFormedBlock', () => {
    it('should accept a block with a null end line', () => {
      expect(isWellFormedBlock({ tokens: ['x'], location: { file: 'a.go', startLine: 3, endLine: null } })).toBe(true);
    });

    it.each([
      ['missing tokens', { location: { file: 'a.go', startLine: 1, endLine: 1 } }],
      ['non-string token', { tokens: [1], location: { file: 'a.go', startLine: 1, endLine: 1 } }],
      ['empty file', { tokens: [], location: { file: '', startLine: 1, endLine: 1 } }],
      ['zero start line', { tokens: [], location: { file: 'a.go', startLine: 0, endLine: 1 } }],
      ['unknown kind', { tokens: [], location: { file: 'a.go', startLine: 1, endLine: 1 }, kind: 'lambda' }],
      ['null', null],
    ])('should reject %s', (_label, value) => {
      expect(isWellFormedBlock(value)).toBe(false);
    });
  });
});
