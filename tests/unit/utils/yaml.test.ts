/**
 * Tests for YAML utility functions.
 */
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { z } from 'zod';
import { parseYaml, parseYamlWithSchema, loadYamlWithSchema } from '../../../src/utils/yaml.js';
import { SystemError, ErrorCodes } from '../../../src/utils/errors.js';
import { readFile } from '../../../src/utils/file-system.js';

vi.mock('../../../src/utils/file-system.js', () => ({
  readFile: vi.fn(),
}));

const mockReadFile = vi.mocked(readFile);

const Schema = z.object({
  name: z.string(),
  size: z.number().default(50),
});

describe('parseYaml', () => {
  it('should parse valid YAML', () => {
    expect(parseYaml('name: test\nitems:\n  - a\n  - b\n')).toEqual({
      name: 'test',
      items: ['a', 'b'],
    });
  });

  it('should throw a SystemError on invalid YAML', () => {
    expect(() => parseYaml('key: [unclosed')).toThrow(SystemError);
  });
});

describe('parseYamlWithSchema', () => {
  it('should validate and apply defaults', () => {
    expect(parseYamlWithSchema('name: demo', Schema)).toEqual({ name: 'demo', size: 50 });
  });

  it('should report schema violations with their path', () => {
    try {
      parseYamlWithSchema('name: 3', Schema);
      expect.fail('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(SystemError);
      const systemError = error as SystemError;
      expect(systemError.code).toBe(ErrorCodes.INVALID_SCHEMA);
      expect(systemError.message).toContain('name:');
    }
  });
});

describe('loadYamlWithSchema', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should load and validate a file', async () => {
    mockReadFile.mockResolvedValue('name: loaded\nsize: 7\n');

    await expect(loadYamlWithSchema('/tmp/config.yaml', Schema)).resolves.toEqual({
      name: 'loaded',
      size: 7,
    });
  });

  it('should add the file path to validation errors', async () => {
    mockReadFile.mockResolvedValue('size: 7\n');

    await expect(loadYamlWithSchema('/tmp/config.yaml', Schema)).rejects.toThrow(
      '(file: /tmp/config.yaml)'
    );
  });

  it('should wrap read failures', async () => {
    mockReadFile.mockRejectedValue(new Error('ENOENT'));

    await expect(loadYamlWithSchema('/tmp/missing.yaml', Schema)).rejects.toMatchObject({
      code: ErrorCodes.PARSE_ERROR,
    });
  });
});
