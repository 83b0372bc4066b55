/**
 * Tests for YAML helpers.
 */
import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { parseYaml, parseYamlWithSchema } from '../../../src/utils/yaml.js';
import { ConfigError, SystemError, ErrorCodes } from '../../../src/utils/errors.js';
import { thrownBy } from '../../helpers/errors.js';

describe('parseYaml', () => {
  it('should parse mappings', () => {
    expect(parseYaml('a: 1\nb: [x, y]\n')).toEqual({ a: 1, b: ['x', 'y'] });
  });

  it('should wrap syntax errors in SystemError', () => {
    const error = thrownBy(() => parseYaml('a: [\n'));

    expect(error).toBeInstanceOf(SystemError);
    expect(error).toMatchObject({ code: ErrorCodes.PARSE_ERROR });
  });
});

describe('parseYamlWithSchema', () => {
  const schema = z.object({ a: z.number().default(7) });

  it('should return validated data', () => {
    expect(parseYamlWithSchema('a: 1\n', schema)).toEqual({ a: 1 });
  });

  it('should apply defaults to an empty document', () => {
    expect(parseYamlWithSchema('', schema)).toEqual({ a: 7 });
  });

  it('should report schema failures with their path', () => {
    const error = thrownBy(() => parseYamlWithSchema('a: text\n', schema));

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({ code: ErrorCodes.CONFIG_INVALID });
    expect(String(error)).toContain('YAML validation failed: a:');
  });
});
