import { describe, it, expect } from 'vitest';
import { parseCliArgs } from '../../src/cli/options.js';
import { InvalidArgumentError } from '../../src/utils/errors.js';

describe('parseCliArgs', () => {
  it('should default to no file and no format', () => {
    expect(parseCliArgs([])).toEqual({ help: false });
  });

  it('should take the first positional argument as the input file', () => {
    expect(parseCliArgs(['dump.txt'])).toEqual({ help: false, inputPath: 'dump.txt' });
  });

  it('should accept "-" for stdin', () => {
    expect(parseCliArgs(['-']).inputPath).toBe('-');
  });

  it('should parse the format flag in both spellings', () => {
    expect(parseCliArgs(['--format', 'json', 'dump.txt']).format).toBe('json');
    expect(parseCliArgs(['-f', 'text']).format).toBe('text');
    expect(parseCliArgs(['--format=json']).format).toBe('json');
  });

  it('should recognize help', () => {
    expect(parseCliArgs(['--help']).help).toBe(true);
    expect(parseCliArgs(['-h']).help).toBe(true);
  });

  it('should reject unknown flags, extra files and bad formats', () => {
    expect(() => parseCliArgs(['--verbose'])).toThrow(InvalidArgumentError);
    expect(() => parseCliArgs(['a.txt', 'b.txt'])).toThrow('Unexpected argument: b.txt');
    expect(() => parseCliArgs(['--format'])).toThrow('Missing value for --format');
    expect(() => parseCliArgs(['--format', 'csv'])).toThrow(InvalidArgumentError);
  });
});
