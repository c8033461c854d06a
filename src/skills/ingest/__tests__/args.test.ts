import { describe, it, expect } from 'vitest';
import { argumentError, EXIT_FAILED, EXIT_USAGE, parseArgs, summaryFormat } from '../args.js';

describe('parseArgs', () => {
  it('reads every option', () => {
    expect(
      parseArgs([
        '--input', 'specs/controller-spec-v2.1.pdf',
        '--output', 'out',
        '--tables', 'specs/controller-spec-v2.1.tables.json',
        '--version', '2.1',
        '--max-pages', '40',
        '--format', 'json',
      ])
    ).toEqual({
      input: 'specs/controller-spec-v2.1.pdf',
      output: 'out',
      tables: 'specs/controller-spec-v2.1.tables.json',
      version: '2.1',
      maxPages: 40,
      format: 'json',
    });
    expect(parseArgs(['-h'])).toEqual({ help: true });
  });
});

describe('argumentError', () => {
  it('accepts a runnable set of arguments', () => {
    expect(argumentError(parseArgs(['--input', 'specs', '--format', 'table', '--max-pages', '3']))).toBeNull();
  });

  it('names the first bad argument', () => {
    expect(argumentError(parseArgs(['--output', 'out']))).toBe('--input is required');
    expect(argumentError(parseArgs(['--input', 'specs', '--format', 'xml']))).toBe('unknown format "xml"');
    expect(argumentError(parseArgs(['--input', 'specs', '--max-pages', 'ten']))).toBe(
      '--max-pages must be a positive integer'
    );
    expect(argumentError(parseArgs(['--input', 'specs', '--max-pages', '0']))).toBe(
      '--max-pages must be a positive integer'
    );
  });

  it('keeps usage errors apart from failed documents', () => {
    expect(EXIT_USAGE).toBe(2);
    expect(EXIT_FAILED).toBe(1);
  });
});

describe('summaryFormat', () => {
  it('defaults to the table', () => {
    expect(summaryFormat(undefined)).toBe('table');
    expect(summaryFormat('json')).toBe('json');
  });
});
