import { describe, expect, it } from 'vitest';
import { hasFlag, positionals, readIntOption, readOption } from '@/lib/cliArgs';
import { formatNumber, formatSigned, formatTable, toCsv } from '@/lib/tableFormat';

describe('formatNumber / formatSigned', () => {
  it('formats finite values and dashes out the rest', () => {
    expect(formatNumber(1.234)).toBe('1.23');
    expect(formatNumber(2, 0)).toBe('2');
    expect(formatNumber(null)).toBe('--');
    expect(formatNumber(undefined)).toBe('--');
    expect(formatNumber(Number.NaN)).toBe('--');
  });

  it('prefixes positive values with a plus sign', () => {
    expect(formatSigned(0.5)).toBe('+0.50');
    expect(formatSigned(-0.5)).toBe('-0.50');
    expect(formatSigned(0)).toBe('0.00');
    expect(formatSigned(Number.POSITIVE_INFINITY)).toBe('--');
  });
});

describe('formatTable', () => {
  it('pads columns and right-aligns numbers', () => {
    const table = formatTable(
      [{ header: 'Symbol' }, { header: 'Score', align: 'right' }],
      [
        ['AAA', '1.50'],
        ['BB', '-0.25'],
      ]
    );

    expect(table.split('\n')).toEqual(['Symbol  Score', '------  -----', 'AAA      1.50', 'BB      -0.25']);
  });

  it('trims trailing padding from left-aligned last columns', () => {
    const table = formatTable([{ header: 'Rank', align: 'right' }, { header: 'Sector' }], [['1', 'XLK']]);
    expect(table.split('\n')).toEqual(['Rank  Sector', '----  ------', '   1  XLK']);
  });
});

describe('toCsv', () => {
  it('quotes cells with commas, quotes or newlines', () => {
    expect(toCsv(['a', 'b'], [['x,y', 'say "hi"'], ['plain', 'two\nlines']])).toBe(
      'a,b\n"x,y","say ""hi"""\nplain,"two\nlines"\n'
    );
  });
});

describe('cliArgs', () => {
  const argv = ['AAPL', '--top-n', '5', '--weeks=12', '--no-write', '--sector', 'XLK', 'extra'];

  it('reads options in both spellings', () => {
    expect(readOption(argv, '--top-n')).toBe('5');
    expect(readOption(argv, '--weeks')).toBe('12');
    expect(readOption(argv, '--model')).toBeUndefined();
    expect(readOption(['--model', '--no-write'], '--model')).toBeUndefined();
  });

  it('detects bare flags', () => {
    expect(hasFlag(argv, '--no-write')).toBe(true);
    expect(hasFlag(argv, '--no-hourly')).toBe(false);
  });

  it('parses positive integers with a fallback', () => {
    expect(readIntOption(argv, '--top-n', 10)).toBe(5);
    expect(readIntOption(argv, '--trading-days', 60)).toBe(60);
    expect(() => readIntOption(['--top-n', '0'], '--top-n', 10)).toThrow(
      'invalid_argument: --top-n expects a positive integer, got "0"'
    );
    expect(() => readIntOption(['--top-n=2.5'], '--top-n', 10)).toThrow(/^invalid_argument:/);
  });

  it('collects positionals, skipping option values', () => {
    expect(positionals(argv, ['--top-n', '--sector'])).toEqual(['AAPL', 'extra']);
  });
});
