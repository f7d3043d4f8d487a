// Tests for numeric-with-unit, quad shorthand and keyword parsers

import { test } from 'node:test';
import assert from 'node:assert/strict';
import {
  autoCalculate,
  em,
  formatNumeric,
  numericEquals,
  parseBorderStyle,
  parseDisplay,
  parseLineHeight,
  parseListStyleType,
  parseNumeric,
  parsePosition,
  parseQuadCoordinates,
  parseTextAlignment,
  percent,
  pt,
  px,
} from '../src/units.ts';
import { MalformedShorthandError, UnknownOptionError } from '../src/errors.ts';

test('parseNumeric reads value and unit suffix', () => {
  assert.deepEqual(parseNumeric('10px'), { value: 10, unit: 'px' });
  assert.deepEqual(parseNumeric('12pt'), { value: 12, unit: 'pt' });
  assert.deepEqual(parseNumeric('-1.5em'), { value: -1.5, unit: 'em' });
  assert.deepEqual(parseNumeric('50%'), { value: 50, unit: 'percent' });
  assert.deepEqual(parseNumeric('25pct'), { value: 25, unit: 'percent' });
  assert.deepEqual(parseNumeric('75percent'), { value: 75, unit: 'percent' });
});

test('parseNumeric ignores whitespace, separators and case', () => {
  assert.deepEqual(parseNumeric(' 12 PT '), { value: 12, unit: 'pt' });
  assert.deepEqual(parseNumeric('1,000_px'), { value: 1000, unit: 'px' });
});

test('parseNumeric falls back to auto and zero', () => {
  assert.deepEqual(parseNumeric('auto'), { value: 0, unit: 'auto' });
  assert.deepEqual(parseNumeric('AutoCalculate'), { value: 0, unit: 'auto' });
  assert.deepEqual(parseNumeric('10'), { value: 10, unit: 'auto' });
  assert.deepEqual(parseNumeric('10furlongs'), { value: 10, unit: 'auto' });
  assert.deepEqual(parseNumeric('wide'), { value: 0, unit: 'auto' });
  assert.deepEqual(parseNumeric(''), { value: 0, unit: 'auto' });
});

test('unit constructors and formatting', () => {
  assert.deepEqual(px(3), { value: 3, unit: 'px' });
  assert.equal(formatNumeric(px(10)), '10px');
  assert.equal(formatNumeric(pt(12)), '12pt');
  assert.equal(formatNumeric(em(1.5)), '1.5em');
  assert.equal(formatNumeric(percent(50)), '50%');
  assert.equal(formatNumeric(autoCalculate(7)), 'auto');
  assert.equal(numericEquals(px(1), px(1)), true);
  assert.equal(numericEquals(px(1), pt(1)), false);
});

test('parseQuadCoordinates splits four values', () => {
  assert.deepEqual(parseQuadCoordinates('10px,20px,30px,40px'), [px(10), px(20), px(30), px(40)]);
  assert.deepEqual(parseQuadCoordinates('{1pt 2pt 3pt 4pt}'), [pt(1), pt(2), pt(3), pt(4)]);
});

test('parseQuadCoordinates repeats missing values', () => {
  assert.deepEqual(parseQuadCoordinates('5px'), [px(5), px(5), px(5), px(5)]);
  assert.deepEqual(parseQuadCoordinates('(1em 2em)'), [em(1), em(2), em(1), em(2)]);
  assert.deepEqual(parseQuadCoordinates('1px 2px 3px'), [px(1), px(2), px(3), px(2)]);
});

test('parseQuadCoordinates rejects malformed input', () => {
  assert.throws(() => parseQuadCoordinates(''), MalformedShorthandError);
  assert.throws(() => parseQuadCoordinates('10px, abc'), MalformedShorthandError);
  assert.throws(() => parseQuadCoordinates('1px 2px 3px 4px 5px'), MalformedShorthandError);
  assert.throws(
    () => parseQuadCoordinates('top'),
    { message: 'Could not parse attribute string option: top' }
  );
});

test('keyword option lists', () => {
  assert.equal(parseDisplay(' Block '), 'block');
  assert.equal(parseDisplay('none'), 'none');
  assert.equal(parsePosition('ABSOLUTE'), 'absolute');
  assert.equal(parseTextAlignment('justified'), 'justified');
  assert.equal(parseBorderStyle('dashed'), 'dashed');
  assert.equal(parseListStyleType('roman'), 'roman');
});

test('unknown keywords throw UnknownOptionError', () => {
  assert.throws(() => parseDisplay('grid'), UnknownOptionError);
  assert.throws(
    () => parsePosition('sticky'),
    { message: 'position attribute string option not found: sticky' }
  );
});

test('parseLineHeight reads number and option', () => {
  assert.deepEqual(parseLineHeight('1.5 numeric'), { value: 1.5, option: 'numeric' });
  assert.deepEqual(parseLineHeight('2'), { value: 2, option: 'normal' });
  assert.deepEqual(parseLineHeight('normal'), { value: 0, option: 'normal' });
});
