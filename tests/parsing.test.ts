import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { isWalletAddress, parseBooleanInput, parseLimit, parseScaleFactor } from '../src/utils/parsing.js';

describe('input parsing', () => {
  it('parseBooleanInput handles nullish values', () => {
    assert.equal(parseBooleanInput(null), undefined);
    assert.equal(parseBooleanInput(undefined), undefined);
  });

  it('parseBooleanInput handles booleans and numbers directly', () => {
    assert.equal(parseBooleanInput(true), true);
    assert.equal(parseBooleanInput(false), false);
    assert.equal(parseBooleanInput(1), true);
    assert.equal(parseBooleanInput(0), false);
  });

  it('parseBooleanInput handles truthy/falsy strings', () => {
    assert.equal(parseBooleanInput('true'), true);
    assert.equal(parseBooleanInput(' TRUE '), true);
    assert.equal(parseBooleanInput('yes'), true);
    assert.equal(parseBooleanInput('on'), true);

    assert.equal(parseBooleanInput('false'), false);
    assert.equal(parseBooleanInput('0'), false);
    assert.equal(parseBooleanInput('off'), false);
  });

  it('parseBooleanInput rejects values it cannot read', () => {
    assert.equal(parseBooleanInput(''), undefined);
    assert.equal(parseBooleanInput('maybe'), undefined);
    assert.equal(parseBooleanInput({}), undefined);
  });

  it('parseScaleFactor defaults to 1 and accepts (0, 10]', () => {
    assert.equal(parseScaleFactor(undefined), 1);
    assert.equal(parseScaleFactor(''), 1);
    assert.equal(parseScaleFactor(0.25), 0.25);
    assert.equal(parseScaleFactor('2.5'), 2.5);
    assert.equal(parseScaleFactor(10), 10);
  });

  it('parseScaleFactor rejects zero, negatives, overflow and junk', () => {
    assert.equal(parseScaleFactor(0), null);
    assert.equal(parseScaleFactor(-1), null);
    assert.equal(parseScaleFactor(10.01), null);
    assert.equal(parseScaleFactor('abc'), null);
    assert.equal(parseScaleFactor(true), null);
  });

  it('isWalletAddress accepts 40 hex chars after 0x', () => {
    assert.equal(isWalletAddress('0x' + 'aB'.repeat(20)), true);
    assert.equal(isWalletAddress('0x' + 'a'.repeat(39)), false);
    assert.equal(isWalletAddress('0x' + 'g'.repeat(40)), false);
    assert.equal(isWalletAddress(42), false);
  });

  it('parseLimit clamps and falls back', () => {
    assert.equal(parseLimit(undefined), 50);
    assert.equal(parseLimit('abc', 20), 20);
    assert.equal(parseLimit('0'), 1);
    assert.equal(parseLimit('25'), 25);
    assert.equal(parseLimit('100000'), 500);
  });
});
