import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { keepsDotDirectory, resolveRoles, toHint } from '../scripts/hints.ts';
import { ContradictionError } from '../scripts/errors.ts';

describe('hints.toHint', () => {
  it('maps booleans and undefined', () => {
    assert.equal(toHint(undefined), 'unknown');
    assert.equal(toHint(true), 'asserted');
    assert.equal(toHint(false), 'denied');
  });
});

describe('hints.resolveRoles', () => {
  it('rejects a node asserted to be both file and root', () => {
    assert.throws(() => resolveRoles('x', 'asserted', 'asserted'), ContradictionError);
  });

  it('a file is not a root', () => {
    assert.deepEqual(resolveRoles('x', 'asserted', 'unknown'), { isFile: 'asserted', isRootOrDrive: 'denied' });
  });

  it('a root is not a file', () => {
    assert.deepEqual(resolveRoles('x', 'unknown', 'asserted'), { isFile: 'denied', isRootOrDrive: 'asserted' });
  });

  it('leaves unknowns alone', () => {
    assert.deepEqual(resolveRoles('x', 'unknown', 'unknown'), { isFile: 'unknown', isRootOrDrive: 'unknown' });
    assert.deepEqual(resolveRoles('x', 'denied', 'asserted'), { isFile: 'denied', isRootOrDrive: 'asserted' });
  });

  it('keeps dot directories unless the node is a file', () => {
    assert.equal(keepsDotDirectory('asserted'), false);
    assert.equal(keepsDotDirectory('unknown'), true);
    assert.equal(keepsDotDirectory('denied'), true);
  });
});
