import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { DependencyDatabase } from '../../../packages/core/src/core/lookup/dependency-database.js';

describe('DependencyDatabase', () => {
  it('reports missing views as not found', () => {
    const db = new DependencyDatabase();
    assert.equal(db.isLoaded('x'), false);
    assert.deepEqual(db.getViewData('x'), { found: false, name: 'x' });
    assert.deepEqual(db.getComposedView('x'), { found: false, name: 'x' });
  });

  it('copies the dependency list it is given', () => {
    const db = new DependencyDatabase();
    const deps = ['a'];
    db.setViewData('top', {}, deps, 'top');
    deps.push('b');
    assert.deepEqual(db.getViewDependencies('top'), ['a']);
  });

  it('walks dependencies transitively in first-seen order without repeats', () => {
    const db = new DependencyDatabase();
    db.setViewData('top', {}, ['a', 'b'], 'top');
    db.setViewData('a', {}, ['c'], 'a');
    db.setViewData('b', {}, ['c', 'top'], 'b');
    db.setViewData('c', {}, [], 'c');

    assert.deepEqual(db.getViewDependencies('top'), ['a', 'c', 'b']);
  });

  it('lets the first dependency win and the view itself override', () => {
    const db = new DependencyDatabase();
    db.setViewData('a', { key: 'from-a', onlyA: 1 }, [], 'a');
    db.setViewData('b', { key: 'from-b', onlyB: 2, own: 'from-b' }, [], 'b');
    db.setViewData('top', { own: 'from-top' }, ['a', 'b'], 'top');

    assert.deepEqual(db.getComposedView('top'), {
      found: true,
      value: { key: 'from-a', onlyA: 1, onlyB: 2, own: 'from-top' }
    });
  });

  it('treats inherited object keys as ordinary dependency keys', () => {
    const db = new DependencyDatabase();
    db.setViewData('a', { toString: 'from-a' }, [], 'a');
    db.setViewData('top', {}, ['a'], 'top');

    assert.deepEqual(db.getComposedView('top'), { found: true, value: { toString: 'from-a' } });
  });

  it('keeps a __proto__ mapping key as data', () => {
    const db = new DependencyDatabase();
    db.setViewData('a', JSON.parse('{"__proto__": {"ubuntu": ["libproto"]}, "foo": 1}'), [], 'a');
    db.setViewData('top', JSON.parse('{"__proto__": {"ubuntu": ["libproto2"]}}'), ['a'], 'top');

    const result = db.getComposedView('top');
    assert.equal(result.found, true);
    if (result.found) {
      assert.deepEqual(Object.keys(result.value), ['__proto__', 'foo']);
      assert.deepEqual(Object.getOwnPropertyDescriptor(result.value, '__proto__')?.value, { ubuntu: ['libproto2'] });
      assert.equal(Object.getPrototypeOf(result.value), Object.prototype);
    }
  });

  it('skips dependencies that were never loaded', () => {
    const db = new DependencyDatabase();
    db.setViewData('top', { own: true }, ['missing'], 'top');
    assert.deepEqual(db.getComposedView('top'), { found: true, value: { own: true } });
  });
});
