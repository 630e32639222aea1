import { describe, it, expect } from 'vitest';
import { IndexExprList, formatIndexExprList, isLiteralList, literalsOf } from './list.js';
import { dim, literal, questionmark } from './index-expr.js';
import { Block } from '../ir/block.js';
import { indexType } from '../ir/types.js';

const n = new Block().addArgument(indexType, 'n');

describe('IndexExprList', () => {
  it('should keep insertion order', () => {
    const list = new IndexExprList();
    list.push(literal(2));
    list.push(dim(n));
    list.push(literal(4));

    expect(list.length).toBe(3);
    expect(list.at(1)).toEqual(dim(n));
    expect(list.at(3)).toBeUndefined();
    expect([...list]).toEqual([literal(2), dim(n), literal(4)]);
  });

  it('should discard prior contents on fill', () => {
    const list = new IndexExprList([literal(1), literal(2)]);
    list.fill([questionmark()]);
    expect(list.toArray()).toEqual([questionmark()]);
  });

  it('should fill from its own contents', () => {
    const list = new IndexExprList([literal(1), literal(2)]);
    list.fill(list);
    expect(list.toArray()).toEqual([literal(1), literal(2)]);
  });

  it('should hand out copies from toArray', () => {
    const list = new IndexExprList([literal(1)]);
    list.toArray().push(literal(2));
    expect(list.length).toBe(1);
  });

  it('should clear', () => {
    const list = new IndexExprList([literal(1)]);
    list.clear();
    expect(list.length).toBe(0);
    expect(list.toString()).toBe('[]');
  });
});

describe('List helpers', () => {
  it('should detect all-literal lists', () => {
    expect(isLiteralList([literal(1), literal(2)])).toBe(true);
    expect(isLiteralList([literal(1), dim(n)])).toBe(false);
    expect(isLiteralList([])).toBe(true);
  });

  it('should extract literal values', () => {
    expect(literalsOf(new IndexExprList([literal(3), literal(0)]))).toEqual([3, 0]);
    expect(() => literalsOf([literal(3), questionmark()])).toThrow('Expected literal at position 1, got ?');
  });

  it('should format lists', () => {
    expect(formatIndexExprList([literal(2), dim(n), questionmark()])).toBe('[2, dim(%n), ?]');
  });
});
