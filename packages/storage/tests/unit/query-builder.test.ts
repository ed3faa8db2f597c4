/**
 * Tests for utils/query-builder.ts
 */

import { describe, it, expect } from 'vitest';
import {
  buildChunkedInserts,
  buildMultiRowInsert,
  buildPlaceholderList,
} from '../../src/utils/query-builder.js';

describe('Query Builder', () => {
  describe('buildMultiRowInsert', () => {
    it('should number placeholders across rows', () => {
      const query = buildMultiRowInsert('t', ['a', 'b'], [
        [1, 'x'],
        [2, 'y'],
      ]);

      expect(query.text).toBe('INSERT INTO t (a, b) VALUES ($1, $2), ($3, $4)');
      expect(query.params).toEqual([1, 'x', 2, 'y']);
    });

    it('should append the suffix', () => {
      expect(buildMultiRowInsert('t', ['a'], [[1]], 'RETURNING id').text).toBe(
        'INSERT INTO t (a) VALUES ($1) RETURNING id'
      );
    });

    it('should reject a row with the wrong width', () => {
      expect(() => buildMultiRowInsert('t', ['a', 'b'], [[1]])).toThrow(
        'Row for t has 1 values but 2 columns were given'
      );
    });
  });

  describe('buildChunkedInserts', () => {
    it('should split rows so no statement exceeds the parameter limit', () => {
      const rows = [1, 2, 3, 4, 5].map((value) => [value, `v${value}`]);

      const queries = buildChunkedInserts('t', ['a', 'b'], rows, 'ON CONFLICT DO NOTHING', 4);

      expect(queries.map((query) => query.params)).toEqual([
        [1, 'v1', 2, 'v2'],
        [3, 'v3', 4, 'v4'],
        [5, 'v5'],
      ]);
      expect(queries[2]?.text).toBe('INSERT INTO t (a, b) VALUES ($1, $2) ON CONFLICT DO NOTHING');
    });

    it('should build a single statement under the default limit', () => {
      const rows = Array.from({ length: 100 }, (_, i) => [i, i * 2]);

      expect(buildChunkedInserts('t', ['a', 'b'], rows)).toHaveLength(1);
    });

    it('should build nothing for no rows', () => {
      expect(buildChunkedInserts('t', ['a'], [])).toEqual([]);
    });

    it('should reject a table wider than the limit', () => {
      expect(() => buildChunkedInserts('t', ['a', 'b', 'c'], [[1, 2, 3]], undefined, 2)).toThrow(
        't has more columns than one statement can bind'
      );
    });
  });

  describe('buildPlaceholderList', () => {
    it('should start from the given position', () => {
      expect(buildPlaceholderList(3, 2)).toBe('$2, $3, $4');
    });
  });
});
