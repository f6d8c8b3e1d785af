/**
 * CLI Output Format Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import chalk from 'chalk';
import { formatOutput, isOutputFormat } from '../../cli/output/index.js';
import { formatCellValue, formatTable } from '../../cli/output/table.js';

describe('CLI output', () => {
  beforeEach(() => {
    chalk.level = 0;
  });

  describe('formatTable', () => {
    it('should render rows under a header and rule', () => {
      expect(
        formatTable([
          { id: 'a', score: 0.5 },
          { id: 'bb', score: 1 },
        ])
      ).toBe('id  score\n─────────\na   0.500\nbb  1    \n');
    });

    it('should render an object as key-value lines', () => {
      expect(formatTable({ workspace: 'default', nodeCount: 2, tags: null })).toBe(
        'workspace  default\nnodeCount  2\ntags       —\n'
      );
    });

    it('should report empty results', () => {
      expect(formatTable([])).toBe('No results.\n');
      expect(formatTable({})).toBe('No data.\n');
      expect(formatTable(undefined)).toBe('');
    });
  });

  describe('formatCellValue', () => {
    it('should compact arrays and truncate long text', () => {
      expect(formatCellValue(['a', 'b'])).toBe('a, b');
      expect(formatCellValue([{ id: 1 }, { id: 2 }])).toBe('2');
      expect(formatCellValue([])).toBe('0');
      expect(formatCellValue('x'.repeat(100))).toBe(`${'x'.repeat(77)}...`);
      expect(formatCellValue(null)).toBe('');
    });
  });

  describe('formatOutput', () => {
    it('should pretty-print JSON', () => {
      expect(formatOutput({ removed: 2 }, 'json')).toBe('{\n  "removed": 2\n}\n');
    });

    it('should recognise only known formats', () => {
      expect(isOutputFormat('table')).toBe(true);
      expect(isOutputFormat('sarif')).toBe(false);
    });
  });
});
