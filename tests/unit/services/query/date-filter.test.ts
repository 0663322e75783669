import { describe, it, expect } from 'vitest';
import { applyDateFilter, buildDateFilter } from '../../../../src/services/query/date-filter.js';
import { MCPError } from '../../../../src/server/errors.js';

const NOW = new Date(2024, 5, 1);

describe('buildDateFilter', () => {
  it('returns null without bounds', () => {
    expect(buildDateFilter(undefined, undefined, NOW)).toBeNull();
    expect(buildDateFilter(' ', '', NOW)).toBeNull();
  });

  it('runs an open end to the end of next year', () => {
    expect(buildDateFilter('2020', undefined, NOW)).toBe('2020:2025/12/31[PDAT]');
  });

  it('starts an open start at 1800/01/01', () => {
    expect(buildDateFilter(undefined, '2023/06', NOW)).toBe('1800/01/01:2023/06[PDAT]');
  });

  it('keeps both bounds', () => {
    expect(buildDateFilter('2019/01/15', '2021/12/31', NOW)).toBe('2019/01/15:2021/12/31[PDAT]');
  });

  it('rejects other date formats', () => {
    expect(() => buildDateFilter('2020-01-01', undefined, NOW)).toThrow(MCPError);
  });
});

describe('applyDateFilter', () => {
  it('ANDs the filter onto the query', () => {
    expect(applyDateFilter('aneurysm', '2020:2021[PDAT]')).toBe('(aneurysm) AND 2020:2021[PDAT]');
  });

  it('leaves the query alone without a filter', () => {
    expect(applyDateFilter('aneurysm', null)).toBe('aneurysm');
  });
});
