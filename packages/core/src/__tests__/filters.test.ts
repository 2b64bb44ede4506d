import { describe, it, expect } from 'vitest';

import { ValidationError } from '../errors.js';
import {
  compileFilters,
  escapeLikePattern,
  matchesConditions,
  parseDateFilter,
  pickFilters,
  renderConditions,
} from '../repositories/filters.js';
import { OWNER_ID, widgetTable } from './fixtures.js';

describe('pickFilters', () => {
  it('should keep declared keys and report unknown ones', () => {
    const picked = pickFilters(
      widgetTable.filters,
      { status: 'active', colour: 'red', limit: '10', label: '' },
      ['limit', 'offset']
    );

    expect(picked.filters).toEqual({ status: 'active' });
    expect(picked.ignored).toEqual(['colour']);
  });

  it('should drop non-string values', () => {
    const picked = pickFilters(widgetTable.filters, { status: ['a', 'b'] });

    expect(picked.filters).toEqual({});
  });
});

describe('parseDateFilter', () => {
  it('should default to equality', () => {
    expect(parseDateFilter('date', '2024-05-01')).toEqual({ operator: '=', date: '2024-05-01' });
  });

  it.each([
    ['ge', '>='],
    ['gt', '>'],
    ['le', '<='],
    ['lt', '<'],
    ['eq', '='],
  ])('should map the %s prefix to %s', (prefix, operator) => {
    expect(parseDateFilter('date', `${prefix}2024-05-01`).operator).toBe(operator);
  });

  it('should reject other shapes', () => {
    expect(() => parseDateFilter('date', 'after2024-05-01')).toThrow('invalid date: after2024-05-01');
    expect(() => parseDateFilter('date', '05/01/2024')).toThrow(ValidationError);
  });
});

describe('compileFilters', () => {
  it('should build one condition per supplied key', () => {
    const conditions = compileFilters(widgetTable.filters, {
      owner: OWNER_ID.toUpperCase(),
      label: 'Bo',
      seen: 'lt2024-01-01',
    });

    expect(conditions).toEqual([
      { kind: 'reference', field: 'ownerId', value: OWNER_ID },
      { kind: 'prefix', field: 'label', value: 'Bo' },
      { kind: 'date', field: 'seenAt', operator: '<', date: '2024-01-01', timestamp: true },
    ]);
  });

  it('should reject a reference that is not a UUID', () => {
    expect(() => compileFilters(widgetTable.filters, { owner: '42' })).toThrow('invalid owner: 42');
  });
});

describe('escapeLikePattern', () => {
  it('should escape wildcards and backslashes', () => {
    expect(escapeLikePattern('a%b_c\\d')).toBe('a\\%b\\_c\\\\d');
  });
});

describe('renderConditions', () => {
  it('should number placeholders from the given index', () => {
    const rendered = renderConditions(
      [
        { kind: 'token', field: 'status', value: 'active' },
        { kind: 'date', field: 'madeOn', operator: '>=', date: '2024-01-01', timestamp: false },
      ],
      (field) => (field === 'madeOn' ? 'made_on' : field),
      3
    );

    expect(rendered).toEqual({
      clauses: ['status = $3', 'made_on >= $4::date'],
      params: ['active', '2024-01-01'],
    });
  });
});

describe('matchesConditions', () => {
  const record = new Map<string, unknown>([
    ['ownerId', OWNER_ID],
    ['status', 'active'],
    ['label', 'Bolt cutter'],
    ['seenAt', '2024-03-05T23:30:00.000Z'],
  ]);

  it('should require every condition to hold', () => {
    expect(
      matchesConditions(record, [
        { kind: 'token', field: 'status', value: 'active' },
        { kind: 'prefix', field: 'label', value: 'bolt' },
      ])
    ).toBe(true);
    expect(
      matchesConditions(record, [
        { kind: 'token', field: 'status', value: 'active' },
        { kind: 'prefix', field: 'label', value: 'nut' },
      ])
    ).toBe(false);
  });

  it('should match tokens exactly', () => {
    expect(matchesConditions(record, [{ kind: 'token', field: 'status', value: 'Active' }])).toBe(
      false
    );
  });

  it('should compare timestamps by their UTC date', () => {
    expect(
      matchesConditions(record, [
        { kind: 'date', field: 'seenAt', operator: '=', date: '2024-03-05', timestamp: true },
      ])
    ).toBe(true);
  });

  it('should never match an absent field', () => {
    expect(matchesConditions(record, [{ kind: 'token', field: 'madeOn', value: 'x' }])).toBe(false);
  });
});
