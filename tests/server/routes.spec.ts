import { describe, expect, it } from '@jest/globals';

import { parseCommandSegments, parseLinesParam } from '../../src/server/routes.js';

describe('route parameter parsing', () => {
  it('defaults and clamps the lines parameter', () => {
    expect(parseLinesParam(undefined)).toBe(100);
    expect(parseLinesParam('')).toBe(100);
    expect(parseLinesParam('abc')).toBe(100);
    expect(parseLinesParam('25')).toBe(25);
    expect(parseLinesParam(['7', '9'])).toBe(7);
    expect(parseLinesParam('0')).toBe(1);
    expect(parseLinesParam('-4')).toBe(1);
    expect(parseLinesParam('999999')).toBe(10000);
  });

  it('splits and decodes command segments', () => {
    expect(parseCommandSegments('/api/command/start/jupyter')).toEqual(['start', 'jupyter']);
    expect(parseCommandSegments('/api/command/kernel//list/')).toEqual(['kernel', 'list']);
    expect(parseCommandSegments('/api/command/env/create/my%20env')).toEqual(['env', 'create', 'my env']);
    expect(parseCommandSegments('/api/command/')).toEqual([]);
    expect(parseCommandSegments('/api/command/%ZZ')).toBeNull();
  });
});
