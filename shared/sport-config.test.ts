import { describe, it, expect } from 'vitest';
import { getSeasonDisplayName, getSportConfig, isValidSport } from './sport-config';

describe('sport-config', () => {
  it('recognizes supported sports only', () => {
    expect(isValidSport('wnba')).toBe(true);
    expect(isValidSport('WNBA')).toBe(false);
    expect(isValidSport('cricket')).toBe(false);
  });

  it('names single-year and cross-year seasons', () => {
    expect(getSeasonDisplayName('wnba', 2025)).toBe('WNBA 2025');
    expect(getSeasonDisplayName('nfl', 2025)).toBe('NFL 2025-26');
    expect(getSeasonDisplayName('nhl', 2099)).toBe('NHL 2099-00');
  });

  it('describes regulation periods', () => {
    expect(getSportConfig('nhl').regulationPeriods).toBe(3);
    expect(getSportConfig('mlb').extraPeriodStyle).toBe('innings');
  });
});
