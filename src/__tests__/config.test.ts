import { loadConfig } from '../config';

describe('loadConfig', () => {
  it('should fall back to defaults', () => {
    expect(loadConfig({})).toEqual({
      port: 3000,
      historyGrowthRate: 0.06,
      defaultMonthlyContribution: 500,
      defaultForecastYears: 10,
    });
  });

  it('should coerce environment strings', () => {
    const config = loadConfig({ PORT: '8080', HISTORY_GROWTH_RATE: '0.05', DEFAULT_FORECAST_YEARS: '20' });

    expect(config.port).toBe(8080);
    expect(config.historyGrowthRate).toBe(0.05);
    expect(config.defaultForecastYears).toBe(20);
  });

  it('should treat blank values as unset', () => {
    expect(loadConfig({ PORT: '', HISTORY_GROWTH_RATE: '', DEFAULT_FORECAST_YEARS: '' })).toEqual({
      port: 3000,
      historyGrowthRate: 0.06,
      defaultMonthlyContribution: 500,
      defaultForecastYears: 10,
    });
  });

  it('should reject a default horizon beyond 100 years', () => {
    expect(() => loadConfig({ DEFAULT_FORECAST_YEARS: '101' })).toThrow();
  });

  it('should reject an invalid growth rate', () => {
    expect(() => loadConfig({ HISTORY_GROWTH_RATE: '-1' })).toThrow();
  });
});
