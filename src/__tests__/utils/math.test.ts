import {
  annualToMonthlyReturn,
  assertValidAnnualRate,
  compoundMonth,
  futureValue,
  roundCurrency,
} from '../../utils/math';
import { InvalidParameterError } from '../../utils/errors';

describe('annualToMonthlyReturn', () => {
  it('should convert 12% annual with compound conversion, not division', () => {
    const monthly = annualToMonthlyReturn(0.12);
    expect(monthly).toBeCloseTo(Math.pow(1.12, 1 / 12) - 1, 12);
    expect(monthly).toBeLessThan(0.01);
  });

  it('should convert 0% annual to 0% monthly', () => {
    expect(annualToMonthlyReturn(0)).toBe(0);
  });

  it.each([-0.5, -0.1, 0.04, 0.06, 0.08, 1.0])(
    'should reproduce %p over twelve compoundings',
    (rate) => {
      const monthly = annualToMonthlyReturn(rate);
      expect(Math.pow(1 + monthly, 12)).toBeCloseTo(1 + rate, 12);
    }
  );

  it('should reject rates at or below -100%', () => {
    expect(() => annualToMonthlyReturn(-1)).toThrow(InvalidParameterError);
    expect(() => annualToMonthlyReturn(-3)).toThrow(InvalidParameterError);
  });

  it('should reject non-finite rates', () => {
    expect(() => annualToMonthlyReturn(Number.POSITIVE_INFINITY)).toThrow(InvalidParameterError);
    expect(() => annualToMonthlyReturn(Number.NaN)).toThrow(InvalidParameterError);
  });
});

describe('assertValidAnnualRate', () => {
  it('should name the parameter in the error', () => {
    expect(() => assertValidAnnualRate(-1, 'growthRate')).toThrow(
      'Invalid growthRate: must be greater than -1, got -1'
    );
  });
});

describe('compoundMonth', () => {
  it('should apply growth before adding the contribution', () => {
    expect(compoundMonth(1000, 0.01, 100)).toBeCloseTo(1110, 10);
  });

  it('should default to no contribution', () => {
    expect(compoundMonth(1000, 0.01)).toBeCloseTo(1010, 10);
  });
});

describe('futureValue', () => {
  it('should calculate FV with positive return', () => {
    expect(futureValue(1000, 0.01, 12)).toBeCloseTo(1000 * Math.pow(1.01, 12), 8);
  });

  it('should calculate FV with zero periods', () => {
    expect(futureValue(1000, 0.01, 0)).toBe(1000);
  });

  it('should match repeated monthly compounding', () => {
    let value = 500;
    for (let i = 0; i < 24; i++) {
      value = compoundMonth(value, 0.005);
    }
    expect(futureValue(500, 0.005, 24)).toBeCloseTo(value, 8);
  });
});

describe('roundCurrency', () => {
  it('should round to cents', () => {
    expect(roundCurrency(1234.5678)).toBe(1234.57);
    expect(roundCurrency(10)).toBe(10);
  });
});
