import { hasAtMostTwoDecimals, roundMoney, sumMoney } from './money';

describe('roundMoney', () => {
  it('should round to the nearest cent of the stored binary value', () => {
    // 2.675 is stored as 2.67499...
    expect(roundMoney(2.675)).toBe(2.67);
    expect(roundMoney(1.005)).toBe(1);
    expect(roundMoney(3.5000000000000004)).toBe(3.5);
  });

  it('should send exact ties to the even cent', () => {
    expect(roundMoney(0.125)).toBe(0.12);
    expect(roundMoney(0.375)).toBe(0.38);
    expect(roundMoney(-0.125)).toBe(-0.12);
  });

  it('should leave whole and two-decimal values unchanged', () => {
    expect(roundMoney(40)).toBe(40);
    expect(roundMoney(2.5)).toBe(2.5);
    expect(roundMoney(0)).toBe(0);
  });
});

describe('sumMoney', () => {
  it('should add left to right without rounding', () => {
    expect(sumMoney([0.1, 0.2])).toBe(0.30000000000000004);
    expect(roundMoney(sumMoney([0.1, 0.2]))).toBe(0.3);
  });

  it('should return 0 for no values', () => {
    expect(sumMoney([])).toBe(0);
  });
});

describe('hasAtMostTwoDecimals', () => {
  it('should accept cents and reject finer amounts', () => {
    expect(hasAtMostTwoDecimals(1.23)).toBe(true);
    expect(hasAtMostTwoDecimals(10)).toBe(true);
    expect(hasAtMostTwoDecimals(1.234)).toBe(false);
    expect(hasAtMostTwoDecimals(Number.NaN)).toBe(false);
  });
});
