import { calculateSIPFutureValue, calculateRequiredSIP } from '../../engine/sip';

describe('calculateSIPFutureValue', () => {
  it('should use the annuity-due formula (contribution at start of month)', () => {
    const monthlyRate = 0.01;
    const expected = 10000 * ((Math.pow(1.01, 120) - 1) / monthlyRate) * 1.01;
    expect(calculateSIPFutureValue(10000, 12, 10)).toBeCloseTo(expected, 4);
  });

  it('should exceed the ordinary annuity by one month of growth', () => {
    const ordinary = 10000 * ((Math.pow(1.01, 120) - 1) / 0.01);
    expect(calculateSIPFutureValue(10000, 12, 10) / ordinary).toBeCloseTo(1.01, 10);
  });

  it('should grow 100 monthly at 12% for a year to about 1280.93', () => {
    expect(calculateSIPFutureValue(100, 12, 1)).toBeCloseTo(1280.93, 2);
  });

  it('should sum contributions at 0% return', () => {
    expect(calculateSIPFutureValue(5000, 0, 10)).toBe(600000);
  });

  it('should return 0 for a non-positive contribution', () => {
    expect(calculateSIPFutureValue(0, 12, 10)).toBe(0);
    expect(calculateSIPFutureValue(-100, 12, 10)).toBe(0);
  });

  it('should return 0 for a non-positive tenure', () => {
    expect(calculateSIPFutureValue(10000, 12, 0)).toBe(0);
  });
});

describe('calculateRequiredSIP', () => {
  it('should find the SIP needed to offset 30 years of interest on 50 lakh', () => {
    expect(calculateRequiredSIP(8207762.33, 12, 30)).toBeCloseTo(2325.2, 1);
  });

  it('should divide evenly at 0% return', () => {
    expect(calculateRequiredSIP(600000, 0, 10)).toBe(5000);
  });

  it('should return 0 for a non-positive target', () => {
    expect(calculateRequiredSIP(0, 12, 10)).toBe(0);
    expect(calculateRequiredSIP(-5000, 12, 10)).toBe(0);
  });

  it('should return 0 for a non-positive tenure', () => {
    expect(calculateRequiredSIP(100000, 12, 0)).toBe(0);
  });

  it('should invert calculateSIPFutureValue', () => {
    for (const rate of [0.5, 6, 9, 12, 24]) {
      for (const years of [1, 5, 10, 30, 49]) {
        const futureValue = calculateSIPFutureValue(100, rate, years);
        const recovered = calculateRequiredSIP(futureValue, rate, years);
        expect(Math.abs(recovered - 100) / 100).toBeLessThan(1e-6);
      }
    }
  });

  it('should need less monthly investment at higher returns', () => {
    const target = 1000000;
    expect(calculateRequiredSIP(target, 12, 15)).toBeLessThan(calculateRequiredSIP(target, 6, 15));
  });
});
