import { yearsToMonths, tenureRange } from '../../utils/time';

describe('yearsToMonths', () => {
  it('should convert whole years', () => {
    expect(yearsToMonths(30)).toBe(360);
  });

  it('should keep fractional years fractional', () => {
    expect(yearsToMonths(2.5)).toBe(30);
    expect(yearsToMonths(0.25)).toBe(3);
  });

  it('should return 0 for 0 years', () => {
    expect(yearsToMonths(0)).toBe(0);
  });
});

describe('tenureRange', () => {
  it('should list tenures inclusively in ascending order', () => {
    expect(tenureRange(1, 5)).toEqual([1, 2, 3, 4, 5]);
  });

  it('should return a single tenure when bounds match', () => {
    expect(tenureRange(3, 3)).toEqual([3]);
  });

  it('should return an empty list for an empty range', () => {
    expect(tenureRange(1, 0)).toEqual([]);
  });
});
