import {
  impliedProbabilityFromDecimal,
  decimalOddsFromProbability,
  americanOddsFromProbability,
  clampProbability,
  toLogit,
  toProb,
  expectedValue,
  calculateKellyFraction,
} from './odds';

describe('odds', () => {
  describe('impliedProbabilityFromDecimal', () => {
    it('should convert decimal odds to probability', () => {
      expect(impliedProbabilityFromDecimal(2)).toBe(0.5);
      expect(impliedProbabilityFromDecimal(4)).toBe(0.25);
      expect(impliedProbabilityFromDecimal(1.25)).toBeCloseTo(0.8, 10);
    });

    it('should return 0 for non-positive odds', () => {
      expect(impliedProbabilityFromDecimal(0)).toBe(0);
      expect(impliedProbabilityFromDecimal(-3)).toBe(0);
    });
  });

  describe('decimalOddsFromProbability', () => {
    it('should invert implied probability', () => {
      expect(decimalOddsFromProbability(0.5)).toBe(2);
      expect(decimalOddsFromProbability(0.25)).toBe(4);
      expect(decimalOddsFromProbability(0)).toBe(Number.POSITIVE_INFINITY);
    });
  });

  describe('americanOddsFromProbability', () => {
    it('should convert probability to negative American odds when >= 0.5', () => {
      expect(americanOddsFromProbability(0.5)).toBe(-100);
      expect(americanOddsFromProbability(0.75)).toBe(-300);
    });

    it('should convert probability to positive American odds when < 0.5', () => {
      expect(americanOddsFromProbability(0.25)).toBe(300);
      expect(americanOddsFromProbability(0.1)).toBe(900);
    });
  });

  describe('logit / sigmoid', () => {
    it('should map 0.5 to a zero logit and back', () => {
      expect(toLogit(0.5)).toBe(0);
      expect(toProb(0)).toBe(0.5);
    });

    it('should round-trip interior probabilities', () => {
      expect(toProb(toLogit(0.3))).toBeCloseTo(0.3, 12);
      expect(toProb(toLogit(0.85))).toBeCloseTo(0.85, 12);
    });

    it('should clip extreme probabilities before taking the logit', () => {
      expect(clampProbability(0)).toBe(0.001);
      expect(clampProbability(1)).toBe(0.999);
      expect(Number.isFinite(toLogit(0))).toBe(true);
      expect(Number.isFinite(toLogit(1))).toBe(true);
      expect(toProb(toLogit(1))).toBeCloseTo(0.999, 12);
    });

    it('should give the known logit difference between 0.55 and 0.50', () => {
      expect(toLogit(0.55) - toLogit(0.5)).toBeCloseTo(0.2007, 4);
    });
  });

  describe('expectedValue', () => {
    it('should compute EV per unit staked', () => {
      expect(expectedValue(0.6, 2)).toBeCloseTo(0.2, 12);
      expect(expectedValue(0.5, 2)).toBe(0);
      expect(expectedValue(0.4, 2)).toBeCloseTo(-0.2, 12);
    });
  });

  describe('calculateKellyFraction', () => {
    it('should scale the full Kelly fraction', () => {
      // b = 1, p = 0.6, q = 0.4 -> f* = 0.2
      expect(calculateKellyFraction(0.6, 2)).toBeCloseTo(0.05, 12);
      expect(calculateKellyFraction(0.6, 2, 1)).toBeCloseTo(0.2, 12);
    });

    it('should return 0 when decimal odds are at or below 1.0', () => {
      expect(calculateKellyFraction(0.9, 1)).toBe(0);
      expect(calculateKellyFraction(0.9, 0.5)).toBe(0);
    });

    it('should never return a negative fraction', () => {
      expect(calculateKellyFraction(0.3, 2)).toBe(0);
      expect(calculateKellyFraction(0, 3.5)).toBe(0);
    });
  });
});
