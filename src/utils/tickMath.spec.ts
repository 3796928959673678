import { Q96 } from "../constants";
import {
  InvalidPriceError,
  InvalidRangeError,
  UnknownFeeTierError,
} from "./errors";
import {
  alignToSpacing,
  computeRange,
  getAmountsForNotional,
  getTickSpacing,
  priceToTick,
  sqrtPriceX96ToPrice,
  tickToPrice,
} from "./tickMath";

describe("#tickMath", () => {
  describe("#getTickSpacing", () => {
    it("should map every known fee tier to its spacing", () => {
      expect(getTickSpacing(100)).toBe(1);
      expect(getTickSpacing(500)).toBe(10);
      expect(getTickSpacing(3000)).toBe(60);
      expect(getTickSpacing(10000)).toBe(200);
    });

    it("should reject an unknown fee tier", () => {
      expect(() => getTickSpacing(2500)).toThrow(UnknownFeeTierError);
    });
  });

  describe("#priceToTick", () => {
    it("should return 0 for a price of 1 with equal decimals", () => {
      expect(priceToTick(1, 18, 18)).toBe(0);
    });

    it("should floor to the tick at or below the price", () => {
      expect(priceToTick(0.95, 18, 18)).toBe(-513);
      expect(priceToTick(1.05, 18, 18)).toBe(487);
    });

    it("should land exactly on a tick for a boundary price", () => {
      expect(priceToTick("1.00020001", 18, 18)).toBe(2);
    });

    it("should shift by the decimal difference", () => {
      expect(priceToTick(0.0005, 6, 18)).toBe(200311);
    });

    it.each([0, -1, "abc", Infinity])("should reject price %p", (price) => {
      expect(() => priceToTick(price, 18, 18)).toThrow(InvalidPriceError);
    });
  });

  describe("#alignToSpacing", () => {
    it("should floor toward negative infinity", () => {
      expect(alignToSpacing(119, 3000)).toBe(60);
      expect(alignToSpacing(-1, 3000)).toBe(-60);
      expect(alignToSpacing(-513, 3000)).toBe(-540);
    });

    it("should leave aligned ticks unchanged", () => {
      expect(alignToSpacing(120, 3000)).toBe(120);
      expect(alignToSpacing(-60, 3000)).toBe(-60);
      expect(alignToSpacing(7, 100)).toBe(7);
    });

    it("should reject an unknown fee tier", () => {
      expect(() => alignToSpacing(10, 42)).toThrow(UnknownFeeTierError);
    });
  });

  describe("#computeRange", () => {
    it("should compute aligned ticks around a price of 1", () => {
      expect(
        computeRange(1, { lowerFactor: 0.95, upperFactor: 1.05 }, 18, 18, 3000)
      ).toEqual([-540, 480]);
    });

    it("should return multiples of the spacing with lower < upper", () => {
      const [tickLower, tickUpper] = computeRange(
        "1850.25",
        { lowerFactor: "0.8", upperFactor: "1.25" },
        18,
        6,
        500
      );

      expect(tickLower % 10).toBe(0);
      expect(tickUpper % 10).toBe(0);
      expect(tickLower).toBeLessThan(tickUpper);
    });

    it("should reject a range that collapses to a single tick", () => {
      expect(() =>
        computeRange(1, { lowerFactor: 1, upperFactor: 1 }, 18, 18, 3000)
      ).toThrow(InvalidRangeError);
    });

    it("should reject inverted factors", () => {
      expect(() =>
        computeRange(1, { lowerFactor: 1.01, upperFactor: 0.99 }, 18, 18, 3000)
      ).toThrow(InvalidRangeError);
    });

    it("should reject an unknown fee tier before any price math", () => {
      expect(() =>
        computeRange(1, { lowerFactor: 0.9, upperFactor: 1.1 }, 18, 18, 1)
      ).toThrow(UnknownFeeTierError);
    });
  });

  describe("#tickToPrice / #sqrtPriceX96ToPrice", () => {
    it("should return 1 at tick 0", () => {
      expect(tickToPrice(0, 18, 18).toNumber()).toBe(1);
    });

    it("should read a sqrt price of Q96 as 1", () => {
      expect(sqrtPriceX96ToPrice(Q96, 18, 18).toNumber()).toBe(1);
    });

    it("should scale by the decimal difference", () => {
      expect(sqrtPriceX96ToPrice(Q96, 6, 18).toNumber()).toBe(1e-12);
    });
  });

  describe("#getAmountsForNotional", () => {
    const base = {
      sqrtPriceX96: Q96,
      notional: 100,
      notionalInToken0: false,
      decimals0: 18,
      decimals1: 18,
    };
    const hundred = 100n * 10n ** 18n;

    it("should split an in-range notional across both tokens", () => {
      const { amount0, amount1 } = getAmountsForNotional({
        ...base,
        tickLower: -540,
        tickUpper: 480,
      });

      expect(amount0).toBeGreaterThan(0n);
      expect(amount1).toBeGreaterThan(0n);
      // price is 1, so both legs together are worth the notional (floored)
      expect(amount0 + amount1).toBeLessThanOrEqual(hundred);
      expect(amount0 + amount1).toBeGreaterThanOrEqual(hundred - 2n);
    });

    it("should need only token0 when the price is below the range", () => {
      const { amount0, amount1 } = getAmountsForNotional({
        ...base,
        tickLower: 60,
        tickUpper: 120,
      });

      expect(amount1).toBe(0n);
      expect(amount0).toBeGreaterThan(0n);
    });

    it("should need only token1 when the price is above the range", () => {
      const { amount0, amount1 } = getAmountsForNotional({
        ...base,
        tickLower: -120,
        tickUpper: -60,
      });

      expect(amount0).toBe(0n);
      expect(amount1).toBeGreaterThan(0n);
    });

    it("should reject a zero sqrt price", () => {
      expect(() =>
        getAmountsForNotional({ ...base, sqrtPriceX96: 0n, tickLower: -60, tickUpper: 60 })
      ).toThrow(InvalidPriceError);
    });
  });
});
