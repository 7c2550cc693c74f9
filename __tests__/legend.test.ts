/**
 * Tests for dynamic legend generation
 */

import fc from 'fast-check';
import { computeLegends, LEGEND_FACTORS } from '../src/legend';

describe('computeLegends', () => {
  it('should scale breakpoints to the average', () => {
    const { statsLegend, heatmapLegend } = computeLegends(40);

    expect(statsLegend).toEqual([0, 5, 10, 20, 30, 40, 50, 60, 80, 160]);
    expect(heatmapLegend).toEqual([
      -160, -80, -60, -50, -40, -30, -20, -10, -5,
      0,
      5, 10, 20, 30, 40, 50, 60, 80, 160,
    ]);
  });

  it('should floor low averages at 20', () => {
    const expected = [0, 2.5, 5, 10, 15, 20, 25, 30, 40, 80];

    expect(computeLegends(5)).toEqual(computeLegends(20));
    expect(computeLegends(0).statsLegend).toEqual(expected);
    expect(computeLegends(-12).statsLegend).toEqual(expected);
  });

  it('should fall back to the floor for non-finite averages', () => {
    expect(computeLegends(Number.NaN)).toEqual(computeLegends(20));
    expect(computeLegends(Number.POSITIVE_INFINITY)).toEqual(computeLegends(20));
  });

  it('should keep factors strictly ascending', () => {
    for (let i = 1; i < LEGEND_FACTORS.length; i++) {
      expect(LEGEND_FACTORS[i]).toBeGreaterThan(LEGEND_FACTORS[i - 1]);
    }
    expect(LEGEND_FACTORS).toHaveLength(9);
  });

  /* ------------------------------------------------------------------ */
  /* Properties                                                          */
  /* ------------------------------------------------------------------ */
  describe('properties', () => {
    const averageArb = fc.double({ min: 0, max: 1_000_000, noNaN: true });

    it('should produce a zero-based, strictly ascending stats legend', () => {
      fc.assert(
        fc.property(averageArb, average => {
          const { statsLegend } = computeLegends(average);

          expect(statsLegend).toHaveLength(10);
          expect(statsLegend[0]).toBe(0);
          for (let i = 1; i < statsLegend.length; i++) {
            expect(statsLegend[i]).toBeGreaterThan(statsLegend[i - 1]);
          }
        })
      );
    });

    it('should produce a heatmap legend symmetric around zero', () => {
      fc.assert(
        fc.property(averageArb, average => {
          const { heatmapLegend } = computeLegends(average);

          expect(heatmapLegend).toHaveLength(19);
          expect(heatmapLegend[9]).toBe(0);
          for (let i = 0; i < heatmapLegend.length; i++) {
            expect(heatmapLegend[i] + heatmapLegend[18 - i]).toBe(0);
          }
        })
      );
    });

    it('should end both legends at four times the effective average', () => {
      fc.assert(
        fc.property(averageArb, average => {
          const { statsLegend, heatmapLegend } = computeLegends(average);
          const top = 4 * Math.max(20, average);

          expect(statsLegend[9]).toBe(top);
          expect(heatmapLegend[18]).toBe(top);
        })
      );
    });
  });
});
