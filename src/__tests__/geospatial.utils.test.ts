/**
 * =============================================================================
 * GEOSPATIAL UTILITIES - Unit Tests
 * =============================================================================
 */

import {
  containsPoint,
  distanceMeters,
  formatPoint,
  normalizeRectangle,
  pointKey,
  pointsEqual,
} from '../shared/utils/geospatial.utils';
import { Point, Rectangle } from '../shared/types/api.types';

const ORIGIN: Point = { latitude: 0, longitude: 0 };
const ONE_DEGREE_EAST: Point = { latitude: 0, longitude: 10000000 };
const OLD_MILL: Point = { latitude: 473768210, longitude: 85417130 };
const CLOCK_TOWER: Point = { latitude: 473801255, longitude: 85392447 };

describe('normalizeRectangle', () => {
  it('orders corners given high-to-low', () => {
    const rect: Rectangle = {
      lo: { latitude: 10, longitude: 20 },
      hi: { latitude: -5, longitude: -7 },
    };

    expect(normalizeRectangle(rect)).toEqual({ left: -7, right: 20, top: 10, bottom: -5 });
  });

  it('gives the same bounds whichever corner comes first', () => {
    const a = { latitude: 400000000, longitude: -750000000 };
    const b = { latitude: 420000000, longitude: -730000000 };

    expect(normalizeRectangle({ lo: a, hi: b })).toEqual(normalizeRectangle({ lo: b, hi: a }));
  });
});

describe('containsPoint', () => {
  const rect: Rectangle = {
    lo: { latitude: 100, longitude: 100 },
    hi: { latitude: 200, longitude: 300 },
  };

  it('includes points on every edge and corner', () => {
    expect(containsPoint(rect, { latitude: 100, longitude: 100 })).toBe(true);
    expect(containsPoint(rect, { latitude: 200, longitude: 300 })).toBe(true);
    expect(containsPoint(rect, { latitude: 150, longitude: 300 })).toBe(true);
    expect(containsPoint(rect, { latitude: 200, longitude: 150 })).toBe(true);
  });

  it('excludes points one unit outside', () => {
    expect(containsPoint(rect, { latitude: 99, longitude: 150 })).toBe(false);
    expect(containsPoint(rect, { latitude: 201, longitude: 150 })).toBe(false);
    expect(containsPoint(rect, { latitude: 150, longitude: 99 })).toBe(false);
    expect(containsPoint(rect, { latitude: 150, longitude: 301 })).toBe(false);
  });

  it('treats a degenerate rectangle as a single point', () => {
    const single: Rectangle = { lo: OLD_MILL, hi: OLD_MILL };

    expect(containsPoint(single, OLD_MILL)).toBe(true);
    expect(containsPoint(single, CLOCK_TOWER)).toBe(false);
  });

  it('accepts swapped corners', () => {
    const swapped: Rectangle = { lo: rect.hi, hi: rect.lo };

    expect(containsPoint(swapped, { latitude: 150, longitude: 200 })).toBe(true);
  });
});

describe('distanceMeters', () => {
  it('is zero between a point and itself', () => {
    expect(distanceMeters(OLD_MILL, OLD_MILL)).toBe(0);
    expect(distanceMeters(ORIGIN, ORIGIN)).toBe(0);
  });

  it('measures one degree of longitude on the equator', () => {
    expect(distanceMeters(ORIGIN, ONE_DEGREE_EAST)).toBe(111194);
  });

  it('measures one degree of latitude the same as one of equatorial longitude', () => {
    expect(distanceMeters(ORIGIN, { latitude: 10000000, longitude: 0 })).toBe(111194);
  });

  it('truncates toward zero', () => {
    // 411.77 m and 993.26 m
    expect(distanceMeters(OLD_MILL, CLOCK_TOWER)).toBe(411);
    expect(distanceMeters(CLOCK_TOWER, { latitude: 473722981, longitude: 85456003 })).toBe(993);
  });

  it('is symmetric', () => {
    expect(distanceMeters(CLOCK_TOWER, OLD_MILL)).toBe(distanceMeters(OLD_MILL, CLOCK_TOWER));
    expect(distanceMeters(ONE_DEGREE_EAST, ORIGIN)).toBe(distanceMeters(ORIGIN, ONE_DEGREE_EAST));
  });

  it('measures half the circumference between the poles', () => {
    const north = { latitude: 900000000, longitude: 0 };
    const south = { latitude: -900000000, longitude: 0 };

    expect(distanceMeters(north, south)).toBe(20015086);
  });

  it('does not reject coordinates outside the geographic range', () => {
    expect(distanceMeters({ latitude: 950000000, longitude: 0 }, { latitude: 900000000, longitude: 0 })).toBe(555974);
  });
});

describe('point helpers', () => {
  it('compares points component-wise', () => {
    expect(pointsEqual(OLD_MILL, { latitude: 473768210, longitude: 85417130 })).toBe(true);
    expect(pointsEqual(OLD_MILL, { latitude: 473768210, longitude: 85417131 })).toBe(false);
  });

  it('builds a key from both coordinates', () => {
    expect(pointKey({ latitude: 1, longitude: -2 })).toBe('1 -2');
    expect(pointKey({ latitude: 12, longitude: 3 })).not.toBe(pointKey({ latitude: 1, longitude: 23 }));
  });

  it('formats points in degrees', () => {
    expect(formatPoint(OLD_MILL)).toBe('(47.3768210, 8.5417130)');
    expect(formatPoint({ latitude: -10000000, longitude: 0 })).toBe('(-1.0000000, 0.0000000)');
  });
});
