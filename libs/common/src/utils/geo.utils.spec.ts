import { haversineDistance, isValidCoordinates, isValidLatitude, isValidLongitude } from './geo.utils';

describe('haversineDistance', () => {
  it('returns 0 for the same point', () => {
    const point = { latitude: 13.7563, longitude: 100.5018 };

    expect(haversineDistance(point, point)).toBe(0);
  });

  it('measures one hundredth of a degree of latitude as about 1.1 km', () => {
    const distance = haversineDistance({ latitude: 13.7, longitude: 100.5 }, { latitude: 13.71, longitude: 100.5 });

    expect(distance).toBeCloseTo(1111.95, 1);
  });

  it('is symmetric', () => {
    const a = { latitude: 13.7466, longitude: 100.5393 };
    const b = { latitude: 13.8, longitude: 100.55 };

    expect(haversineDistance(a, b)).toBeCloseTo(haversineDistance(b, a), 9);
  });

  it('does not round the result', () => {
    const distance = haversineDistance({ latitude: 0, longitude: 0 }, { latitude: 0, longitude: 0.001 });

    expect(Number.isInteger(distance)).toBe(false);
  });
});

describe('coordinate validation', () => {
  it('accepts the inclusive limits', () => {
    expect(isValidLatitude(90)).toBe(true);
    expect(isValidLatitude(-90)).toBe(true);
    expect(isValidLongitude(180)).toBe(true);
    expect(isValidLongitude(-180)).toBe(true);
  });

  it('rejects out of range and non-finite values', () => {
    expect(isValidLatitude(90.1)).toBe(false);
    expect(isValidLongitude(-180.5)).toBe(false);
    expect(isValidLatitude(Number.NaN)).toBe(false);
    expect(isValidLongitude(Number.POSITIVE_INFINITY)).toBe(false);
  });

  it('requires both parts of a pair', () => {
    expect(isValidCoordinates({ latitude: 13.7, longitude: 100.5 })).toBe(true);
    expect(isValidCoordinates({ latitude: 13.7, longitude: 200 })).toBe(false);
  });
});
