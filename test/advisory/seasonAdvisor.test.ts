import {
  getPlantingRecommendation,
  SPECIFY_CROP_TEXT,
  supportedCrops
} from '../../src/advisory/seasonAdvisor';

describe('getPlantingRecommendation', () => {
  test('recommends maize planting before the long rains in March', () => {
    expect(getPlantingRecommendation('maize', 3)).toBe(
      '🌱 *Perfect timing!* Plant maize now before the long rains (March-May). Soil should be ready.'
    );
  });

  test('tells maize farmers to wait in January and July', () => {
    expect(getPlantingRecommendation('maize', 1)).toContain('*Wait for long rains*');
    expect(getPlantingRecommendation('maize', 7)).toContain('*Wait for short rains*');
  });

  test('marks July as not ideal for coffee', () => {
    expect(getPlantingRecommendation('coffee', 7)).toBe(
      '⏸️ *Not ideal for planting* - Coffee is best planted before rainy season. Wait for March-April.'
    );
  });

  test('matches the crop case-insensitively', () => {
    expect(getPlantingRecommendation('  Coffee ', 10)).toContain('*Acceptable planting time*');
  });

  test('asks for a supported crop otherwise', () => {
    expect(getPlantingRecommendation('wheat', 3)).toBe(SPECIFY_CROP_TEXT);
    expect(getPlantingRecommendation('constructor', 3)).toBe(SPECIFY_CROP_TEXT);
  });

  test('has advice for every month of every supported crop', () => {
    for (const crop of supportedCrops()) {
      for (let month = 1; month <= 12; month++) {
        expect(getPlantingRecommendation(crop, month)).not.toBe(SPECIFY_CROP_TEXT);
      }
    }
  });

  test('rejects months outside 1..12', () => {
    expect(() => getPlantingRecommendation('maize', 0)).toThrow(RangeError);
    expect(() => getPlantingRecommendation('maize', 13)).toThrow(RangeError);
    expect(() => getPlantingRecommendation('coffee', 2.5)).toThrow(RangeError);
  });
});
