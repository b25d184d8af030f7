// East Africa: long rains March-May, short rains October-December

export const SPECIFY_CROP_TEXT = 'Please specify your crop (maize or coffee) for planting recommendations.';

interface SeasonBucket {
  months: number[];
  advice: string;
}

const PLANTING_CALENDAR = new Map<string, SeasonBucket[]>([
  ['maize', [
    {
      months: [2, 3],
      advice: '🌱 *Perfect timing!* Plant maize now before the long rains (March-May). Soil should be ready.'
    },
    {
      months: [9, 10],
      advice: '🌱 *Good time to plant!* Short rains (October-December) are coming. Prepare your land now.'
    },
    {
      months: [4, 5, 11, 12],
      advice: '⏰ *Late but possible* - You can still plant but expect lower yields. Ensure good weed control.'
    },
    {
      months: [6, 7, 8],
      advice: '⏸️ *Wait for short rains* - Too dry now. Prepare land and get seeds ready for October planting.'
    },
    {
      months: [1],
      advice: '⏸️ *Wait for long rains* - Too dry now. Prepare land and get seeds ready for March planting.'
    }
  ]],
  ['coffee', [
    {
      months: [2, 3, 4],
      advice: '🌱 *Good time for coffee planting* - Plant before long rains. Ensure you have shade trees ready.'
    },
    {
      months: [10, 11],
      advice: '🌱 *Acceptable planting time* - Can plant during short rains, but long rains are better.'
    },
    {
      months: [1, 5, 6, 7, 8, 9, 12],
      advice: '⏸️ *Not ideal for planting* - Coffee is best planted before rainy season. Wait for March-April.'
    }
  ]]
]);

export function supportedCrops(): string[] {
  return Array.from(PLANTING_CALENDAR.keys());
}

/**
 * Planting window advice for a crop in a calendar month (1-12).
 */
export function getPlantingRecommendation(crop: string, month: number): string {
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    throw new RangeError(`month must be an integer between 1 and 12, got ${month}`);
  }

  const buckets = PLANTING_CALENDAR.get(crop.trim().toLowerCase());
  if (!buckets) {
    return SPECIFY_CROP_TEXT;
  }

  const bucket = buckets.find(b => b.months.includes(month));
  if (!bucket) {
    throw new Error(`No planting advice for ${crop} in month ${month}`);
  }
  return bucket.advice;
}
