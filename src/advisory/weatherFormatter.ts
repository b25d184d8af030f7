import { ForecastPeriod, ForecastSnapshot } from '../types/advisory';

export const WEATHER_UNAVAILABLE_TEXT =
  "Sorry, I couldn't get weather data for that location. Please check the location name and try again.";

const HEAVY_RAIN_MM = 10;
const LOW_HUMIDITY = 40;
const MODERATE_HUMIDITY = 60;
const HEAT_STRESS_C = 35;
const COLD_STRESS_C = 10;
const STRONG_WIND_KMH = 30;

export interface RainSummary {
  periods: number;
  totalMm: number;
}

export type IrrigationAdvice =
  | 'hold_off'
  | 'wait_and_monitor'
  | 'irrigate_soon'
  | 'check_soil'
  | 'soil_ok';

const IRRIGATION_TEXT: Record<IrrigationAdvice, string> = {
  hold_off: '✋ *Hold off on irrigation* - significant rain expected. Your crops will get plenty of water.',
  wait_and_monitor: '⏸️ *Wait and monitor* - some rain expected but may not be enough. Check soil moisture after rain.',
  irrigate_soon: '💧 *Irrigate soon* - low humidity and no rain forecast. Your crops need water.',
  check_soil: '👀 *Check soil moisture* - moderate humidity but no rain. Irrigate if soil is dry.',
  soil_ok: '✅ *Soil should be okay* - good humidity levels. Monitor for next few days.'
};

export function msToKmh(speed: number): number {
  return speed * 3.6;
}

// A period counts as rainy when the provider attached a rain block at all
export function summarizeRain(periods: ForecastPeriod[]): RainSummary {
  const rainy = periods.filter(period => period.rain !== undefined);
  return {
    periods: rainy.length,
    totalMm: rainy.reduce((sum, period) => sum + (period.rain?.volume3h ?? 0), 0)
  };
}

export function irrigationAdvice(rain: RainSummary, humidity: number): IrrigationAdvice {
  if (rain.periods > 0) {
    return rain.totalMm > HEAVY_RAIN_MM ? 'hold_off' : 'wait_and_monitor';
  }
  if (humidity < LOW_HUMIDITY) return 'irrigate_soon';
  if (humidity < MODERATE_HUMIDITY) return 'check_soil';
  return 'soil_ok';
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1).toLowerCase();
}

/**
 * Farmer-facing weather report with irrigation advice and stress warnings.
 * `null` means the location could not be resolved or the provider failed.
 */
export function formatWeatherReport(snapshot: ForecastSnapshot | null): string {
  if (!snapshot) {
    return WEATHER_UNAVAILABLE_TEXT;
  }

  const { current, forecast, location } = snapshot;
  const windKmh = msToKmh(current.windSpeed);
  const rain = summarizeRain(forecast);

  let report = `🌤️ *Weather for ${location}*\n\n`;
  report += '*Current Conditions:*\n';
  report += `• Temperature: ${current.temperature.toFixed(1)}°C (feels like ${current.feelsLike.toFixed(1)}°C)\n`;
  report += `• Condition: ${capitalize(current.description)}\n`;
  report += `• Humidity: ${current.humidity}%\n`;
  report += `• Wind: ${windKmh.toFixed(1)} km/h\n`;

  report += '\n*Next 24 Hours:*\n';
  if (rain.periods > 0) {
    report += `⚠️ Rain expected (${rain.periods} periods, ~${rain.totalMm.toFixed(1)}mm total)\n`;
  } else {
    report += '☀️ No rain expected\n';
  }

  report += '\n*💧 Irrigation Advice:*\n';
  report += `${IRRIGATION_TEXT[irrigationAdvice(rain, current.humidity)]}\n`;

  if (current.temperature > HEAT_STRESS_C) {
    report += '\n🌡️ *Heat Warning:* Very high temperatures. Crops may experience heat stress. Consider additional watering in evening.\n';
  } else if (current.temperature < COLD_STRESS_C) {
    report += '\n❄️ *Cold Warning:* Low temperatures may slow growth or damage sensitive crops. Protect if possible.\n';
  }

  if (windKmh > STRONG_WIND_KMH) {
    report += '\n💨 *Wind Warning:* Strong winds may damage plants. Consider providing support if needed.\n';
  }

  return report;
}
