import axios from 'axios';
import { ForecastPeriod, ForecastSnapshot } from '../types/advisory';
import { ForecastProvider } from '../types/collaborators';
import { describeError } from '../utils/errors';
import { logger } from '../utils/logger';

const GEO_URL = 'https://api.openweathermap.org/geo/1.0/direct';
const FORECAST_URL = 'https://api.openweathermap.org/data/2.5/forecast';

// 3-hour periods, so eight cover the next 24 hours
const FORECAST_PERIODS = 8;

interface GeocodeResult {
  name: string;
  lat: number;
  lon: number;
  country?: string;
}

interface OpenWeatherPeriod {
  dt: number;
  main: {
    temp: number;
    feels_like: number;
    humidity: number;
  };
  weather: Array<{ description: string }>;
  wind: { speed: number };
  rain?: { '3h'?: number };
}

interface OpenWeatherForecast {
  list: OpenWeatherPeriod[];
}

export interface WeatherServiceOptions {
  apiKey?: string;
  timeoutMs?: number;
}

/**
 * OpenWeather geocoding + 5 day/3 hour forecast. Returns null when the place
 * is unknown, the key is missing or either call fails.
 */
export class WeatherService implements ForecastProvider {
  private apiKey?: string;
  private timeoutMs: number;

  constructor(options: WeatherServiceOptions = {}) {
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs ?? 10000;

    if (!this.apiKey) {
      logger.logWeather('OPENWEATHER_API_KEY not set - weather features disabled');
    }
  }

  async forecast(placeName: string): Promise<ForecastSnapshot | null> {
    if (!this.apiKey) {
      return null;
    }

    try {
      logger.logWeather(`Getting weather for: ${placeName}`);

      const geo = await axios.get<GeocodeResult[]>(GEO_URL, {
        params: { q: placeName, limit: 1, appid: this.apiKey },
        timeout: this.timeoutMs,
        validateStatus: () => true
      });

      const place = geo.status === 200 && Array.isArray(geo.data) ? geo.data[0] : undefined;
      if (!place) {
        logger.logWeather(`Location not found: ${placeName}`);
        return null;
      }

      const weather = await axios.get<OpenWeatherForecast>(FORECAST_URL, {
        params: { lat: place.lat, lon: place.lon, appid: this.apiKey, units: 'metric' },
        timeout: this.timeoutMs,
        validateStatus: () => true
      });

      if (weather.status !== 200 || !weather.data.list?.length) {
        logger.logError(`Weather API error: ${weather.status}`);
        return null;
      }

      return toSnapshot(place, weather.data.list);
    } catch (error) {
      logger.logError('Error getting weather', describeError(error));
      return null;
    }
  }
}

function toPeriod(period: OpenWeatherPeriod): ForecastPeriod {
  const mapped: ForecastPeriod = { timestamp: period.dt, temperature: period.main.temp };
  if (period.rain) {
    mapped.rain = { volume3h: period.rain['3h'] };
  }
  return mapped;
}

function toSnapshot(place: GeocodeResult, list: OpenWeatherPeriod[]): ForecastSnapshot {
  const [now] = list;
  return {
    location: place.name,
    country: place.country ?? '',
    coordinates: { lat: place.lat, lon: place.lon },
    current: {
      temperature: now.main.temp,
      feelsLike: now.main.feels_like,
      humidity: now.main.humidity,
      windSpeed: now.wind.speed,
      description: now.weather[0]?.description ?? ''
    },
    forecast: list.slice(0, FORECAST_PERIODS).map(toPeriod)
  };
}
