/**
 * One ranked label from the disease classifier. `note` is only present on
 * the "model loading" placeholder the inference endpoint answers with while
 * a cold model starts up.
 */
export interface Prediction {
  label: string;
  score: number;
  note?: string;
}

// Highest score first. Empty means the classifier could not be reached.
export type ClassificationResult = Prediction[];

export interface DiseaseInfo {
  disease: string;
  confidence: number;
  alternatives: Array<{ disease: string; confidence: number }>;
  status: 'success' | 'error';
}

export interface CurrentConditions {
  temperature: number;
  feelsLike: number;
  humidity: number;
  windSpeed: number; // m/s, as the provider reports it
  description: string;
}

export interface ForecastPeriod {
  timestamp: number; // unix seconds
  temperature: number;
  rain?: {
    volume3h?: number;
  };
}

export interface ForecastSnapshot {
  location: string;
  country: string;
  coordinates: { lat: number; lon: number };
  current: CurrentConditions;
  forecast: ForecastPeriod[];
}
