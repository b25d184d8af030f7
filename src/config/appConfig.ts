import { WhatsAppAPIConfig } from '../types/whatsapp';

export interface AppConfig {
  port: number;
  host: string;
  devMode: boolean;
  chatbotName: string;
  whatsapp: WhatsAppAPIConfig & {
    verifyToken: string;
    appSecret: string;
  };
  vision: {
    token?: string;
    timeoutMs: number;
  };
  weather: {
    apiKey?: string;
    timeoutMs: number;
  };
  databasePath: string;
}

function readInt(value: string | undefined, fallback: number): number {
  if (value === undefined || value === '') return fallback;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

/**
 * Reads the service settings from the environment. Call `dotenv.config()`
 * before this so values from `.env` are visible.
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: readInt(env.PORT, 3000),
    host: env.HOST || '0.0.0.0',
    devMode: env.DEV_MODE === 'true',
    chatbotName: env.CHATBOT_NAME || 'Shamba',
    whatsapp: {
      accessToken: env.WHATSAPP_ACCESS_TOKEN || '',
      phoneNumberId: env.WHATSAPP_PHONE_NUMBER_ID || '',
      apiVersion: env.WHATSAPP_API_VERSION || 'v19.0',
      verifyToken: env.WHATSAPP_VERIFY_TOKEN || 'default-verify-token',
      appSecret: env.WHATSAPP_APP_SECRET || ''
    },
    vision: {
      token: env.HUGGING_FACE_TOKEN || undefined,
      timeoutMs: readInt(env.VISION_TIMEOUT_MS, 30000)
    },
    weather: {
      apiKey: env.OPENWEATHER_API_KEY || undefined,
      timeoutMs: readInt(env.WEATHER_TIMEOUT_MS, 10000)
    },
    databasePath: env.DATABASE_PATH || 'data/farm-advisor.db'
  };
}
