/**
 * In-process log of routing decisions and collaborator calls. Recent entries
 * are kept in memory for inspection; every entry is echoed to the console.
 */

export type LogType = 'ai_response' | 'vision' | 'weather' | 'route' | 'error';

export interface LogEntry {
  timestamp: string;
  type: LogType;
  message: string;
  data?: unknown;
}

export interface LogFilter {
  type?: LogType;
  limit?: number;
}

const PREFIX: Record<LogType, string> = {
  ai_response: '🤖 [AI_RESPONSE]',
  vision: '🔍 [VISION]',
  weather: '🌤️ [WEATHER]',
  route: '🧭 [ROUTE]',
  error: '❌ [ERROR]'
};

const MAX_ENTRIES = 1000;

export class Logger {
  private static instance: Logger;
  private entries: LogEntry[] = [];

  private constructor() {}

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  log(type: LogType, message: string, data?: unknown): void {
    this.entries.push({ timestamp: new Date().toISOString(), type, message, data });
    if (this.entries.length > MAX_ENTRIES) {
      this.entries.splice(0, this.entries.length - MAX_ENTRIES);
    }

    const write = type === 'error' ? console.error : console.log;
    write(`${PREFIX[type]} ${message}`, data ?? '');
  }

  getLogs(filter: LogFilter = {}): LogEntry[] {
    const matching = filter.type ? this.entries.filter(entry => entry.type === filter.type) : this.entries;
    return filter.limit ? matching.slice(-filter.limit) : [...matching];
  }

  clearLogs(): void {
    this.entries = [];
  }

  logAIResponse(message: string, data?: unknown): void {
    this.log('ai_response', message, data);
  }

  logVision(message: string, data?: unknown): void {
    this.log('vision', message, data);
  }

  logWeather(message: string, data?: unknown): void {
    this.log('weather', message, data);
  }

  logRoute(message: string, data?: unknown): void {
    this.log('route', message, data);
  }

  logError(message: string, data?: unknown): void {
    this.log('error', message, data);
  }
}

export const logger = Logger.getInstance();
