import * as fs from 'fs';
import * as path from 'path';
import { AIConfig, AIConfigFile, AIConfigManagerOptions } from '../types/aiConfig';
import { ConfigError, describeError } from './errors';

export class ConfigLoader {
  private configPath: string;
  private defaultConfig: string;

  constructor(options: AIConfigManagerOptions = {}) {
    this.configPath = options.configPath || 'config/ai';
    this.defaultConfig = options.defaultConfig || 'default.json';
  }

  /**
   * Load AI configuration from a config file. An empty `apiKey` in the file
   * is filled from `OPENAI_API_KEY` so the key never has to be committed.
   */
  loadConfig(configName?: string, env: NodeJS.ProcessEnv = process.env): AIConfig {
    const configFileName = configName || this.defaultConfig;
    const configFilePath = path.join(this.configPath, configFileName);

    if (!fs.existsSync(configFilePath)) {
      throw new ConfigError(`Config file not found: ${configFilePath}`);
    }

    let configData: AIConfigFile;
    try {
      configData = JSON.parse(fs.readFileSync(configFilePath, 'utf8'));
    } catch (error) {
      throw new ConfigError(`Failed to load AI configuration from ${configFilePath}: ${describeError(error)}`);
    }

    if (!configData.config) {
      throw new ConfigError(`Invalid config file: missing "config" section in ${configFileName}`);
    }

    const config: AIConfig = {
      ...configData.config,
      apiKey: configData.config.apiKey || env.OPENAI_API_KEY || '',
      baseURL: configData.config.baseURL || env.OPENAI_BASE_URL,
      model: env.OPENAI_MODEL || configData.config.model
    };

    const { isValid, errors } = this.validateConfig(config);
    if (!isValid) {
      throw new ConfigError(`Invalid AI configuration in ${configFileName}: ${errors.join(', ')}`);
    }

    return config;
  }

  validateConfig(config: AIConfig): { isValid: boolean; errors: string[] } {
    const errors: string[] = [];

    if (!config.apiKey) {
      errors.push('apiKey is required');
    }

    if (config.temperature !== undefined && (config.temperature < 0 || config.temperature > 2)) {
      errors.push('temperature must be between 0 and 2');
    }

    if (config.maxTokens !== undefined && config.maxTokens < 1) {
      errors.push('maxTokens must be greater than 0');
    }

    if (config.timeoutMs !== undefined && config.timeoutMs < 1) {
      errors.push('timeoutMs must be greater than 0');
    }

    return {
      isValid: errors.length === 0,
      errors
    };
  }
}

export function createConfigLoaderFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigLoader {
  return new ConfigLoader({
    configPath: env.AI_CONFIG_PATH || 'config/ai',
    defaultConfig: env.AI_CONFIG_FILE || 'default.json'
  });
}
