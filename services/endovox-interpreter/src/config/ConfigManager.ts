import * as fs from 'fs';
import * as path from 'path';
import { loadSecretsFromFiles, Logger } from '@endovox/shared';
import { InterpreterConfig, safeValidateConfig } from './ConfigSchema.js';
import { EndovoxError, ErrorCode } from '../utils/ErrorHandler.js';

const logger = Logger.getInstance('endovox:ConfigManager');

export const DEFAULT_CONFIG_PATH = path.resolve(__dirname, '..', '..', 'config', 'config.json');

type Mutable = Record<string, unknown>;

function isRecord(value: unknown): value is Mutable {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepFreeze<T>(value: T): Readonly<T> {
  if (isRecord(value)) {
    for (const entry of Object.values(value)) {
      deepFreeze(entry);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Process configuration: environment access plus the validated,
 * frozen interpreter config.
 */
export class ConfigManager {
  private readonly env: NodeJS.ProcessEnv;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.env = env;
    loadSecretsFromFiles({ env });
  }

  get(key: string): string | undefined {
    const value = this.env[key];
    return value === '' ? undefined : value;
  }

  /**
   * Get a required configuration value, throwing if missing.
   */
  getRequired(key: string): string {
    const value = this.get(key);
    if (value === undefined) {
      throw new EndovoxError(
        ErrorCode.CONFIG_MISSING_KEYS,
        `Missing required configuration: ${key}`,
      );
    }
    return value;
  }

  getGeminiKey(): string | undefined {
    return this.get('GEMINI_API_KEY');
  }

  getGeminiModel(): string | undefined {
    return this.get('GEMINI_MODEL');
  }

  getEnv(): string {
    return this.get('NODE_ENV') ?? 'development';
  }

  getConfigPath(): string {
    return this.get('ENDOVOX_CONFIG_PATH') ?? DEFAULT_CONFIG_PATH;
  }

  /**
   * Read, override from environment, validate and freeze the config.
   * A missing file yields the defaults.
   */
  loadConfig(configPath: string = this.getConfigPath()): Readonly<InterpreterConfig> {
    const raw = this.readConfigFile(configPath);
    const result = safeValidateConfig(this.applyEnvOverrides(raw));

    if (!result.success) {
      const details = result.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new EndovoxError(
        ErrorCode.CONFIG_VALIDATION_ERROR,
        `Invalid configuration in ${configPath}: ${details}`,
        { configPath },
      );
    }

    const model = this.getGeminiModel();
    const config = model ? { ...result.data, llm: { ...result.data.llm, model } } : result.data;

    logger.info('Interpreter configuration loaded', undefined, {
      configPath,
      validationThreshold: config.pipeline.validationThreshold,
      fallbackThreshold: config.pipeline.fallbackThreshold,
      semanticTimeoutMs: config.pipeline.semanticTimeoutMs,
      model: config.llm.model,
    });

    return deepFreeze(config);
  }

  private readConfigFile(configPath: string): unknown {
    if (!fs.existsSync(configPath)) {
      logger.warn(`Config file not found at ${configPath}, using defaults`);
      return {};
    }

    const content = fs.readFileSync(configPath, 'utf-8');
    try {
      return JSON.parse(content);
    } catch (error) {
      throw new EndovoxError(
        ErrorCode.CONFIG_PARSE_ERROR,
        `Failed to parse ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
        { configPath },
      );
    }
  }

  private applyEnvOverrides(raw: unknown): unknown {
    if (!isRecord(raw)) {
      return raw;
    }

    const pipeline: Mutable = isRecord(raw.pipeline) ? { ...raw.pipeline } : {};
    const overrides: ReadonlyArray<readonly [string, string]> = [
      ['VALIDATION_THRESHOLD', 'validationThreshold'],
      ['FALLBACK_THRESHOLD', 'fallbackThreshold'],
      ['SEMANTIC_TIMEOUT_MS', 'semanticTimeoutMs'],
    ];

    for (const [envKey, field] of overrides) {
      const value = this.get(envKey);
      if (value !== undefined) {
        // eslint-disable-next-line functional/immutable-data
        pipeline[field] = Number(value);
      }
    }

    return { ...raw, pipeline };
  }
}

export const configManager = new ConfigManager();
