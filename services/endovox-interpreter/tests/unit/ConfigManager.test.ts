/**
 * ConfigManager unit tests
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigManager, DEFAULT_CONFIG_PATH } from '../../src/config/ConfigManager.js';
import { getDefaultConfig } from '../../src/config/ConfigSchema.js';
import { ErrorCode } from '../../src/utils/ErrorHandler.js';

describe('ConfigManager', () => {
  let tempDir: string;

  const writeConfig = (content: string): string => {
    const configPath = path.join(tempDir, 'config.json');
    fs.writeFileSync(configPath, content);
    return configPath;
  };

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'endovox-config-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('environment access', () => {
    it('should treat empty strings as unset', () => {
      const manager = new ConfigManager({ GEMINI_API_KEY: '' });

      expect(manager.get('GEMINI_API_KEY')).toBeUndefined();
      expect(manager.getGeminiKey()).toBeUndefined();
    });

    it('should throw for a missing required key', () => {
      const manager = new ConfigManager({});

      expect(() => manager.getRequired('GEMINI_API_KEY')).toThrow(
        'Missing required configuration: GEMINI_API_KEY',
      );
      expect(() => manager.getRequired('GEMINI_API_KEY')).toThrow(
        expect.objectContaining({ code: ErrorCode.CONFIG_MISSING_KEYS }),
      );
    });

    it('should default NODE_ENV to development', () => {
      expect(new ConfigManager({}).getEnv()).toBe('development');
      expect(new ConfigManager({ NODE_ENV: 'production' }).getEnv()).toBe('production');
    });

    it('should resolve the config path from ENDOVOX_CONFIG_PATH', () => {
      expect(new ConfigManager({}).getConfigPath()).toBe(DEFAULT_CONFIG_PATH);
      expect(new ConfigManager({ ENDOVOX_CONFIG_PATH: '/etc/endovox.json' }).getConfigPath()).toBe(
        '/etc/endovox.json',
      );
    });

    it('should load secrets from *_FILE paths', () => {
      const secretPath = path.join(tempDir, 'gemini-key');
      fs.writeFileSync(secretPath, 'test-secret\n');

      const manager = new ConfigManager({ GEMINI_API_KEY_FILE: secretPath });

      expect(manager.getGeminiKey()).toBe('test-secret');
    });

    it('should prefer an explicit value over a *_FILE path', () => {
      const secretPath = path.join(tempDir, 'gemini-key');
      fs.writeFileSync(secretPath, 'test-secret');

      const manager = new ConfigManager({
        GEMINI_API_KEY: 'test-api-key',
        GEMINI_API_KEY_FILE: secretPath,
      });

      expect(manager.getGeminiKey()).toBe('test-api-key');
    });
  });

  describe('loadConfig', () => {
    it('should load the shipped config.json as the defaults', () => {
      expect(new ConfigManager({}).loadConfig()).toEqual(getDefaultConfig());
    });

    it('should use defaults when the file is missing', () => {
      const config = new ConfigManager({}).loadConfig(path.join(tempDir, 'absent.json'));

      expect(config).toEqual(getDefaultConfig());
    });

    it('should complete a partial file with defaults', () => {
      const configPath = writeConfig(JSON.stringify({ pipeline: { validationThreshold: 0.8 } }));

      const config = new ConfigManager({}).loadConfig(configPath);

      expect(config.pipeline).toEqual({
        validationThreshold: 0.8,
        fallbackThreshold: 0.5,
        semanticTimeoutMs: 5000,
      });
      expect(config.llm.model).toBe('gemini-flash-latest');
    });

    it('should apply environment overrides', () => {
      const configPath = writeConfig(JSON.stringify({ pipeline: { validationThreshold: 0.8 } }));
      const manager = new ConfigManager({
        VALIDATION_THRESHOLD: '0.9',
        FALLBACK_THRESHOLD: '0.4',
        SEMANTIC_TIMEOUT_MS: '2500',
        GEMINI_MODEL: 'gemini-test-model',
      });

      const config = manager.loadConfig(configPath);

      expect(config.pipeline).toEqual({
        validationThreshold: 0.9,
        fallbackThreshold: 0.4,
        semanticTimeoutMs: 2500,
      });
      expect(config.llm.model).toBe('gemini-test-model');
    });

    it('should reject a non-numeric override', () => {
      const manager = new ConfigManager({ SEMANTIC_TIMEOUT_MS: 'soon' });

      expect(() => manager.loadConfig(path.join(tempDir, 'absent.json'))).toThrow(
        expect.objectContaining({ code: ErrorCode.CONFIG_VALIDATION_ERROR }),
      );
    });

    it('should reject invalid JSON', () => {
      const configPath = writeConfig('{ "pipeline": ');

      expect(() => new ConfigManager({}).loadConfig(configPath)).toThrow(
        expect.objectContaining({ code: ErrorCode.CONFIG_PARSE_ERROR }),
      );
    });

    it('should reject out-of-range values with the offending path', () => {
      const configPath = writeConfig(JSON.stringify({ pipeline: { fallbackThreshold: 1.5 } }));

      expect(() => new ConfigManager({}).loadConfig(configPath)).toThrow(
        `Invalid configuration in ${configPath}: pipeline.fallbackThreshold`,
      );
    });

    it('should reject a semantic timeout below 100ms', () => {
      const configPath = writeConfig(JSON.stringify({ pipeline: { semanticTimeoutMs: 50 } }));

      expect(() => new ConfigManager({}).loadConfig(configPath)).toThrow(
        expect.objectContaining({ code: ErrorCode.CONFIG_VALIDATION_ERROR }),
      );
    });

    it('should return a deeply frozen config', () => {
      const config = new ConfigManager({}).loadConfig();

      expect(Object.isFrozen(config)).toBe(true);
      expect(Object.isFrozen(config.pipeline)).toBe(true);
      expect(Object.isFrozen(config.llm)).toBe(true);
    });
  });
});
