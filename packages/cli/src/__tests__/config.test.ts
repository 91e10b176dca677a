/**
 * Configuration system tests
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import { afterEach, beforeEach, describe, it, expect } from 'vitest';

import { DEFAULT_CONFIG } from '../config/defaults.js';
import { formatConfig, loadConfig, loadEnvConfig, mapCliToConfig } from '../config/loader.js';
import {
  validateConfig,
  validatePartialConfig,
  ConfigValidationError,
} from '../config/validation.js';
import { ConfigError } from '../errors/cli-errors.js';

describe('Config Defaults', () => {
  it('should be lenient with JSON output', () => {
    expect(DEFAULT_CONFIG).toEqual({
      parser: { strict: false },
      output: { format: 'json', color: true, pretty: false },
    });
  });
});

describe('Config Validation', () => {
  describe('validateConfig', () => {
    it('should accept valid default config', () => {
      expect(validateConfig(DEFAULT_CONFIG)).toEqual(DEFAULT_CONFIG);
    });

    it('should reject config with invalid output format', () => {
      const config = { ...DEFAULT_CONFIG, output: { ...DEFAULT_CONFIG.output, format: 'xml' } };
      expect(() => validateConfig(config)).toThrow(ConfigValidationError);
    });

    it('should reject config with missing sections', () => {
      expect(() => validateConfig({ parser: { strict: true } })).toThrow(ConfigValidationError);
    });
  });

  describe('validatePartialConfig', () => {
    it('should accept empty config', () => {
      expect(validatePartialConfig({})).toEqual({});
    });

    it('should accept partial output config', () => {
      expect(validatePartialConfig({ output: { pretty: true } })).toEqual({
        output: { pretty: true },
      });
    });

    it('should reject unknown top-level keys', () => {
      expect(() => validatePartialConfig({ engine: {} })).toThrow(ConfigValidationError);
    });

    it('should reject invalid values in partial config', () => {
      expect(() => validatePartialConfig({ parser: { strict: 'yes' } })).toThrow(
        ConfigValidationError,
      );
    });
  });

  describe('ConfigValidationError', () => {
    it('should format errors properly', () => {
      const error = new ConfigValidationError([{ path: 'output.format', message: 'Invalid' }]);
      expect(error.message).toBe('Configuration validation failed:\n  output.format: Invalid');
      expect(error.format()).toBe(
        [
          'Configuration validation failed:',
          '',
          '  output.format: Invalid',
          '',
          'Use --help to see available options',
          'Use --show-config to see current configuration',
        ].join('\n'),
      );
    });

    it('should report the path of the failing field', () => {
      expect.assertions(2);
      try {
        validatePartialConfig({ output: { color: 'no' } });
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigValidationError);
        if (error instanceof ConfigValidationError) {
          expect(error.errors.map((e) => e.path)).toEqual(['output.color']);
        }
      }
    });
  });
});

describe('Config Loader', () => {
  describe('loadEnvConfig', () => {
    it('should read nothing from an empty environment', () => {
      expect(loadEnvConfig({})).toEqual({ parser: {}, output: {} });
    });

    it('should read booleans and the output format', () => {
      const config = loadEnvConfig({
        UCIKIT_STRICT: 'true',
        UCIKIT_FORMAT: 'text',
        UCIKIT_COLOR: '0',
        UCIKIT_PRETTY: '1',
      });
      expect(config).toEqual({
        parser: { strict: true },
        output: { format: 'text', color: false, pretty: true },
      });
    });

    it('should reject an unknown format', () => {
      expect(() => loadEnvConfig({ UCIKIT_FORMAT: 'yaml' })).toThrow(ConfigValidationError);
    });
  });

  describe('mapCliToConfig', () => {
    it('should map only the options that were given', () => {
      expect(mapCliToConfig({})).toEqual({});
      expect(mapCliToConfig({ strict: true, noColor: true })).toEqual({
        parser: { strict: true },
        output: { color: false },
      });
    });
  });

  describe('loadConfig', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ucikit-config-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    function writeConfig(content: unknown): string {
      const file = path.join(dir, '.ucikitrc.json');
      fs.writeFileSync(file, JSON.stringify(content), 'utf-8');
      return file;
    }

    it('should apply file, environment and CLI in order of precedence', async () => {
      const file = writeConfig({ parser: { strict: true }, output: { format: 'text', pretty: true } });

      const fromFile = await loadConfig({ config: file }, {});
      expect(fromFile).toEqual({
        parser: { strict: true },
        output: { format: 'text', color: true, pretty: true },
      });

      const fromEnv = await loadConfig({ config: file }, { UCIKIT_FORMAT: 'json' });
      expect(fromEnv.output.format).toBe('json');
      expect(fromEnv.output.pretty).toBe(true);

      const fromCli = await loadConfig(
        { config: file, format: 'text', strict: false },
        { UCIKIT_FORMAT: 'json' },
      );
      expect(fromCli.output.format).toBe('text');
      expect(fromCli.parser.strict).toBe(false);
    });

    it('should reject an invalid config file', async () => {
      const file = writeConfig({ output: { format: 'xml' } });
      await expect(loadConfig({ config: file }, {})).rejects.toThrow(ConfigValidationError);
    });

    it('should wrap errors from a missing config file', async () => {
      await expect(
        loadConfig({ config: path.join(dir, 'missing.json') }, {}),
      ).rejects.toThrow(ConfigError);
    });
  });

  describe('formatConfig', () => {
    it('should print indented JSON', () => {
      expect(formatConfig(DEFAULT_CONFIG)).toBe(JSON.stringify(DEFAULT_CONFIG, null, 2));
    });
  });
});
