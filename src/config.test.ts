import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import YAML from 'js-yaml';
import { ConfigManager, DEFAULT_CONFIG } from './config.js';
import { cleanupTestTempDir, createTestTempDir } from './test-utils/temp-paths.js';

describe('ConfigManager', () => {
  let configDir: string;
  let yamlPath: string;
  let jsonPath: string;

  beforeEach(() => {
    configDir = createTestTempDir('config');
    yamlPath = join(configDir, 'organizer.config.yaml');
    jsonPath = join(configDir, 'organizer.config.json');
  });

  afterEach(() => {
    cleanupTestTempDir(configDir);
  });

  describe('Initialization', () => {
    it('should use defaults when the file does not exist', () => {
      const manager = new ConfigManager(yamlPath, {});
      expect(manager.getAll()).toEqual(DEFAULT_CONFIG);
      expect(manager.validate()).toEqual({ valid: true, errors: [] });
    });

    it('should not share state with the defaults', () => {
      const manager = new ConfigManager(yamlPath, {});
      manager.set('organizer.includeGlobs', ['*.pdf']);
      expect(DEFAULT_CONFIG.organizer.includeGlobs).toEqual(['**/*']);
    });
  });

  describe('Loading', () => {
    it('should merge YAML settings over defaults', () => {
      writeFileSync(
        yamlPath,
        ['organizer:', '  mode: copy', '  excludeGlobs:', '    - "**/*.tmp"', 'paths:', '  reportsDir: /var/reports', ''].join(
          '\n'
        )
      );

      const config = new ConfigManager(yamlPath, {}).getAll();
      expect(config.organizer.mode).toBe('copy');
      expect(config.organizer.excludeGlobs).toEqual(['**/*.tmp']);
      expect(config.organizer.hashConcurrency).toBe(4);
      expect(config.paths.reportsDir).toBe('/var/reports');
      expect(config.api).toEqual({ host: 'localhost', port: 3000 });
    });

    it('should load JSON settings', () => {
      writeFileSync(jsonPath, JSON.stringify({ organizer: { duplicatePolicy: 'quarantine' }, logLevel: 'debug' }));

      const config = new ConfigManager(jsonPath, {}).getAll();
      expect(config.organizer.duplicatePolicy).toBe('quarantine');
      expect(config.logLevel).toBe('debug');
    });

    it('should fall back to defaults for a malformed file', () => {
      writeFileSync(yamlPath, 'organizer: [unclosed');
      expect(new ConfigManager(yamlPath, {}).getAll()).toEqual(DEFAULT_CONFIG);
    });
  });

  describe('Environment overrides', () => {
    it('should let environment variables win over the file', () => {
      writeFileSync(yamlPath, 'organizer:\n  mode: copy\n');

      const config = new ConfigManager(yamlPath, {
        ORGANIZER_MODE: 'move',
        ORGANIZER_HASH_CONCURRENCY: '8',
        ORGANIZER_INDEX_PATH: '/state/index.json',
        ORGANIZER_REPORTS_DIR: '/state/reports',
        PORT: '8080',
        LOG_LEVEL: 'warn',
      }).getAll();

      expect(config.organizer.mode).toBe('move');
      expect(config.organizer.hashConcurrency).toBe(8);
      expect(config.paths.duplicateIndexPath).toBe('/state/index.json');
      expect(config.paths.reportsDir).toBe('/state/reports');
      expect(config.api.port).toBe(8080);
      expect(config.logLevel).toBe('warn');
    });

    it('should ignore empty variables', () => {
      const config = new ConfigManager(yamlPath, { ORGANIZER_MODE: '' }).getAll();
      expect(config.organizer.mode).toBe('move');
    });
  });

  describe('get and set', () => {
    it('should read nested values by dotted path', () => {
      const manager = new ConfigManager(yamlPath, {});
      expect(manager.get('organizer.chunkSizeBytes')).toBe(65536);
      expect(manager.get('organizer.missing', 'fallback')).toBe('fallback');
      expect(manager.get('organizer.mode.deeper')).toBeUndefined();
    });

    it('should write nested values, creating sections as needed', () => {
      const manager = new ConfigManager(yamlPath, {});
      manager.set('paths.duplicateIndexPath', '/data/index.json');
      manager.set('extra.section.flag', true);

      expect(manager.getAll().paths.duplicateIndexPath).toBe('/data/index.json');
      expect(manager.get('extra.section.flag')).toBe(true);
    });
  });

  describe('Validation', () => {
    it('should report values outside their allowed ranges', () => {
      writeFileSync(
        jsonPath,
        JSON.stringify({
          organizer: { mode: 'shuffle', hashConcurrency: 0, chunkSizeBytes: 1.5, quarantineDir: 'image' },
          api: { port: 70000 },
        })
      );

      const manager = new ConfigManager(jsonPath, {});
      expect(manager.validate()).toEqual({
        valid: false,
        errors: [
          'organizer.quarantineDir must not be a category name',
          'organizer.mode must be one of: move, copy',
          'organizer.chunkSizeBytes must be an integer >= 1',
          'organizer.hashConcurrency must be an integer >= 1',
          'api.port must be an integer between 1 and 65535',
        ],
      });
      expect(manager.getAll().organizer.mode).toBe('move');
    });

    it('should reject a hash algorithm the runtime does not provide', () => {
      writeFileSync(yamlPath, 'organizer:\n  hashAlgorithm: sha257\n');

      const manager = new ConfigManager(yamlPath, {});
      expect(manager.validate()).toEqual({
        valid: false,
        errors: ['organizer.hashAlgorithm is not supported: sha257'],
      });
    });

    it('should accept hash algorithm names in any case', () => {
      const manager = new ConfigManager(yamlPath, {});
      manager.set('organizer.hashAlgorithm', 'SHA512');
      expect(manager.validate().valid).toBe(true);
    });

    it('should reject a nested quarantine directory', () => {
      const manager = new ConfigManager(yamlPath, {});
      manager.set('organizer.quarantineDir', 'dupes/nested');
      expect(manager.validate().errors).toEqual(['organizer.quarantineDir must be a single directory name']);
    });
  });

  describe('Saving', () => {
    it('should save YAML and reload it', () => {
      const manager = new ConfigManager(yamlPath, {});
      manager.set('organizer.verifyCopies', false);
      manager.save();

      const saved = YAML.load(readFileSync(yamlPath, 'utf-8'));
      expect(saved).toMatchObject({ organizer: { verifyCopies: false } });
      expect(new ConfigManager(yamlPath, {}).getAll().organizer.verifyCopies).toBe(false);
    });

    it('should save JSON when the path ends in .json', () => {
      const manager = new ConfigManager(jsonPath, {});
      manager.set('api.port', 4000);
      manager.save();

      expect(JSON.parse(readFileSync(jsonPath, 'utf-8')).api.port).toBe(4000);
    });

    it('should reset to defaults', () => {
      const manager = new ConfigManager(yamlPath, { ORGANIZER_MODE: 'copy' });
      manager.reset();
      expect(manager.getAll()).toEqual(DEFAULT_CONFIG);
    });
  });
});
