/**
 * Grove CLI Tests: grove.config.yaml loading
 */

import { describe, expect, it, beforeAll, afterAll } from 'vitest';
import { loadConfig, validateConfig } from '../../src/cli-config.js';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';

describe('cli-config', () => {
  let tempDir: string;
  let counter = 0;

  beforeAll(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'grove-config-'));
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true });
  });

  async function projectWith(config: string): Promise<string> {
    counter++;
    const dir = path.join(tempDir, `project-${counter}`);
    await fs.mkdir(dir);
    await fs.writeFile(path.join(dir, 'grove.config.yaml'), config);
    return dir;
  }

  describe('loadConfig', () => {
    it('returns an empty configuration without a file', () => {
      expect(loadConfig(tempDir)).toEqual({});
    });

    it('reads every supported key', async () => {
      const dir = await projectWith(
        'loopScope: shared\nmaxCallDepth: 50\ntrace: true\n'
      );
      expect(loadConfig(dir)).toEqual({
        loopScope: 'shared',
        maxCallDepth: 50,
        trace: true,
      });
    });

    it('treats an empty file as no settings', async () => {
      const dir = await projectWith('# defaults only\n');
      expect(loadConfig(dir)).toEqual({});
    });

    it('reports YAML syntax errors as invalid configuration', async () => {
      const dir = await projectWith('loopScope: [shared\n');
      expect(() => loadConfig(dir)).toThrow(/^Invalid configuration: /);
    });
  });

  describe('validateConfig', () => {
    it('rejects non-mapping documents', () => {
      expect(() => validateConfig(['a', 'b'])).toThrow(
        'Invalid configuration: must be a mapping'
      );
      expect(() => validateConfig('text')).toThrow(
        'Invalid configuration: must be a mapping'
      );
    });

    it('rejects unknown keys', () => {
      expect(() => validateConfig({ colour: 'blue' })).toThrow(
        'Invalid configuration: unknown key "colour"'
      );
    });

    it('rejects unknown loop scope policies', () => {
      expect(() => validateConfig({ loopScope: 'sometimes' })).toThrow(
        `Invalid configuration: loopScope must be 'per-iteration' or 'shared', got "sometimes"`
      );
    });

    it('rejects call depths that are not positive integers', () => {
      expect(() => validateConfig({ maxCallDepth: 0 })).toThrow(
        'Invalid configuration: maxCallDepth must be a positive integer, got 0'
      );
      expect(() => validateConfig({ maxCallDepth: 2.5 })).toThrow(
        'Invalid configuration: maxCallDepth must be a positive integer, got 2.5'
      );
    });

    it('rejects non-Boolean trace settings', () => {
      expect(() => validateConfig({ trace: 'yes' })).toThrow(
        'Invalid configuration: trace must be a boolean, got "yes"'
      );
    });

    it('keeps only the keys that are present', () => {
      expect(validateConfig({ loopScope: 'per-iteration' })).toEqual({
        loopScope: 'per-iteration',
      });
    });
  });
});
