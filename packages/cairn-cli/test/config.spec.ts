import { expect } from 'chai';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { randomUUID } from 'node:crypto';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import {
  CONFIG_ENV_VAR,
  interpolateEnvVars,
  loadConfig,
  resolveConfigPath,
  validateConfig,
} from '../src/config.js';

describe('config', () => {
  describe('validateConfig', () => {
    it('accepts known fields of the right type', () => {
      expect(validateConfig({})).to.be.true;
      expect(validateConfig({ dataDir: './db', color: false, $schema: 'x' })).to.be.true;
    });

    it('rejects other shapes', () => {
      expect(validateConfig(null)).to.be.false;
      expect(validateConfig([])).to.be.false;
      expect(validateConfig('dataDir')).to.be.false;
      expect(validateConfig({ dataDir: 3 })).to.be.false;
      expect(validateConfig({ color: 'yes' })).to.be.false;
    });
  });

  describe('interpolateEnvVars', () => {
    it('substitutes variables and defaults', () => {
      expect(interpolateEnvVars('${ROOT}/db', { ROOT: '/srv' })).to.equal('/srv/db');
      expect(interpolateEnvVars('${MISSING:-data}', {})).to.equal('data');
    });

    it('leaves unknown variables without default as written', () => {
      expect(interpolateEnvVars('${MISSING}/x', {})).to.equal('${MISSING}/x');
    });
  });

  describe('files', () => {
    let root: string;
    let cwd: string;
    let homeDir: string;

    beforeEach(async () => {
      root = join(tmpdir(), `cairn-config-test-${randomUUID()}`);
      cwd = join(root, 'work');
      homeDir = join(root, 'home');
      await mkdir(cwd, { recursive: true });
      await mkdir(join(homeDir, '.cairn'), { recursive: true });
    });

    afterEach(async () => {
      await rm(root, { recursive: true, force: true });
    });

    it('prefers the explicit option, then the environment variable', async () => {
      const env = { [CONFIG_ENV_VAR]: 'from-env.json' };
      expect(await resolveConfigPath('given.json', { env, cwd, homeDir })).to.equal(join(cwd, 'given.json'));
      expect(await resolveConfigPath(undefined, { env, cwd, homeDir })).to.equal(join(cwd, 'from-env.json'));
    });

    it('falls back to the working directory, then the home directory', async () => {
      expect(await resolveConfigPath(undefined, { env: {}, cwd, homeDir })).to.be.undefined;

      await writeFile(join(homeDir, '.cairn', 'config.json'), '{}');
      expect(await resolveConfigPath(undefined, { env: {}, cwd, homeDir })).to.equal(join(homeDir, '.cairn', 'config.json'));

      await writeFile(join(cwd, 'cairn.config.json'), '{}');
      expect(await resolveConfigPath(undefined, { env: {}, cwd, homeDir })).to.equal(join(cwd, 'cairn.config.json'));
    });

    it('loads and interpolates a config file', async () => {
      const file = join(cwd, 'cairn.config.json');
      await writeFile(file, JSON.stringify({ dataDir: '${DB_ROOT:-/tmp}/cairn', color: false }));
      expect(await loadConfig(file, { DB_ROOT: '/srv' })).to.deep.equal({ dataDir: '/srv/cairn', color: false });
      expect(await loadConfig(file, {})).to.deep.equal({ dataDir: '/tmp/cairn', color: false });
    });

    it('rejects invalid or unreadable files', async () => {
      const invalid = join(cwd, 'invalid.json');
      await writeFile(invalid, JSON.stringify({ color: 'always' }));
      try {
        await loadConfig(invalid);
        expect.fail('expected loadConfig to throw');
      } catch (error) {
        expect(error).to.be.instanceOf(Error);
        expect(error instanceof Error && error.message).to.equal(`Invalid config file at ${invalid}`);
      }

      const missing = join(cwd, 'missing.json');
      try {
        await loadConfig(missing);
        expect.fail('expected loadConfig to throw');
      } catch (error) {
        expect(error instanceof Error && error.message.startsWith(`Failed to load config from '${missing}':`)).to.be.true;
      }
    });
  });
});
