import { expect } from 'chai';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { randomUUID } from 'node:crypto';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { checkOptionCombination, readConfig, resolveSettings } from '../src/options.js';

describe('command-line options', () => {
  describe('checkOptionCombination', () => {
    it('accepts each mode on its own', () => {
      expect(() => checkOptionCombination({ color: true })).to.not.throw();
      expect(() => checkOptionCombination({ file: 'a.sql', lines: '1-2', color: true })).to.not.throw();
      expect(() => checkOptionCombination({ watch: 'a.sql', color: true })).to.not.throw();
    });

    it('requires --file for --lines', () => {
      expect(() => checkOptionCombination({ lines: '1-2', color: true })).to.throw('--lines requires --file');
    });

    it('rejects --watch with --file', () => {
      expect(() => checkOptionCombination({ watch: 'a.sql', file: 'b.sql', color: true }))
        .to.throw('Cannot use --watch and --file together');
    });

    it('rejects --watch with --lines', () => {
      expect(() => checkOptionCombination({ watch: 'a.sql', lines: '1-2', color: true }))
        .to.throw('Cannot use --watch and --lines together');
    });
  });

  describe('resolveSettings', () => {
    it('takes the data directory from the flag first', () => {
      expect(resolveSettings({ dataDir: 'flag', color: true }, { dataDir: 'conf' }).dataDir).to.equal('flag');
    });

    it('falls back to the config file, then to data', () => {
      expect(resolveSettings({ color: true }, { dataDir: 'conf' }).dataDir).to.equal('conf');
      expect(resolveSettings({ color: true }, {})).to.deep.equal({ dataDir: 'data', color: true });
    });

    it('turns colour off from either source', () => {
      expect(resolveSettings({ color: false }, {}).color).to.be.false;
      expect(resolveSettings({ color: true }, { color: false }).color).to.be.false;
      expect(resolveSettings({ color: false }, { color: true }).color).to.be.false;
      expect(resolveSettings({ color: true }, { color: true }).color).to.be.true;
    });
  });

  describe('readConfig', () => {
    let cwd: string;
    let warnings: string[];

    beforeEach(async () => {
      cwd = join(tmpdir(), `cairn-options-test-${randomUUID()}`);
      await mkdir(cwd, { recursive: true });
      warnings = [];
    });

    afterEach(async () => {
      await rm(cwd, { recursive: true, force: true });
    });

    const warn = (message: string) => {
      warnings.push(message);
    };

    it('returns an empty config when no file is found', async () => {
      expect(await readConfig(undefined, warn, { env: {}, cwd, homeDir: cwd })).to.deep.equal({});
      expect(warnings).to.deep.equal([]);
    });

    it('loads the named file', async () => {
      await writeFile(join(cwd, 'shell.json'), JSON.stringify({ dataDir: '${ROOT:-base}/db' }));
      expect(await readConfig('shell.json', warn, { env: { ROOT: '/srv' }, cwd, homeDir: cwd }))
        .to.deep.equal({ dataDir: '/srv/db' });
      expect(warnings).to.deep.equal([]);
    });

    it('warns and carries on without an invalid file', async () => {
      const file = join(cwd, 'bad.json');
      await writeFile(file, JSON.stringify({ color: 'sometimes' }));
      expect(await readConfig('bad.json', warn, { env: {}, cwd, homeDir: cwd })).to.deep.equal({});
      expect(warnings).to.deep.equal([`Invalid config file at ${file}`]);
    });

    it('warns and carries on without a missing file named by the environment', async () => {
      const config = await readConfig(undefined, warn, { env: { CAIRN_CONFIG: 'gone.json' }, cwd, homeDir: cwd });
      expect(config).to.deep.equal({});
      expect(warnings).to.have.length(1);
      expect(warnings[0]).to.include(`Failed to load config from '${join(cwd, 'gone.json')}':`);
    });
  });
});
