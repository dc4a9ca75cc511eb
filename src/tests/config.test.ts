import * as test from 'node:test';
import * as assert from 'node:assert';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import * as url from 'node:url';
import { DEFAULT_CONFIG, loadConfig, resolveConfig } from '../config.js';
import { ConfigError } from '../errors.js';

const { describe, it, beforeEach, afterEach } = test;
const __dirname = path.dirname(url.fileURLToPath(import.meta.url));

describe('resolveConfig', () => {

  it('should fill in defaults for an empty object', () => {
    assert.deepStrictEqual(resolveConfig({}), DEFAULT_CONFIG);
  });

  it('should take values from the file over the defaults', () => {
    const config = resolveConfig({
      outputDir: 'build',
      latexCommand: 'lualatex',
      latexArgs: ['-halt-on-error'],
      compilePasses: 1,
      keepTex: true
    });

    assert.strictEqual(config.outputDir, 'build');
    assert.strictEqual(config.latexCommand, 'lualatex');
    assert.deepStrictEqual(config.latexArgs, ['-halt-on-error']);
    assert.strictEqual(config.compilePasses, 1);
    assert.strictEqual(config.keepTex, true);
    assert.strictEqual(config.contentDir, 'content');
  });

  it('should reject values of the wrong type', () => {
    assert.throws(() => resolveConfig([]), ConfigError);
    assert.throws(() => resolveConfig({ compilePasses: 0 }), /"compilePasses" must be a positive integer/);
    assert.throws(() => resolveConfig({ compileTimeoutMs: 1.5 }), ConfigError);
    assert.throws(() => resolveConfig({ contentDir: '' }), /"contentDir" must be a non-empty string/);
    assert.throws(() => resolveConfig({ latexArgs: ['-a', 2] }), /"latexArgs" must be an array of strings/);
    assert.throws(() => resolveConfig({ keepTex: 'yes' }), ConfigError);
  });
});

describe('loadConfig', () => {
  let tempDir: string;
  const savedEnv = { YEAREND_CONFIG: process.env.YEAREND_CONFIG, PORT: process.env.PORT };

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'yearend-config-'));
    delete process.env.YEAREND_CONFIG;
    delete process.env.PORT;
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
    for (const [key, value] of Object.entries(savedEnv)) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  it('should use defaults when the file is missing', async () => {
    const config = await loadConfig(tempDir);
    assert.deepStrictEqual(config, DEFAULT_CONFIG);
  });

  it('should read config.default.json', async () => {
    fs.writeFileSync(path.join(tempDir, 'config.default.json'), JSON.stringify({ outputDir: 'pdfs' }));

    const config = await loadConfig(tempDir);

    assert.strictEqual(config.outputDir, 'pdfs');
    assert.strictEqual(config.latexCommand, 'pdflatex');
  });

  it('should pick the file named by YEAREND_CONFIG', async () => {
    fs.writeFileSync(path.join(tempDir, 'config.default.json'), JSON.stringify({ port: 4000 }));
    fs.writeFileSync(path.join(tempDir, 'config.ci.json'), JSON.stringify({ port: 5000 }));
    process.env.YEAREND_CONFIG = 'ci';

    const config = await loadConfig(tempDir);

    assert.strictEqual(config.port, 5000);
  });

  it('should let PORT override the configured port', async () => {
    fs.writeFileSync(path.join(tempDir, 'config.default.json'), JSON.stringify({ port: 4000 }));
    process.env.PORT = '8080';

    const config = await loadConfig(tempDir);

    assert.strictEqual(config.port, 8080);
  });

  it('should raise ConfigError for malformed JSON', async () => {
    fs.writeFileSync(path.join(tempDir, 'config.default.json'), '{ not json');

    await assert.rejects(loadConfig(tempDir), ConfigError);
  });

  it('should load the bundled default config', async () => {
    const config = await loadConfig(path.join(__dirname, '..', '..', 'config'));
    assert.deepStrictEqual(config, DEFAULT_CONFIG);
  });
});
