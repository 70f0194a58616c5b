import * as fs from 'fs';
import * as path from 'path';
import { loadConfig, loadConfigForScript } from '../src/runtime/config';

// Use a temp directory for test config files
const TEST_DIR = path.join(__dirname, '__config_test_tmp__');

beforeAll(() => {
  fs.mkdirSync(TEST_DIR, { recursive: true });
});

afterAll(() => {
  fs.rmSync(TEST_DIR, { recursive: true, force: true });
});

function writeConfig(name: string, content: unknown): string {
  const filePath = path.join(TEST_DIR, name);
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, typeof content === 'string' ? content : JSON.stringify(content));
  return filePath;
}

describe('Config Loader', () => {
  describe('loadConfig()', () => {
    it('should throw when explicit path does not exist', () => {
      expect(() => loadConfig('/nonexistent/path/wordlang.config.json')).toThrow();
    });

    it('should load a valid config file', () => {
      const configPath = writeConfig('valid.config.json', {
        printFormat: 'plain',
        decodeEscapes: true,
        warnOnUnreadableFiles: false,
        baseDir: 'data',
      });
      expect(loadConfig(configPath)).toEqual({
        printFormat: 'plain',
        decodeEscapes: true,
        warnOnUnreadableFiles: false,
        baseDir: path.join(TEST_DIR, 'data'),
      });
    });

    it('should ignore unknown keys', () => {
      const configPath = writeConfig('extra.config.json', { trace: true, colour: 'red' });
      expect(loadConfig(configPath)).toEqual({ trace: true });
    });

    it('should reject invalid JSON', () => {
      const configPath = writeConfig('broken.config.json', '{ "trace": ');
      expect(() => loadConfig(configPath)).toThrow('Invalid JSON');
    });

    it('should reject a config that is not an object', () => {
      const configPath = writeConfig('array.config.json', ['plain']);
      expect(() => loadConfig(configPath)).toThrow('must be a JSON object');
    });

    it('should reject an unknown print format', () => {
      const configPath = writeConfig('format.config.json', { printFormat: 'fancy' });
      expect(() => loadConfig(configPath)).toThrow(
        `Invalid "printFormat" in ${configPath}: must be one of "legacy", "plain"`,
      );
    });

    it('should reject non-boolean flags', () => {
      const configPath = writeConfig('flag.config.json', { trace: 'yes' });
      expect(() => loadConfig(configPath)).toThrow('Invalid "trace"');
    });
  });

  describe('loadConfigForScript()', () => {
    it('should find wordlang.config.json beside the script', () => {
      writeConfig(path.join('script', 'wordlang.config.json'), { printFormat: 'plain' });
      const config = loadConfigForScript(path.join(TEST_DIR, 'script', 'program.wl'));
      expect(config).toEqual({ printFormat: 'plain' });
    });

    it('should find .wordlangrc.json beside the script', () => {
      writeConfig(path.join('rc', '.wordlangrc.json'), { decodeEscapes: true });
      const config = loadConfigForScript(path.join(TEST_DIR, 'rc', 'program.wl'));
      expect(config).toEqual({ decodeEscapes: true });
    });
  });
});
