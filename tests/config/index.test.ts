/**
 * Tests for ConfigManager
 */

import { ConfigManager, DEFAULT_CONFIG } from '../../src/config/index.js';
import { InvalidConfigError, StoreUnavailableError } from '../../src/errors.js';
import { FakeEnvironment, MemoryStorage } from '../helpers/fakes.js';

const CONFIG_DIR = '/cfg';
const CONFIG_FILE = '/cfg/config.json';

describe('ConfigManager', () => {
  let storage: MemoryStorage;

  beforeEach(() => {
    storage = new MemoryStorage();
  });

  it('returns defaults when nothing is stored', () => {
    const manager = new ConfigManager(storage, new FakeEnvironment(), CONFIG_DIR);
    expect(manager.config).toEqual(DEFAULT_CONFIG);
  });

  it('merges stored config over environment over defaults', () => {
    storage.files.set(CONFIG_FILE, JSON.stringify({ name: 'atlas', sleepStartHour: 23, sleepEndHour: 7 }));
    const env = new FakeEnvironment({ PRESENCE_NAME: 'from-env', PRESENCE_LETTER: 'q', PRESENCE_IDLE_TIMEOUT: '600' });
    const manager = new ConfigManager(storage, env, CONFIG_DIR);

    expect(manager.config).toEqual({
      letter: 'Q',
      name: 'ATLAS',
      idleTimeoutSeconds: 600,
      sleepStartHour: 23,
      sleepEndHour: 7,
    });
  });

  it('drops invalid stored fields and keeps the valid ones', () => {
    storage.files.set(
      CONFIG_FILE,
      JSON.stringify({ letter: 'AB', name: 'bob', idleTimeoutSeconds: -5, sleepStartHour: 24, sleepEndHour: 6 })
    );
    const manager = new ConfigManager(storage, new FakeEnvironment(), CONFIG_DIR);

    expect(manager.config).toEqual({
      letter: 'A',
      name: 'BOB',
      idleTimeoutSeconds: 300,
      sleepStartHour: 0,
      sleepEndHour: 6,
    });
  });

  it('ignores an unparseable environment timeout', () => {
    const env = new FakeEnvironment({ PRESENCE_IDLE_TIMEOUT: 'soon' });
    const manager = new ConfigManager(storage, env, CONFIG_DIR);
    expect(manager.config.idleTimeoutSeconds).toBe(300);
  });

  it('throws InvalidConfigError for malformed JSON', () => {
    storage.files.set(CONFIG_FILE, '{ letter: ');
    const manager = new ConfigManager(storage, new FakeEnvironment(), CONFIG_DIR);

    expect(() => manager.config).toThrow(InvalidConfigError);
    expect(() => manager.reload()).toThrow('Config file is not valid JSON: /cfg/config.json');
  });

  it('throws InvalidConfigError when the file does not hold an object', () => {
    storage.files.set(CONFIG_FILE, '[1, 2]');
    const manager = new ConfigManager(storage, new FakeEnvironment(), CONFIG_DIR);
    expect(() => manager.config).toThrow('Config file must hold a JSON object: /cfg/config.json');
  });

  it('throws StoreUnavailableError when the file cannot be read', () => {
    storage.files.set(CONFIG_FILE, JSON.stringify({ name: 'NOVA' }));
    storage.readErrors.set(CONFIG_FILE, Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' }));
    const manager = new ConfigManager(storage, new FakeEnvironment(), CONFIG_DIR);

    expect(() => manager.config).toThrow(StoreUnavailableError);
    expect(() => manager.config).toThrow('State store is not accessible: /cfg/config.json');
  });

  it('treats a file removed between the check and the read as empty', () => {
    storage.dirs.add(CONFIG_FILE);
    const manager = new ConfigManager(storage, new FakeEnvironment(), CONFIG_DIR);
    expect(manager.config).toEqual(DEFAULT_CONFIG);
  });

  it('caches until reload()', () => {
    const manager = new ConfigManager(storage, new FakeEnvironment(), CONFIG_DIR);
    expect(manager.config.name).toBe('AGENT');

    storage.files.set(CONFIG_FILE, JSON.stringify({ name: 'NOVA' }));
    expect(manager.config.name).toBe('AGENT');
    expect(manager.reload().name).toBe('NOVA');
  });

  describe('saveConfig', () => {
    it('normalizes and persists updates, merging with stored values', () => {
      storage.files.set(CONFIG_FILE, JSON.stringify({ idleTimeoutSeconds: 120 }));
      const manager = new ConfigManager(storage, new FakeEnvironment(), CONFIG_DIR);

      const saved = manager.saveConfig({ letter: 'c', name: '  Claude ' });

      expect(saved).toEqual({
        letter: 'C',
        name: 'CLAUDE',
        idleTimeoutSeconds: 120,
        sleepStartHour: 0,
        sleepEndHour: 0,
      });
      expect(JSON.parse(storage.files.get(CONFIG_FILE) ?? '')).toEqual({
        idleTimeoutSeconds: 120,
        letter: 'C',
        name: 'CLAUDE',
      });
    });

    it('creates the config directory', () => {
      const manager = new ConfigManager(storage, new FakeEnvironment(), CONFIG_DIR);
      manager.saveConfig({ idleTimeoutSeconds: 0 });
      expect(storage.dirs.has(CONFIG_DIR)).toBe(true);
      expect(manager.config.idleTimeoutSeconds).toBe(0);
    });

    it('rejects an out-of-range hour without writing', () => {
      const manager = new ConfigManager(storage, new FakeEnvironment(), CONFIG_DIR);

      expect(() => manager.saveConfig({ sleepStartHour: 24 })).toThrow(InvalidConfigError);
      expect(() => manager.saveConfig({ sleepStartHour: 24 })).toThrow('Invalid sleepStartHour: Hour must be 0-23');
      expect(storage.writes).toHaveLength(0);
    });

    it('rejects a letter outside A-Z', () => {
      const manager = new ConfigManager(storage, new FakeEnvironment(), CONFIG_DIR);
      expect(() => manager.saveConfig({ letter: '7' })).toThrow('Invalid letter: Letter must be a single character A-Z');
    });

    it('replaces a malformed file instead of merging with it', () => {
      storage.files.set(CONFIG_FILE, '{"name": "NO');
      const manager = new ConfigManager(storage, new FakeEnvironment(), CONFIG_DIR);

      const saved = manager.saveConfig({ letter: 'n' });

      expect(saved).toEqual({ ...DEFAULT_CONFIG, letter: 'N' });
      expect(JSON.parse(storage.files.get(CONFIG_FILE) ?? '')).toEqual({ letter: 'N' });
    });

    it('does not overwrite a file it cannot read', () => {
      storage.files.set(CONFIG_FILE, JSON.stringify({ name: 'NOVA' }));
      storage.readErrors.set(CONFIG_FILE, Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' }));
      const manager = new ConfigManager(storage, new FakeEnvironment(), CONFIG_DIR);

      expect(() => manager.saveConfig({ letter: 'B' })).toThrow(StoreUnavailableError);
      expect(storage.writes).toHaveLength(0);
    });

    it('rejects a negative timeout', () => {
      const manager = new ConfigManager(storage, new FakeEnvironment(), CONFIG_DIR);
      expect(() => manager.saveConfig({ idleTimeoutSeconds: -1 })).toThrow(InvalidConfigError);
    });
  });

  describe('config location', () => {
    it('defaults to a dot directory in the home directory', () => {
      const manager = new ConfigManager(storage, new FakeEnvironment({}, '/home/robin'));
      expect(manager.getConfigPath()).toBe('/home/robin/.agent-presence/config.json');
    });

    it('honors PRESENCE_HOME', () => {
      const manager = new ConfigManager(storage, new FakeEnvironment({ PRESENCE_HOME: '/srv/presence' }));
      expect(manager.getConfigDir()).toBe('/srv/presence');
      expect(manager.getConfigPath()).toBe('/srv/presence/config.json');
    });
  });
});
