import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadFusionConfig } from '../../src/services/loadFusionConfig';
import { getDefaultConfig } from '../../src/util/config';

describe('Fusion config loader', () => {
  let dir: string;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    dir = mkdtempSync(join(tmpdir(), 'gnss-fusion-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    jest.restoreAllMocks();
  });

  const writeConfig = (content: string) => {
    const path = join(dir, 'config.json');
    writeFileSync(path, content);
    return path;
  };

  it('should use defaults when the file is missing', async () => {
    const config = await loadFusionConfig(join(dir, 'missing.json'));
    expect(config).toEqual(getDefaultConfig());
  });

  it('should merge a partial config over the defaults', async () => {
    const path = writeConfig('{"mode": "simple", "fusionInterval": 500}');
    const config = await loadFusionConfig(path);
    expect(config.mode).toBe('simple');
    expect(config.fusionInterval).toBe(500);
    expect(config.sourceCommand).toBe('gpspipe -r');
  });

  it('should repair hand edited JSON', async () => {
    const path = writeConfig("{mode: 'simple', fusionInterval: 500,}");
    const config = await loadFusionConfig(path);
    expect(config.mode).toBe('simple');
    expect(config.fusionInterval).toBe(500);
  });

  it('should use defaults for an invalid config', async () => {
    const path = writeConfig('{"mode": "kalman"}');
    expect(await loadFusionConfig(path)).toEqual(getDefaultConfig());
  });

  it('should use defaults for a config that is not an object', async () => {
    const path = writeConfig('[1, 2, 3]');
    expect(await loadFusionConfig(path)).toEqual(getDefaultConfig());
  });
});
