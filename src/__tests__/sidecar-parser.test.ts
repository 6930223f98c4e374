import path from 'node:path';
import fs from 'fs-extra';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { SidecarParser, locateSidecar, metadataFromSidecar, sidecarCandidates } from '../services/sidecar-parser.js';
import { makeTempDir } from './helpers.js';

describe('sidecarCandidates', () => {
  it('should list the common sidecar names in order', () => {
    expect(sidecarCandidates('IMG_0001.jpg')).toEqual([
      'IMG_0001.jpg.json',
      'IMG_0001.jpg.supplemental-metadata.json',
      'IMG_0001.json'
    ]);
  });

  it('should move the duplicate counter behind the extension', () => {
    expect(sidecarCandidates('IMG(1).jpg')).toContain('IMG.jpg(1).json');
  });

  it('should fall back to the original name for edited copies', () => {
    expect(sidecarCandidates('IMG-edited.jpg')).toContain('IMG.jpg.json');
  });

  it('should include the truncated name for long file names', () => {
    const name = `${'x'.repeat(50)}.jpg`;
    expect(sidecarCandidates(name)).toContain(`${name.slice(0, 46)}.json`);
  });
});

describe('locateSidecar', () => {
  it('should pick the first candidate present among siblings', () => {
    const siblings = new Set(['IMG.jpg', 'IMG.json', 'IMG.jpg.json']);
    expect(locateSidecar(path.join('dir', 'IMG.jpg'), siblings)).toBe(path.join('dir', 'IMG.jpg.json'));
  });

  it('should fall back to a prefix match for cut-off supplemental names', () => {
    const siblings = new Set(['IMG.jpg', 'IMG.jpg.supplemental-met.json']);
    expect(locateSidecar(path.join('dir', 'IMG.jpg'), siblings)).toBe(
      path.join('dir', 'IMG.jpg.supplemental-met.json')
    );
  });

  it('should return undefined without a sidecar', () => {
    expect(locateSidecar(path.join('dir', 'IMG.jpg'), new Set(['IMG.jpg']))).toBeUndefined();
  });
});

describe('metadataFromSidecar', () => {
  it('should read timestamp, location, description and album hints', () => {
    const metadata = metadataFromSidecar({
      title: 'IMG.jpg',
      description: 'Line one\nLine two',
      photoTakenTime: { timestamp: '1609459200' },
      geoData: { latitude: 0, longitude: 0 },
      geoDataExif: { latitude: 48.85, longitude: 2.35 },
      albumData: { title: '  Summer  Trip ' }
    });

    expect(metadata).toEqual({
      timestamp: '2021-01-01T00:00:00.000Z',
      latitude: 48.85,
      longitude: 2.35,
      description: 'Line one Line two',
      title: 'IMG.jpg',
      albumHints: ['Summer Trip']
    });
  });

  it('should fall back to the creation time', () => {
    const metadata = metadataFromSidecar({ creationTime: { timestamp: 1609459200 } });
    expect(metadata.timestamp).toBe('2021-01-01T00:00:00.000Z');
  });
});

describe('SidecarParser', () => {
  let dir: string;
  const parser = new SidecarParser();

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('should parse a sidecar file', async () => {
    const file = path.join(dir, 'IMG.jpg.json');
    await fs.writeJson(file, { title: 'IMG.jpg', albums: [{ title: 'Family' }] });

    expect(await parser.parse(file)).toEqual({
      timestamp: undefined,
      latitude: undefined,
      longitude: undefined,
      description: undefined,
      title: 'IMG.jpg',
      albumHints: ['Family']
    });
  });

  it('should yield empty metadata for a missing or malformed sidecar', async () => {
    const broken = path.join(dir, 'broken.json');
    await fs.writeFile(broken, '{"title":');

    expect(await parser.parse(undefined)).toEqual({ albumHints: [] });
    expect(await parser.parse(path.join(dir, 'missing.json'))).toEqual({ albumHints: [] });
    expect(await parser.parse(broken)).toEqual({ albumHints: [] });
  });
});
