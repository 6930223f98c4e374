import { describe, expect, it } from 'vitest';
import { buildWriteTags } from '../adapters/exiftool-tagger.js';
import { buildPatch, isEmptyPatch } from '../workers/metadata-worker.js';

describe('buildWriteTags', () => {
  it('should write dates, location and description for a photo', () => {
    const tags = buildWriteTags(
      {
        timestamp: '2021-01-01T12:30:00.000Z',
        gps: { latitude: -33.5, longitude: 151.2 },
        description: 'Beach',
        title: 'Sunset'
      },
      '/tmp/IMG.jpg'
    );

    expect(tags).toEqual({
      DateTimeOriginal: '2021:01:01 12:30:00',
      CreateDate: '2021:01:01 12:30:00',
      ModifyDate: '2021:01:01 12:30:00',
      GPSLatitude: 33.5,
      GPSLongitude: 151.2,
      GPSLatitudeRef: 'S',
      GPSLongitudeRef: 'E',
      ImageDescription: 'Beach',
      Description: 'Beach',
      UserComment: 'Beach',
      Title: 'Sunset'
    });
  });

  it('should add QuickTime dates for videos', () => {
    const tags = buildWriteTags({ timestamp: '2021-01-01T12:30:00.000Z' }, '/tmp/clip.mp4');

    expect(tags).toMatchObject({
      TrackCreateDate: '2021:01:01 12:30:00',
      MediaCreateDate: '2021:01:01 12:30:00'
    });
  });

  it('should produce no tags for an empty patch', () => {
    expect(buildWriteTags({}, '/tmp/IMG.jpg')).toEqual({});
  });
});

describe('buildPatch', () => {
  const metadata = {
    timestamp: '2021-01-01T00:00:00.000Z',
    latitude: 1,
    longitude: 2,
    description: 'desc',
    albumHints: []
  };

  it('should include only the enabled kinds of metadata', () => {
    const patch = buildPatch(metadata, {
      preserveDates: true,
      preserveGps: false,
      preserveDescriptions: true,
      preserveAlbums: true
    });

    expect(patch).toEqual({ timestamp: '2021-01-01T00:00:00.000Z', description: 'desc' });
  });

  it('should recognise a patch with nothing to write', () => {
    const patch = buildPatch(metadata, {
      preserveDates: false,
      preserveGps: false,
      preserveDescriptions: false,
      preserveAlbums: true
    });

    expect(isEmptyPatch(patch)).toBe(true);
  });
});
