import type { GpsCoordinates } from '../types/collaborators.js';

interface GeoDataLike {
  latitude?: unknown;
  longitude?: unknown;
}

/** Takeout writes 0,0 when a photo has no location. */
export const parseGeoData = (geo: GeoDataLike | undefined): GpsCoordinates | undefined => {
  if (!geo) {
    return undefined;
  }
  const latitude = Number(geo.latitude);
  const longitude = Number(geo.longitude);
  if (!Number.isFinite(latitude) || !Number.isFinite(longitude)) {
    return undefined;
  }
  if (latitude === 0 && longitude === 0) {
    return undefined;
  }
  if (Math.abs(latitude) > 90 || Math.abs(longitude) > 180) {
    return undefined;
  }
  return { latitude, longitude };
};
