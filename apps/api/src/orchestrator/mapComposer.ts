import type { MapComposition, MapMarker, PropertyRecord } from '../types.js';

const MAPBOX_STATIC_BASE_URL = 'https://api.mapbox.com/styles/v1';

// red, blue, green, orange, purple
export const MARKER_COLORS = ['e74c3c', '3498db', '2ecc71', 'f39c12', '9b59b6'] as const;

export interface MapOptions {
  accessToken?: string;
  style: string;
  size?: string;
}

export function toMarkers(records: readonly PropertyRecord[]): MapMarker[] {
  return records
    .flatMap((record) => {
      if (!record.coordinates) return [];
      return [
        {
          index: record.index,
          label: String(record.index + 1),
          color: MARKER_COLORS[record.index % MARKER_COLORS.length],
          latitude: record.coordinates.latitude,
          longitude: record.coordinates.longitude
        }
      ];
    })
    .sort((a, b) => a.index - b.index);
}

function overlayFor(marker: MapMarker): string {
  // Mapbox overlays take lon,lat.
  return `pin-s-${marker.label}+${marker.color}(${marker.longitude},${marker.latitude})`;
}

export function staticMapUrl(markers: readonly MapMarker[], options: MapOptions): string | undefined {
  if (!options.accessToken || markers.length === 0) return undefined;
  const overlay = markers.map(overlayFor).join(',');
  const size = options.size ?? '1000x600@2x';
  const url = new URL(`${MAPBOX_STATIC_BASE_URL}/${options.style}/static/${overlay}/auto/${size}`);
  url.searchParams.set('access_token', options.accessToken);
  return url.toString();
}

/**
 * One marker per record with coordinates, labelled with its 1-based index.
 * Records without coordinates are left off the map. Returns null when no
 * record was geocoded.
 */
export function composeMap(records: readonly PropertyRecord[], options: MapOptions): MapComposition | null {
  const markers = toMarkers(records);
  if (markers.length === 0) return null;
  const url = staticMapUrl(markers, options);
  return url ? { markers, url } : { markers };
}
