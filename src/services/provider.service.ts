import providerData from '../data/service-providers.json';
import postcodeAreas from '../data/postcode-areas.json';
import { ServiceProvider, ServiceProviderDirectory } from '../types/capabilities';
import { getServiceType } from '../utils/serviceTypes';
import { logger } from '../utils/logger';

type Coordinates = [number, number];

interface DirectoryEntry {
  id: string;
  name: string;
  make?: string;
  tier: number;
  location: string;
  coordinates: number[];
  rating: number;
  phone: string;
  specialties: string[];
  costMultiplier: number;
}

const EARTH_RADIUS_MILES = 3959;
const DEFAULT_RADIUS_MILES = 25;
const MAX_RESULTS = 3;

const AREA_COORDINATES = new Map<string, number[]>(Object.entries(postcodeAreas.areas));

function toCoordinates(values: number[]): Coordinates {
  return [values[0] ?? 0, values[1] ?? 0];
}

function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

/** Great-circle distance in miles, rounded to one decimal place. */
export function haversineMiles(from: Coordinates, to: Coordinates): number {
  const [lat1, lon1] = from;
  const [lat2, lon2] = to;
  const deltaLat = toRadians(lat2 - lat1);
  const deltaLon = toRadians(lon2 - lon1);

  const a =
    Math.sin(deltaLat / 2) ** 2 + Math.cos(toRadians(lat1)) * Math.cos(toRadians(lat2)) * Math.sin(deltaLon / 2) ** 2;
  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));

  return Math.round(EARTH_RADIUS_MILES * c * 10) / 10;
}

/** Approximate location from the postcode area (leading letters); unknown areas resolve to central London. */
export function postcodeToCoordinates(postcode: string): Coordinates {
  const letters = postcode.trim().toUpperCase().match(/^[A-Z]{1,2}/)?.[0] ?? '';
  const match = AREA_COORDINATES.get(letters) ?? AREA_COORDINATES.get(letters.charAt(0));
  return toCoordinates(match ?? postcodeAreas.default);
}

export class ProviderDirectoryService implements ServiceProviderDirectory {
  constructor(
    private readonly entries: DirectoryEntry[] = providerData.providers,
    private readonly fallback: DirectoryEntry[] = providerData.general,
    private readonly radiusMiles: number = DEFAULT_RADIUS_MILES
  ) {}

  findProviders(make: string, serviceType: string, postcode: string): ServiceProvider[] {
    const origin = postcodeToCoordinates(postcode);
    const baseCost = getServiceType(serviceType).baseCost;
    const wanted = make.trim().toLowerCase();

    const matched = this.entries
      .filter((entry) => entry.make?.toLowerCase() === wanted)
      .map((entry) => this.toProvider(entry, origin, baseCost))
      .filter((provider) => provider.distanceMiles <= this.radiusMiles);

    const providers = matched.length > 0 ? matched : this.fallback.map((entry) => this.toProvider(entry, origin, baseCost));
    const ranked = providers
      .sort((a, b) => b.rating - a.rating || a.distanceMiles - b.distanceMiles)
      .slice(0, MAX_RESULTS);

    logger.debug('Service providers resolved', {
      make,
      postcode,
      matched: matched.length,
      usedFallback: matched.length === 0,
    });

    return ranked;
  }

  private toProvider(entry: DirectoryEntry, origin: Coordinates, baseCost: number): ServiceProvider {
    return {
      id: entry.id,
      name: entry.name,
      location: entry.location,
      tier: entry.tier === 1 ? 1 : 2,
      rating: entry.rating,
      phone: entry.phone,
      specialties: entry.specialties,
      distanceMiles: haversineMiles(origin, toCoordinates(entry.coordinates)),
      estimatedCost: Math.round(baseCost * entry.costMultiplier),
    };
  }
}
