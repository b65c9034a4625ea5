import { Coordinate, CoordinateResolver, RawCandidate } from '../types';

export class MapResolver implements CoordinateResolver {
  readonly lookups: string[] = [];

  constructor(private readonly coords: Record<string, Coordinate | null>) {}

  async resolve(address: string): Promise<Coordinate | null> {
    this.lookups.push(address);
    return this.coords[address] ?? null;
  }
}

export const candidate = (id: string | null, extra: Partial<RawCandidate> = {}): RawCandidate => ({
  stableId: id,
  name: `Diner ${id ?? 'anon'}`,
  address: `${id ?? 'anon'} Main St`,
  rating: 4,
  ratingCount: 50,
  sourceUrl: `https://maps.example/${id ?? 'anon'}`,
  ...extra,
});
