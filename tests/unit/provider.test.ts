jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

import { ProviderDirectoryService, haversineMiles, postcodeToCoordinates } from '../../src/services/provider.service';

describe('ProviderDirectoryService', () => {
  const directory = new ProviderDirectoryService();

  it('should rank the make specialists near the customer by rating', () => {
    const providers = directory.findProviders('Ferrari', 'brake_service', 'SW1A 1AA');

    expect(providers.map((provider) => provider.id)).toEqual(['prv-fer-2', 'prv-fer-1', 'prv-fer-3']);
    expect(providers[0]).toMatchObject({
      name: 'Prancing Works London',
      tier: 1,
      distanceMiles: 2.2,
      estimatedCost: 1280,
    });
    expect(providers.map((provider) => provider.estimatedCost)).toEqual([1280, 1200, 880]);
  });

  it('should fall back to general garages when no specialist is in range', () => {
    const providers = directory.findProviders('Ferrari', 'brake_service', 'M1 1AE');

    expect(providers.map((provider) => provider.id)).toEqual(['prv-gen-1', 'prv-gen-2', 'prv-gen-3']);
    expect(providers.every((provider) => provider.tier === 2)).toBe(true);
    expect(providers[1].distanceMiles).toBe(0);
  });

  it('should price from the service type base cost', () => {
    const [provider] = directory.findProviders('Ferrari', 'mot', 'SW1A 1AA');

    expect(provider.estimatedCost).toBe(80);
  });

  it('should honour a custom radius', () => {
    const tight = new ProviderDirectoryService(undefined, undefined, 5);

    expect(tight.findProviders('Ferrari', 'mot', 'SW1A 1AA').map((provider) => provider.id)).toEqual([
      'prv-fer-2',
      'prv-fer-3',
    ]);
  });
});

describe('postcodeToCoordinates', () => {
  it('should resolve by postcode area', () => {
    expect(postcodeToCoordinates('sw1a 1aa')).toEqual([51.4875, -0.1687]);
  });

  it('should fall back to central London', () => {
    expect(postcodeToCoordinates('ZZ1 1AA')).toEqual([51.5074, -0.1278]);
  });
});

describe('haversineMiles', () => {
  it('should be zero for the same point', () => {
    expect(haversineMiles([51.5, -0.1], [51.5, -0.1])).toBe(0);
  });

  it('should measure London to Manchester', () => {
    expect(haversineMiles([51.5074, -0.1278], [53.4808, -2.2426])).toBeCloseTo(163, 0);
  });
});
