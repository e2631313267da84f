import { createZoneResolver, validateLocation } from '../services/zoneResolver';
import { ValidationError } from '../utils/errors';
import { referenceData } from './fixtures';

describe('zone resolver', () => {
  const { zones, districts } = referenceData();
  const resolver = createZoneResolver(zones, districts);

  it('rejects coordinates out of range', () => {
    expect(() => validateLocation({ latitude: 100, longitude: 75 })).toThrow(
      'Invalid latitude: must be between -90 and 90'
    );
    expect(() => validateLocation({ latitude: 30, longitude: 200 })).toThrow(
      'Invalid longitude: must be between -180 and 180'
    );
  });

  it('needs district with state, or both coordinates', () => {
    expect(() => validateLocation({ district: 'Ludhiana' })).toThrow(ValidationError);
    expect(() => validateLocation({ district: 'Ludhiana' })).toThrow('insufficient location information');
    expect(() => validateLocation({ latitude: 30 })).toThrow('insufficient location information');
    expect(() => validateLocation({ district: 'Ludhiana', state: 'Punjab' })).not.toThrow();
  });

  it('matches districts exactly, then case-insensitively', () => {
    const exact = resolver.resolve({ district: 'Ludhiana', state: 'Punjab' });
    expect(exact).toMatchObject({ ok: true, matchedBy: 'district', zone: { code: 'IGP' } });
    const loose = resolver.resolve({ district: 'ludhiana ', state: 'PUNJAB' });
    expect(loose).toMatchObject({ ok: true, zone: { code: 'IGP' } });
  });

  it('uses the nearest mapped district for coordinates', () => {
    expect(resolver.resolve({ latitude: 18.9, longitude: 74.2 })).toMatchObject({
      ok: true,
      matchedBy: 'coordinates',
      zone: { code: 'DEC' }
    });
  });

  it('falls back to zone bounds when no district is near', () => {
    expect(resolver.resolve({ latitude: 26, longitude: 84 })).toMatchObject({
      ok: true,
      matchedBy: 'bounds',
      zone: { code: 'IGP' }
    });
  });

  it('reports locations it cannot place', () => {
    expect(resolver.resolve({ district: 'Nowhere', state: 'Punjab' })).toEqual({
      ok: false,
      reason: 'Location not found: Nowhere, Punjab'
    });
    expect(resolver.resolve({ latitude: -40, longitude: 10 })).toEqual({
      ok: false,
      reason: 'Location not found: -40, 10'
    });
  });

  it('reports districts mapped to an unknown zone', () => {
    expect(resolver.resolve({ district: 'Leh', state: 'Ladakh' })).toEqual({
      ok: false,
      reason: 'Unknown agro-ecological zone: THZ'
    });
  });
});
