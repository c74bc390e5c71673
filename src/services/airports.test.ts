import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { describe, expect, it } from 'vitest';
import { AirportRegistry, loadAirportRegistry, type Airport } from './airports.js';

const registry: Airport[] = [
  { code: 'STN', name: 'London Stansted Airport', city: 'London', country: 'GB' },
  { code: 'LHR', name: 'London Heathrow Airport', city: 'London', country: 'GB' },
  { code: 'BCN', name: 'Barcelona International Airport', city: 'Barcelona', country: 'ES' },
  { code: 'DUB', name: 'Dublin Airport', city: 'Dublin', country: 'IE' }
];

describe('AirportRegistry', () => {
  const airports = new AirportRegistry(registry, ['DUB', 'STN', 'XYZ', 'BCN']);

  it('looks up a code by exact airport name', () => {
    expect(airports.getIata('London Stansted Airport')).toBe('STN');
    expect(airports.getIata('London Heathrow Airport')).toBe('LHR');
    expect(airports.getIata('london stansted airport')).toBeUndefined();
  });

  it('lists served airports present in the registry, in served order', () => {
    expect(airports.listServedAirports().map(airport => airport.code)).toEqual(['DUB', 'STN', 'BCN']);
  });

  it('finds an airport by code', () => {
    expect(airports.getAirport('bcn')?.name).toBe('Barcelona International Airport');
    expect(airports.getAirport('XYZ')).toBeUndefined();
  });

  it('suggests served airports with a similar name', () => {
    const suggestions = airports.suggest('Stansted');
    expect(suggestions[0].code).toBe('STN');
    expect(suggestions.map(suggestion => suggestion.code)).not.toContain('LHR');
  });

  it('matches on the city as well', () => {
    expect(airports.suggest('Dublin', 1).map(suggestion => suggestion.code)).toEqual(['DUB']);
  });
});

describe('loadAirportRegistry', () => {
  it('reads both data files from a directory', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'airports-'));
    await fs.writeFile(path.join(dir, 'airports.json'), JSON.stringify(registry));
    await fs.writeFile(path.join(dir, 'ryanair-airports.json'), JSON.stringify(['STN', 'BCN']));

    const airports = await loadAirportRegistry(dir);

    expect(airports.listServedAirports().map(airport => airport.code)).toEqual(['STN', 'BCN']);
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('loads the bundled data', async () => {
    const airports = await loadAirportRegistry();

    expect(airports.getIata('London Stansted Airport')).toBe('STN');
    expect(airports.listServedAirports().map(airport => airport.code)).not.toContain('LHR');
  });

  it('rejects malformed records', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'airports-'));
    await fs.writeFile(path.join(dir, 'airports.json'), JSON.stringify([{ code: 'STN' }]));
    await fs.writeFile(path.join(dir, 'ryanair-airports.json'), '[]');

    await expect(loadAirportRegistry(dir)).rejects.toThrow();
    await fs.rm(dir, { recursive: true, force: true });
  });
});
