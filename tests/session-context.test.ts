import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  buildDriverRoster,
  buildSessionContext,
  resolveDriverColor
} from '../src/session/session-context';
import { FakeSession, MONZA_QUALI, lap } from './fixtures/session-fixtures';

describe('buildSessionContext', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('captures colors and corners ordered by distance', () => {
    const session = new FakeSession({
      laps: [lap({ lap_number: 1 })],
      colors: { '16': '#DC0000' },
      corners: [{ number: 2, distance_m: 900 }, { number: 1, distance_m: 300 }]
    });
    const context = buildSessionContext(session, 'load-7');

    expect(context.load_id).toBe('load-7');
    expect(context.identity).toEqual(MONZA_QUALI);
    expect(context.driver_colors).toEqual({ '16': '#DC0000' });
    expect(context.corners.map(c => c.number)).toEqual([1, 2]);
    expect(Object.isFrozen(context)).toBe(true);
  });

  it('degrades to empty colors when they cannot be read', () => {
    const session = new FakeSession({
      laps: [lap({ lap_number: 1 })],
      colors: new Error('color table missing'),
      corners: [{ number: 1, distance_m: 300 }]
    });
    const context = buildSessionContext(session, 'load-1');

    expect(context.driver_colors).toEqual({});
    expect(context.corners).toHaveLength(1);
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  it('degrades to no corners when they cannot be read', () => {
    const session = new FakeSession({
      laps: [lap({ lap_number: 1 })],
      colors: { '16': '#DC0000' },
      corners: new Error('circuit info missing')
    });
    const context = buildSessionContext(session, 'load-1');

    expect(context.corners).toEqual([]);
    expect(context.driver_colors).toEqual({ '16': '#DC0000' });
  });
});

describe('resolveDriverColor', () => {
  const context = {
    load_id: 'load-1',
    identity: MONZA_QUALI,
    driver_colors: { '16': '#DC0000', NOR: '#FF8000' },
    corners: []
  };

  it('prefers the driver id, then the abbreviation', () => {
    expect(resolveDriverColor(context, '16', 'LEC', 5)).toBe('#DC0000');
    expect(resolveDriverColor(context, '4', 'NOR', 5)).toBe('#FF8000');
  });

  it('falls back to the palette by selection index', () => {
    expect(resolveDriverColor(context, '1', 'VER', 0)).toBe('#0600EF');
    expect(resolveDriverColor(context, '1', null, 11)).toBe('#FF8700');
  });
});

describe('buildDriverRoster', () => {
  it('fills missing abbreviation and name from the driver number', () => {
    const context = {
      load_id: 'load-1',
      identity: MONZA_QUALI,
      driver_colors: { LEC: '#DC0000' },
      corners: []
    };
    const roster = buildDriverRoster(
      [
        { driver_id: '16', abbreviation: 'LEC', full_name: 'Charles Leclerc', team_name: 'Ferrari' },
        { driver_id: '44', abbreviation: null, full_name: null, team_name: null }
      ],
      context
    );

    expect(roster).toEqual([
      { driver_id: '16', abbreviation: 'LEC', full_name: 'Charles Leclerc', team_name: 'Ferrari', color: '#DC0000' },
      { driver_id: '44', abbreviation: '44', full_name: 'Driver 44', team_name: null, color: '#FF8700' }
    ]);
  });
});
