import { describe, it, expect } from 'vitest';
import {
  filterByActivity,
  summarizeSpeciesActivity,
  symmetrizeTimeOfDay,
} from '@etl/activity-filter';
import {
  type DetectionEvent,
  type TimeOfDay,
  createIsoDate,
  createSpeciesCode,
  createStartTime,
} from '@domain/types';

function event(
  species: string,
  site: string,
  date: string,
  timeOfDay: TimeOfDay = 'dawn',
  count = 1,
  startTime = '060000'
): DetectionEvent {
  return {
    kind: 'detection',
    site_id: site,
    date: createIsoDate(date),
    start_time: createStartTime(startTime),
    split_index: '1',
    time_of_day: timeOfDay,
    restoration_type: 'Active',
    hour_of_day: null,
    species_code: createSpeciesCode(species),
    detection_count: count,
  };
}

// asikoe2: 3 site-dates, commyn: 2 site-dates, houcro1: 1 site-date
const events: DetectionEvent[] = [
  event('asikoe2', 'S1', '2022-01-01'),
  event('asikoe2', 'S1', '2022-01-01', 'dusk', 2, '170000'),
  event('asikoe2', 'S1', '2022-01-02'),
  event('asikoe2', 'S2', '2022-01-01'),
  event('commyn', 'S1', '2022-01-01', 'dusk'),
  event('commyn', 'S2', '2022-06-01', 'dusk'),
  event('houcro1', 'S3', '2022-06-01'),
];

describe('Activity Filter', () => {
  it('should count distinct site-dates per species across both windows', () => {
    expect(summarizeSpeciesActivity(events)).toEqual([
      { species_code: 'asikoe2', siteDateCount: 3 },
      { species_code: 'commyn', siteDateCount: 2 },
      { species_code: 'houcro1', siteDateCount: 1 },
    ]);
  });

  it('should retain only species strictly above the threshold', () => {
    const result = filterByActivity(events, 2);

    expect(result.retainedSpecies).toEqual(['asikoe2']);
    expect(result.excludedSpecies).toEqual([
      { species_code: 'commyn', siteDateCount: 2 },
      { species_code: 'houcro1', siteDateCount: 1 },
    ]);
    expect(result.events).toHaveLength(4);
    expect(result.events.every((e) => e.species_code === 'asikoe2')).toBe(true);
  });

  it('should keep every detected species at threshold zero', () => {
    expect(filterByActivity(events, 0).retainedSpecies).toEqual(['asikoe2', 'commyn', 'houcro1']);
  });

  it('should never grow the retained set as the threshold rises', () => {
    let previous = filterByActivity(events, 0).retainedSpecies;
    for (let threshold = 1; threshold <= 4; threshold++) {
      const current = filterByActivity(events, threshold).retainedSpecies;
      expect(current.every((s) => previous.includes(s))).toBe(true);
      previous = current;
    }
    expect(previous).toEqual([]);
  });

  it('should be deterministic regardless of input order', () => {
    const reversed = [...events].reverse();
    expect(filterByActivity(reversed, 1).retainedSpecies).toEqual(
      filterByActivity(events, 1).retainedSpecies
    );
  });

  it('should default to an empty result for no events', () => {
    const result = filterByActivity([], 20);
    expect(result.retainedSpecies).toEqual([]);
    expect(result.summaries).toEqual([]);
  });

  describe('symmetrizeTimeOfDay', () => {
    it('should add one zero-count record for each missing window', () => {
      const rows = symmetrizeTimeOfDay(events);

      expect(rows.slice(0, events.length)).toEqual(events);
      expect(rows.slice(events.length)).toEqual([
        { kind: 'zero-fill', species_code: 'commyn', time_of_day: 'dawn', detection_count: 0 },
        { kind: 'zero-fill', species_code: 'houcro1', time_of_day: 'dusk', detection_count: 0 },
      ]);
    });

    it('should leave species seen in both windows alone', () => {
      const both = events.filter((e) => e.species_code === 'asikoe2');
      expect(symmetrizeTimeOfDay(both)).toEqual(both);
    });
  });
});
