import { describe, it, expect } from 'vitest';
import { derivePath, formatUtcStamp, PathNamer } from './path-namer.js';

describe('formatUtcStamp', () => {
  it('zero-pads every field', () => {
    expect(formatUtcStamp(new Date('2024-10-02T03:04:05Z'))).toBe('2024_10_02_03_04_05');
  });

  it('uses UTC rather than local time', () => {
    expect(formatUtcStamp(new Date('2024-12-31T23:59:59-02:00'))).toBe('2025_01_01_01_59_59');
  });
});

describe('derivePath', () => {
  it('joins the base directory and the stamped name', () => {
    expect(derivePath('/data', new Date('2024-10-02T03:04:05Z'))).toBe('/data/Bag_2024_10_02_03_04_05');
  });

  it('ignores trailing slashes on the base directory', () => {
    expect(derivePath('/data//', new Date('2024-10-02T03:04:05Z'))).toBe('/data/Bag_2024_10_02_03_04_05');
  });

  it('gives different paths one second apart', () => {
    const a = derivePath('/data', new Date('2024-10-02T03:04:05Z'));
    const b = derivePath('/data', new Date('2024-10-02T03:04:06Z'));
    expect(a).not.toBe(b);
  });
});

describe('PathNamer', () => {
  function clockFrom(...isoTimes: string[]) {
    const times = isoTimes.map((t) => new Date(t));
    let i = 0;
    return () => times[Math.min(i++, times.length - 1)];
  }

  it('returns the derived path for the first session', () => {
    const namer = new PathNamer('/data', clockFrom('2024-10-02T03:04:05Z'));
    expect(namer.next()).toBe('/data/Bag_2024_10_02_03_04_05');
  });

  it('suffixes sessions that start in the same second', () => {
    const namer = new PathNamer('/data', clockFrom(
      '2024-10-02T03:04:05.100Z',
      '2024-10-02T03:04:05.600Z',
      '2024-10-02T03:04:05.900Z',
    ));
    expect(namer.next()).toBe('/data/Bag_2024_10_02_03_04_05');
    expect(namer.next()).toBe('/data/Bag_2024_10_02_03_04_05_1');
    expect(namer.next()).toBe('/data/Bag_2024_10_02_03_04_05_2');
  });

  it('drops the suffix once the second changes', () => {
    const namer = new PathNamer('/data', clockFrom(
      '2024-10-02T03:04:05Z',
      '2024-10-02T03:04:05Z',
      '2024-10-02T03:04:06Z',
    ));
    namer.next();
    namer.next();
    expect(namer.next()).toBe('/data/Bag_2024_10_02_03_04_06');
  });

  it('never goes backwards when the wall clock does', () => {
    const namer = new PathNamer('/data', clockFrom(
      '2024-10-02T03:04:07Z',
      '2024-10-02T03:04:02Z',
    ));
    expect(namer.next()).toBe('/data/Bag_2024_10_02_03_04_07');
    expect(namer.next()).toBe('/data/Bag_2024_10_02_03_04_07_1');
  });
});
