import seedrandom from 'seedrandom';

export type RandomSource = () => number;

/** Seeded stream keyed by the parts joined with `|`. */
export function createRandom(...parts: Array<string | number>): RandomSource {
  return seedrandom(parts.join('|'));
}
