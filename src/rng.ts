import * as crypto from 'crypto';
import { RANDOM_NAME_ALPHABET, RANDOM_NAME_LENGTH } from './constants';

// xorshift32 generator. Every consumer of randomness receives one explicitly;
// nothing in the package draws from Math.random.
export class SeededRandom {
  private state: number;
  readonly seed: number;

  constructor(seed?: number) {
    this.seed = seed === undefined ? crypto.randomBytes(4).readUInt32LE(0) : seed >>> 0;
    // mix the seed so that small seeds do not start in a low-entropy state
    let x = Math.imul(this.seed ^ 0x9e3779b9, 0x85ebca6b) >>> 0;
    x = (x ^ (x >>> 13)) >>> 0;
    this.state = x || 1;
  }

  nextU32(): number {
    let x = this.state;
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    this.state = x >>> 0;
    return this.state;
  }

  // Uniform in [0, 1)
  next(): number {
    return this.nextU32() / 4294967296;
  }

  // Uniform integer in [min, max]
  int(min: number, max: number): number {
    if (max <= min) return min;
    return min + Math.floor(this.next() * (max - min + 1));
  }

  pick(alphabet: string): string {
    return alphabet[this.int(0, alphabet.length - 1)];
  }

  // Independent child stream; forking in a fixed order keeps parallel work reproducible.
  fork(): SeededRandom {
    return new SeededRandom(this.nextU32());
  }
}

export function randomSectionName(rng: SeededRandom, length: number = RANDOM_NAME_LENGTH): string {
  let name = '';
  for (let i = 0; i < length; i++) name += rng.pick(RANDOM_NAME_ALPHABET);
  return name;
}
