/**
 * Injectable random sources. Every stochastic module takes an Rng so tests can
 * pin behavior with a seed.
 */

export type Rng = () => number;

export const mulberry32 = (seed: number): Rng => {
  let t = seed >>> 0;
  return () => {
    t += 0x6d2b79f5;
    let r = Math.imul(t ^ (t >>> 15), t | 1);
    r ^= r + Math.imul(r ^ (r >>> 7), r | 61);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
};

export function createRng(seed: number = Math.floor(Math.random() * 0xffffffff)): Rng {
  return mulberry32(seed);
}

export const uniform = (rng: Rng, min: number, max: number): number =>
  min + (max - min) * rng();

// Box-Muller
export const gaussian = (rng: Rng, mean = 0, stddev = 1): number => {
  let u = 0;
  let v = 0;
  while (u === 0) u = rng();
  while (v === 0) v = rng();
  const z = Math.sqrt(-2.0 * Math.log(u)) * Math.cos(2.0 * Math.PI * v);
  return mean + z * stddev;
};

/**
 * Poisson draw. Knuth's product method for small means, a rounded normal
 * approximation above 30.
 */
export const poisson = (rng: Rng, lambda: number): number => {
  if (!(lambda > 0)) {
    return 0;
  }
  if (lambda > 30) {
    return Math.max(0, Math.round(gaussian(rng, lambda, Math.sqrt(lambda))));
  }
  const limit = Math.exp(-lambda);
  let k = 0;
  let p = rng();
  while (p > limit) {
    k += 1;
    p *= rng();
  }
  return k;
};
