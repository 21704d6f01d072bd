/**
 * Seeded randomness for sampling and synthetic data.
 *
 * The estimator and the sample source never call Math.random: they take an
 * IntegerSampler or GaussianSampler, so a run is reproducible from one seed
 * and tests can substitute a scripted sampler.
 */

import { ConfigError } from "../../shared/errors.js";

/** A stream of uniform deviates in [0, 1). */
export interface UniformSource {
	next(): number;
}

/** Uniform integer draws on [0, bound). */
export interface IntegerSampler {
	nextInt(bound: number): number;
}

/** Normal draws with the given mean and standard deviation. */
export interface GaussianSampler {
	nextGaussian(mean: number, stdDev: number): number;
}

/** Largest seed `SeededRandom` accepts. */
export const MAX_SEED = 0xffffffff;

/** Seeded PRNG (mulberry32). Period 2^32, adequate for sampling but not for cryptography. */
export class SeededRandom implements UniformSource {
	private _state: number;

	private constructor(seed: number) {
		this._state = seed | 0;
	}

	/**
	 * @throws ConfigError unless `seed` is an integer in [0, 2^32); the state is
	 *   32 bits wide, so larger seeds would alias smaller ones
	 */
	static create(seed: number): SeededRandom {
		if (!Number.isInteger(seed) || seed < 0 || seed > MAX_SEED) {
			throw new ConfigError(`Seed must be an integer in [0, ${MAX_SEED}], got ${seed}`, { seed });
		}
		return new SeededRandom(seed);
	}

	/** Draws a fresh seed for a derived stream. */
	nextSeed(): number {
		return Math.floor(this.next() * (MAX_SEED + 1));
	}

	next(): number {
		this._state = (this._state + 0x6d2b79f5) | 0;
		const s = this._state;
		let t = Math.imul(s ^ (s >>> 15), 1 | s);
		t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
		return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
	}
}

/**
 * Uniform integers on [0, bound) by scaling a uniform deviate.
 * @throws ConfigError if `bound` is not a positive integer
 */
export function integerSampler(uniform: UniformSource): IntegerSampler {
	return {
		nextInt(bound: number): number {
			if (!Number.isInteger(bound) || bound <= 0) {
				throw new ConfigError(`Sampling bound must be a positive integer, got ${bound}`, { bound });
			}
			return Math.floor(uniform.next() * bound);
		},
	};
}

/**
 * Box–Muller normal deviates. Each transform yields two independent values;
 * the second is kept and returned by the next call.
 */
export function gaussianSampler(uniform: UniformSource): GaussianSampler {
	let spare: number | null = null;

	return {
		nextGaussian(mean: number, stdDev: number): number {
			if (spare !== null) {
				const z = spare;
				spare = null;
				return mean + stdDev * z;
			}

			// 1 - u keeps the argument of log in (0, 1]
			const u1 = 1 - uniform.next();
			const u2 = uniform.next();
			const radius = Math.sqrt(-2 * Math.log(u1));
			const angle = 2 * Math.PI * u2;
			spare = radius * Math.sin(angle);
			return mean + stdDev * radius * Math.cos(angle);
		},
	};
}

/** A sampler that replays a fixed list of integers, cycling when exhausted. */
export function scriptedSampler(values: readonly number[]): IntegerSampler {
	if (values.length === 0) {
		throw new ConfigError("Scripted sampler needs at least one value");
	}
	let cursor = 0;
	return {
		nextInt(): number {
			const value = values[cursor % values.length] ?? 0;
			cursor++;
			return value;
		},
	};
}
