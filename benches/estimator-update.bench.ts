import { bench, describe } from "vitest";
import { SampleSource } from "../src/data/sample-source.js";
import { generateLinearDataset } from "../src/data/synthetic.js";
import { IncrementalEstimator } from "../src/estimator/incremental-estimator.js";
import { proximalStep } from "../src/estimator/proximal.js";
import { SeededRandom, integerSampler } from "../src/lib/random/index.js";
import { runIncrementalProximal } from "../src/run/driver.js";

function fixture(dimension: number) {
	const { dataset, trueTheta } = generateLinearDataset({
		dimension,
		size: 1_000,
		noiseStdDev: 0.1,
		seed: 7,
	});
	const source = SampleSource.create(dataset, integerSampler(SeededRandom.create(8)));
	return { source, trueTheta, sample: source.sampleAt(0) };
}

const small = fixture(5);
const large = fixture(200);

describe("single update", () => {
	const est5 = IncrementalEstimator.create({ lambda: 1, initialTheta: new Float64Array(5) });
	const est200 = IncrementalEstimator.create({ lambda: 1, initialTheta: new Float64Array(200) });

	bench("in-place update, d = 5", () => {
		est5.update(small.sample.x, small.sample.y);
	});

	bench("in-place update, d = 200", () => {
		est200.update(large.sample.x, large.sample.y);
	});

	bench("pure proximalStep, d = 200", () => {
		proximalStep(large.trueTheta, large.sample.x, large.sample.y, 1);
	});
});

describe("full run", () => {
	bench("10,000 steps, d = 5", () => {
		runIncrementalProximal({
			source: small.source,
			estimator: IncrementalEstimator.create({ lambda: 1, initialTheta: new Float64Array(5) }),
			reference: small.trueTheta,
			iterations: 10_000,
		});
	});
});
