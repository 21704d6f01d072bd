/**
 * Hand Trace
 *
 * Three updates on a two-feature dataset small enough to check by hand:
 *
 *   X = [[1, 0, 1],    y = (1, 1, 2),  θ₀ = (0, 0),  λ = 1,  θ* = (1, 1)
 *        [0, 1, 1]]
 *
 * Expected θ after each step: (0.5, 0), (0.5, 0.5), (5/6, 5/6).
 */

import {
	IncrementalEstimator,
	SampleSource,
	parseDataset,
	replayIndices,
	scriptedSampler,
} from "../src/index.js";

const parsed = parseDataset({
	features: [
		[1, 0, 1],
		[0, 1, 1],
	],
	labels: [1, 1, 2],
});
if (!parsed.ok) throw parsed.error;

const estimator = IncrementalEstimator.create({ lambda: 1, initialTheta: [0, 0] });
const source = SampleSource.create(parsed.value, scriptedSampler([0]));
const reference = [1, 1];

const result = replayIndices({ source, estimator, reference, indices: [0, 1, 2] });
if (!result.ok) throw result.error;

console.log(" step  k   distance");
result.value.indices.forEach((k, i) => {
	const d = result.value.errorTrace[i] ?? Number.NaN;
	console.log(`  ${i + 1}    ${k}   ${d.toFixed(6)}`);
});
console.log(`\nθ_3 = (${Array.from(result.value.theta, (v) => v.toFixed(6)).join(", ")})`);
