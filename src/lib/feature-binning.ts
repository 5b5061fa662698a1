import { FeatureSummary, FeatureSummaryData } from '../types/model-summary';

export class FeatureBinningError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FeatureBinningError';
  }
}

export interface FeatureObservations {
  feature: number[];
  target: number[];
  prediction: number[];
  /** Defaults to a weight of 1 per observation. */
  weight?: number[];
}

/**
 * Proposes right bin edges at equal-count quantiles of `values`.
 * Repeated values can collapse neighbouring edges, so fewer than `nBins`
 * edges may come back. The last edge is always the maximum.
 */
export function quantileBinEdges(values: number[], nBins: number): number[] {
  if (!Number.isInteger(nBins) || nBins < 1) {
    throw new FeatureBinningError(`Bin count must be a positive integer, got ${nBins}.`);
  }
  if (values.length === 0) {
    throw new FeatureBinningError('Cannot derive bin edges from an empty column.');
  }

  const sorted = [...values].sort((a, b) => a - b);
  const edges: number[] = [];
  for (let i = 1; i <= nBins; i++) {
    const idx = Math.ceil((i * sorted.length) / nBins) - 1;
    const edge = sorted[Math.max(idx, 0)];
    if (edges.length === 0 || edges[edges.length - 1] !== edge) {
      edges.push(edge);
    }
  }
  return edges;
}

/**
 * Index of the first bin whose right edge is >= value. Values beyond the last
 * edge land in the last bin.
 * @internal
 */
function binIndex(value: number, edges: number[]): number {
  for (let i = 0; i < edges.length; i++) {
    if (value <= edges[i]) return i;
  }
  return edges.length - 1;
}

/**
 * Aggregates observations into per-bin weighted sums and averages.
 * `sum_target` and `sum_prediction` are weighted sums; the weighted averages
 * divide them by `sum_weight` and are 0 for bins with no weight.
 */
export function summarizeFeatureData(observations: FeatureObservations, binEdgesRight: number[]): FeatureSummaryData {
  const { feature, target, prediction } = observations;
  const weight = observations.weight ?? feature.map(() => 1);

  if (target.length !== feature.length || prediction.length !== feature.length || weight.length !== feature.length) {
    throw new FeatureBinningError(
      `Observation columns differ in length (feature=${feature.length}, target=${target.length}, prediction=${prediction.length}, weight=${weight.length}).`
    );
  }
  if (binEdgesRight.length === 0) {
    throw new FeatureBinningError('At least one bin edge is required.');
  }
  for (let i = 1; i < binEdgesRight.length; i++) {
    if (binEdgesRight[i] <= binEdgesRight[i - 1]) {
      throw new FeatureBinningError('Bin edges must be strictly increasing.');
    }
  }

  const nBins = binEdgesRight.length;
  const sumTarget = new Array<number>(nBins).fill(0);
  const sumPrediction = new Array<number>(nBins).fill(0);
  const sumWeight = new Array<number>(nBins).fill(0);

  for (let i = 0; i < feature.length; i++) {
    const bin = binIndex(feature[i], binEdgesRight);
    sumTarget[bin] += weight[i] * target[i];
    sumPrediction[bin] += weight[i] * prediction[i];
    sumWeight[bin] += weight[i];
  }

  return {
    bin_edge_right: [...binEdgesRight],
    sum_target: sumTarget,
    sum_prediction: sumPrediction,
    sum_weight: sumWeight,
    wtd_avg_prediction: sumPrediction.map((s, i) => (sumWeight[i] === 0 ? 0 : s / sumWeight[i])),
    wtd_avg_target: sumTarget.map((s, i) => (sumWeight[i] === 0 ? 0 : s / sumWeight[i])),
  };
}

export function summarizeFeature(name: string, observations: FeatureObservations, binEdgesRight: number[]): FeatureSummary {
  return { name, data: summarizeFeatureData(observations, binEdgesRight) };
}
