// Wire and storage shapes for model summaries. These mirror the JSON the
// model-summary service accepts, so field names stay snake_case.

export interface GLMBasicInfo {
    name: string;
    formula: string;
    features: string[];
    prediction: string;
    target: string;
    weight: string;
}

/**
 * Per-bin statistics for one feature. All six sequences are indexed by bin
 * and are expected to share one length.
 */
export interface FeatureSummaryData {
    bin_edge_right: number[];
    sum_target: number[];
    sum_prediction: number[];
    sum_weight: number[];
    wtd_avg_prediction: number[];
    wtd_avg_target: number[];
}

export interface FeatureSummary {
    name: string;
    data: FeatureSummaryData;
}

export interface GLMSummaryPayload {
    name: string;
    desc: string;
    target: string;
    prediction: string;
    var_weights: string;
    link_function: string;
    error_dist: string;
    explained_variance: number;
    feature_summary: FeatureSummary[];
}

/** What `show()` hands back: field name to value, in declaration order. */
export type SummaryFieldValue = string | number | FeatureSummary[];
export type SummaryView = Record<string, SummaryFieldValue>;

export type EstimatorVariant = 'regression';

export type SaveResult =
    | { status: 'saved'; location: string }
    | { status: 'rejected'; message: string };

export interface EstimatorSummary {
    readonly variant: EstimatorVariant;
    show(): SummaryView;
    save(): Promise<SaveResult>;
}
