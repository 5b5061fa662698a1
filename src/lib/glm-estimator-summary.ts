import { EstimatorSummaryOptions, SupervisedEstimatorSummary } from './estimator-summary';
import { FeatureSummary, GLMSummaryPayload, SummaryView } from '../types/model-summary';

/** Feature bins are copied in and out so callers never share arrays with a summary. */
function copyFeatureSummaries(features: FeatureSummary[]): FeatureSummary[] {
    return features.map(feature => ({
        name: feature.name,
        data: {
            bin_edge_right: [...feature.data.bin_edge_right],
            sum_target: [...feature.data.sum_target],
            sum_prediction: [...feature.data.sum_prediction],
            sum_weight: [...feature.data.sum_weight],
            wtd_avg_prediction: [...feature.data.wtd_avg_prediction],
            wtd_avg_target: [...feature.data.wtd_avg_target],
        },
    }));
}

export type GLMEstimatorSummaryFields = GLMSummaryPayload & { created_time?: string };

/**
 * Regression model summaries.
 */
export class GLMEstimatorSummary extends SupervisedEstimatorSummary {
    readonly variant = 'regression' as const;

    var_weights: string;
    link_function: string;
    error_dist: string;
    explained_variance: number;
    feature_summary: FeatureSummary[];

    constructor(fields: GLMEstimatorSummaryFields, options: EstimatorSummaryOptions = {}) {
        super(fields, options);
        this.var_weights = fields.var_weights;
        this.link_function = fields.link_function;
        this.error_dist = fields.error_dist;
        this.explained_variance = fields.explained_variance;
        this.feature_summary = copyFeatureSummaries(fields.feature_summary);
    }

    static fromPayload(payload: GLMSummaryPayload, options: EstimatorSummaryOptions = {}): GLMEstimatorSummary {
        return new GLMEstimatorSummary(payload, options);
    }

    show(): SummaryView {
        return {
            name: this.name,
            desc: this.desc,
            target: this.target,
            prediction: this.prediction,
            var_weights: this.var_weights,
            link_function: this.link_function,
            error_dist: this.error_dist,
            explained_variance: this.explained_variance,
            feature_summary: copyFeatureSummaries(this.feature_summary),
            created_time: this.created_time,
        };
    }

    toPayload(): GLMSummaryPayload {
        return {
            name: this.name,
            desc: this.desc,
            target: this.target,
            prediction: this.prediction,
            var_weights: this.var_weights,
            link_function: this.link_function,
            error_dist: this.error_dist,
            explained_variance: this.explained_variance,
            feature_summary: copyFeatureSummaries(this.feature_summary),
        };
    }
}
