export type {
    GLMBasicInfo,
    FeatureSummaryData,
    FeatureSummary,
    GLMSummaryPayload,
    EstimatorSummary,
    EstimatorVariant,
    SaveResult,
    SummaryView,
    SummaryFieldValue,
} from './types/model-summary';

export {
    SupervisedEstimatorSummary,
    SummaryPreconditionError,
    formatCreatedTime,
    findUnsetFields,
    isFieldSet,
} from './lib/estimator-summary';
export type { EstimatorSummaryOptions } from './lib/estimator-summary';
export { GLMEstimatorSummary } from './lib/glm-estimator-summary';
export type { GLMEstimatorSummaryFields } from './lib/glm-estimator-summary';
export { putModelSummary, interpretSaveResponse } from './lib/model-summary-client';
export { getModelSummaryApiUrl, resolveModelSummaryEndpoint } from './lib/config-utils';
export { CREATED_TIME_PLACEHOLDER, DEFAULT_MODEL_SUMMARY_API_URL } from './lib/configConstants';
export { validateGlmSummaryPayload, findBinLengthMismatches } from './lib/model-summary-validator';
export type { PayloadValidationResult } from './lib/model-summary-validator';
export { summarizeFeature, summarizeFeatureData, quantileBinEdges, FeatureBinningError } from './lib/feature-binning';
export type { FeatureObservations } from './lib/feature-binning';
export { getLogger } from './utils/logger';
export type { Logger, SimpleLogger, LogLevel, LoggerOptions } from './utils/logger';
