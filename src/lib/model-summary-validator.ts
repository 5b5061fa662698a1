import Ajv2020 from 'ajv/dist/2020';
import { GLMSummaryPayloadSchema } from './model-summary.schema';
import { GLMEstimatorSummaryFields } from './glm-estimator-summary';
import { FeatureSummary, FeatureSummaryData } from '../types/model-summary';

export type PayloadValidationResult =
    | { valid: true; payload: GLMEstimatorSummaryFields; errors: [] }
    | { valid: false; errors: string[] };

const BIN_SEQUENCES: (keyof FeatureSummaryData)[] = [
    'bin_edge_right',
    'sum_target',
    'sum_prediction',
    'sum_weight',
    'wtd_avg_prediction',
    'wtd_avg_target',
];

let cachedValidator: ReturnType<typeof compileValidator> | null = null;

function compileValidator() {
    const ajv = new Ajv2020({ allErrors: true, strict: false });
    return ajv.compile<GLMEstimatorSummaryFields>(GLMSummaryPayloadSchema);
}

function getValidator() {
    if (!cachedValidator) {
        cachedValidator = compileValidator();
    }
    return cachedValidator;
}

/**
 * Returns one message per feature whose six bin sequences do not share a length.
 */
export function findBinLengthMismatches(features: FeatureSummary[]): string[] {
    const problems: string[] = [];
    for (const feature of features) {
        const lengths = BIN_SEQUENCES.map(key => feature.data[key].length);
        if (new Set(lengths).size > 1) {
            const detail = BIN_SEQUENCES.map((key, i) => `${key}=${lengths[i]}`).join(', ');
            problems.push(`feature '${feature.name}' has bin sequences of different lengths (${detail})`);
        }
    }
    return problems;
}

export function validateGlmSummaryPayload(data: unknown): PayloadValidationResult {
    const validate = getValidator();
    if (!validate(data)) {
        const errors = (validate.errors ?? []).map(err => `${err.instancePath || '(root)'} ${err.message ?? 'is invalid'}`);
        return { valid: false, errors };
    }

    const mismatches = findBinLengthMismatches(data.feature_summary);
    if (mismatches.length > 0) {
        return { valid: false, errors: mismatches };
    }
    return { valid: true, payload: data, errors: [] };
}
