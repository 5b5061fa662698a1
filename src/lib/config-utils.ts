import { DEFAULT_MODEL_SUMMARY_API_URL, MODEL_SUMMARY_API_URL_ENV } from './configConstants';
import { EstimatorVariant } from '../types/model-summary';

/**
 * Base URL of the model-summary service. `MODEL_SUMMARY_API_URL` wins over the
 * built-in default; trailing slashes are dropped either way.
 */
export function getModelSummaryApiUrl(env: NodeJS.ProcessEnv = process.env): string {
    const configured = env[MODEL_SUMMARY_API_URL_ENV]?.trim();
    const base = configured || DEFAULT_MODEL_SUMMARY_API_URL;
    return base.replace(/\/+$/, '');
}

/**
 * Full endpoint for one estimator family, e.g.
 * `http://api.lensview.io/modelsummary/regression`.
 */
export function resolveModelSummaryEndpoint(variant: EstimatorVariant, baseUrl?: string): string {
    const base = baseUrl ? baseUrl.trim().replace(/\/+$/, '') : getModelSummaryApiUrl();
    return `${base}/${variant}`;
}
