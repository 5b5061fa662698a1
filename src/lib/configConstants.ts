export const DEFAULT_MODEL_SUMMARY_API_URL = 'http://api.lensview.io/modelsummary';
export const MODEL_SUMMARY_API_URL_ENV = 'MODEL_SUMMARY_API_URL';

// Stored until the first save stamps a real time.
export const CREATED_TIME_PLACEHOLDER = '2000-00-00T00:00:00.0000+0000';

export const SAVE_ERROR_SENTINEL = 'error';
export const SAVE_ERROR_MESSAGE = 'error saving model summary';
