import axios from 'axios';
import { SAVE_ERROR_MESSAGE, SAVE_ERROR_SENTINEL } from './configConstants';
import { SaveResult, SummaryView } from '../types/model-summary';
import { SimpleLogger } from '../utils/logger';

/**
 * Reads the service's reply literally. The body `"error"` is the only failure
 * signal; any other body is taken as the stored summary's location. The
 * status code is not consulted, so an HTML error page also reads as saved.
 */
export function interpretSaveResponse(body: unknown): SaveResult {
    const text = responseBodyAsText(body);
    if (text === SAVE_ERROR_SENTINEL) {
        return { status: 'rejected', message: SAVE_ERROR_MESSAGE };
    }
    return { status: 'saved', location: text };
}

function responseBodyAsText(body: unknown): string {
    if (typeof body === 'string') return body;
    if (body === undefined || body === null) return '';
    return JSON.stringify(body);
}

/**
 * PUTs a summary view as JSON to `url` and reports the outcome on `logger`.
 * Transport failures (DNS, refused connection) are not caught.
 */
export async function putModelSummary(
    url: string,
    summary: SummaryView,
    logger: SimpleLogger,
): Promise<SaveResult> {
    const response = await axios.put<string>(url, summary, {
        headers: { 'Content-Type': 'application/json' },
        responseType: 'text',
        // Keep the body as the raw text the service sent
        transformResponse: [(data: unknown) => data],
        validateStatus: () => true,
    });

    const result = interpretSaveResponse(response.data);
    if (result.status === 'saved') {
        logger.info(`model summary saved at ${result.location}`);
    } else {
        logger.error(result.message);
    }
    return result;
}
