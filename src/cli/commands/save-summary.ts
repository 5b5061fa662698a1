import { Command } from 'commander';
import { getConfig } from '../config';
import { loadSummaryPayload } from '../utils/payload-loader';
import { GLMEstimatorSummary } from '../../lib/glm-estimator-summary';
import { SummaryPreconditionError } from '../../lib/estimator-summary';

async function actionSaveSummary(file: string, options: { endpoint?: string }) {
    const { logger } = getConfig();

    try {
        const fields = await loadSummaryPayload(file);
        const summary = new GLMEstimatorSummary(fields, { logger, endpoint: options.endpoint });
        logger.info(`Saving model summary '${summary.name}' to ${summary.getEndpoint()}...`);

        const result = await summary.save();
        if (result.status === 'rejected') {
            process.exit(1);
            return;
        }
        logger.success(`Model summary '${summary.name}' stored (created_time ${summary.created_time}).`);
    } catch (error) {
        if (error instanceof SummaryPreconditionError) {
            logger.error(`${error.message} (unset: ${error.unsetFields.join(', ')})`);
        } else {
            const message = error instanceof Error ? error.message : String(error);
            logger.error(`Failed to save model summary: ${message}`);
        }
        process.exit(1);
    }
}

export const saveSummaryCommand = new Command('save')
    .description('Validates a GLM summary payload file and PUTs it to the model-summary service.')
    .argument('<file>', 'Path to the summary payload file (JSON or YAML).')
    .option('-e, --endpoint <url>', 'Full endpoint URL. Defaults to $MODEL_SUMMARY_API_URL/regression.')
    .action(actionSaveSummary);
