import { Command } from 'commander';
import { getConfig } from '../config';
import { loadSummaryPayload } from '../utils/payload-loader';
import { GLMEstimatorSummary } from '../../lib/glm-estimator-summary';

async function actionShowSummary(file: string) {
    const { logger } = getConfig();

    try {
        const fields = await loadSummaryPayload(file);
        const summary = new GLMEstimatorSummary(fields, { logger });
        logger.info(JSON.stringify(summary.show(), null, 2));
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.error(`Failed to show model summary: ${message}`);
        process.exit(1);
    }
}

export const showSummaryCommand = new Command('show')
    .description('Prints the field view of a GLM summary payload file (JSON or YAML).')
    .argument('<file>', 'Path to the summary payload file.')
    .action(actionShowSummary);
