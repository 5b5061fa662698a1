import * as yaml from 'js-yaml';
import fs from 'fs/promises';
import path from 'path';
import { errors } from '../config';
import { GLMEstimatorSummaryFields } from '../../lib/glm-estimator-summary';
import { validateGlmSummaryPayload } from '../../lib/model-summary-validator';

export class PayloadLoadError extends Error {
  readonly details: string[];

  constructor(message: string, details: string[] = []) {
    super(details.length > 0 ? `${message}: ${details.join('; ')}` : message);
    this.name = 'PayloadLoadError';
    this.details = details;
  }
}

/**
 * Reads a GLM summary payload from a JSON or YAML file and validates it.
 */
export async function loadSummaryPayload(filePath: string): Promise<GLMEstimatorSummaryFields> {
  const abs = path.resolve(filePath);
  const isYaml = /\.ya?ml$/i.test(abs);
  if (!isYaml && !/\.json$/i.test(abs)) {
    throw new PayloadLoadError(errors.UNSUPPORTED_FILE_TYPE, [abs]);
  }

  let content: string;
  try {
    content = await fs.readFile(abs, 'utf-8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new PayloadLoadError(`Could not read ${abs}`, [reason]);
  }

  let data: unknown;
  try {
    // Core schema keeps ISO timestamps such as created_time as strings
    data = isYaml ? yaml.load(content, { schema: yaml.CORE_SCHEMA }) : JSON.parse(content);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new PayloadLoadError(`Could not parse ${abs}`, [reason]);
  }

  const result = validateGlmSummaryPayload(data);
  if (!result.valid) {
    throw new PayloadLoadError(errors.INVALID_PAYLOAD, result.errors);
  }
  return result.payload;
}
