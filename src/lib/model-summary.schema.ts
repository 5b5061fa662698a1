// Schema for GLM summary payloads as written by training workflows and
// accepted by the model-summary service.

const numberSequence = { type: 'array', items: { type: 'number' } } as const;

export const FeatureSummarySchema = {
  type: 'object',
  properties: {
    name: { type: 'string', minLength: 1 },
    data: {
      type: 'object',
      properties: {
        bin_edge_right: numberSequence,
        sum_target: numberSequence,
        sum_prediction: numberSequence,
        sum_weight: numberSequence,
        wtd_avg_prediction: numberSequence,
        wtd_avg_target: numberSequence,
      },
      required: ['bin_edge_right', 'sum_target', 'sum_prediction', 'sum_weight', 'wtd_avg_prediction', 'wtd_avg_target'],
      additionalProperties: false,
    },
  },
  required: ['name', 'data'],
  additionalProperties: false,
} as const;

export const GLMSummaryPayloadSchema = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  $id: 'https://api.lensview.io/schemas/glm-summary/v1.json',
  title: 'GLM Summary Payload',
  type: 'object',
  properties: {
    name: { type: 'string' },
    desc: { type: 'string' },
    target: { type: 'string' },
    prediction: { type: 'string' },
    var_weights: { type: 'string' },
    link_function: { type: 'string' },
    error_dist: { type: 'string' },
    explained_variance: { type: 'number' },
    feature_summary: { type: 'array', items: FeatureSummarySchema },
    created_time: { type: 'string' },
  },
  required: [
    'name',
    'desc',
    'target',
    'prediction',
    'var_weights',
    'link_function',
    'error_dist',
    'explained_variance',
    'feature_summary',
  ],
  additionalProperties: false,
} as const;
