import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { loadSummaryPayload, PayloadLoadError } from '../payload-loader';

const payload = {
  name: 'claims-frequency-v3',
  desc: 'Poisson frequency model',
  target: 'claim_count',
  prediction: 'pred_frequency',
  var_weights: 'exposure',
  link_function: 'log',
  error_dist: 'poisson',
  explained_variance: 0.42,
  feature_summary: [
    {
      name: 'driver_age',
      data: {
        bin_edge_right: [25, 60],
        sum_target: [12, 30],
        sum_prediction: [10, 31],
        sum_weight: [100, 400],
        wtd_avg_prediction: [0.1, 0.0775],
        wtd_avg_target: [0.12, 0.075],
      },
    },
  ],
};

const yamlPayload = `name: claims-frequency-v3
desc: Poisson frequency model
target: claim_count
prediction: pred_frequency
var_weights: exposure
link_function: log
error_dist: poisson
explained_variance: 0.42
feature_summary:
  - name: driver_age
    data:
      bin_edge_right: [25, 60]
      sum_target: [12, 30]
      sum_prediction: [10, 31]
      sum_weight: [100, 400]
      wtd_avg_prediction: [0.1, 0.0775]
      wtd_avg_target: [0.12, 0.075]
`;

describe('loadSummaryPayload', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'summary-payload-'));
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('loads a JSON payload', async () => {
    const file = path.join(dir, 'summary.json');
    await fs.writeFile(file, JSON.stringify(payload));
    await expect(loadSummaryPayload(file)).resolves.toEqual(payload);
  });

  it('loads a YAML payload', async () => {
    const file = path.join(dir, 'summary.yml');
    await fs.writeFile(file, yamlPayload);
    await expect(loadSummaryPayload(file)).resolves.toEqual(payload);
  });

  it('keeps an unquoted created_time stamp in YAML as a string', async () => {
    const file = path.join(dir, 'stamped.yaml');
    await fs.writeFile(file, `${yamlPayload}created_time: 2024-03-01T10:15:30.123456+00:00\n`);

    const loaded = await loadSummaryPayload(file);

    expect(loaded.created_time).toBe('2024-03-01T10:15:30.123456+00:00');
    expect(loaded).toEqual({ ...payload, created_time: '2024-03-01T10:15:30.123456+00:00' });
  });

  it('rejects other file types', async () => {
    await expect(loadSummaryPayload(path.join(dir, 'summary.csv'))).rejects.toBeInstanceOf(PayloadLoadError);
  });

  it('reports a missing file', async () => {
    await expect(loadSummaryPayload(path.join(dir, 'missing.json'))).rejects.toThrow(/^Could not read /);
  });

  it('reports malformed JSON', async () => {
    const file = path.join(dir, 'broken.json');
    await fs.writeFile(file, '{"name": ');
    await expect(loadSummaryPayload(file)).rejects.toThrow(/^Could not parse /);
  });

  it('carries schema errors in details', async () => {
    const file = path.join(dir, 'invalid.json');
    await fs.writeFile(file, JSON.stringify({ ...payload, explained_variance: 'high' }));

    const error = await loadSummaryPayload(file).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(PayloadLoadError);
    expect(error).toMatchObject({
      message: 'Summary payload failed validation: /explained_variance must be number',
      details: ['/explained_variance must be number'],
    });
  });
});
