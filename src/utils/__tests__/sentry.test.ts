import { jest } from '@jest/globals';
import * as Sentry from '@sentry/node';
import { initSentry } from '../sentry';

jest.mock('@sentry/node');
const mockedSentry = jest.mocked(Sentry);

describe('initSentry', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('does nothing without a DSN', () => {
    expect(initSentry('estimator-summary', {})).toBe(false);
    expect(mockedSentry.init).not.toHaveBeenCalled();
  });

  it('initializes with the DSN and command tag', () => {
    expect(initSentry('estimator-summary', { SENTRY_DSN: 'https://public@sentry.test/1', NODE_ENV: 'test' })).toBe(true);
    expect(mockedSentry.init).toHaveBeenCalledWith(expect.objectContaining({
      dsn: 'https://public@sentry.test/1',
      environment: 'test',
      initialScope: { tags: { command: 'estimator-summary', runtime: 'cli' } },
    }));
  });
});
