import { describe, it, expect, afterEach } from 'vitest';
import { createRecordingLogger } from '../helpers/logger.js';
import { EXIT_CODES, exitCodeFor, reportFatal } from '../../src/lib/exit.js';
import { ImportFileError } from '../../src/lib/import-file.js';
import { RetriesExhaustedError } from '../../src/services/retry.js';
import { AuthorizationError } from '../../src/services/capture-server.js';
import { ConfigError } from '../../src/services/config.js';

describe('exitCodeFor', () => {
  it('should map exhausted retries to the API error code', () => {
    expect(exitCodeFor(new RetriesExhaustedError('Gave up', new Error('x'), 3))).toBe(2);
  });

  it('should map authorization failures to the auth code', () => {
    expect(exitCodeFor(new AuthorizationError('denied', 'AUTHORIZATION_DENIED'))).toBe(3);
  });

  it('should map bad input to 1', () => {
    expect(exitCodeFor(new ImportFileError('bad'))).toBe(EXIT_CODES.INVALID_INPUT);
    expect(exitCodeFor(new ConfigError('bad'))).toBe(EXIT_CODES.INVALID_INPUT);
    expect(exitCodeFor(new TypeError('Access token must not be empty'))).toBe(EXIT_CODES.INVALID_INPUT);
  });
});

describe('reportFatal', () => {
  const previous = process.exitCode;

  afterEach(() => {
    process.exitCode = previous;
  });

  it('should log the cause and set the exit status', () => {
    const logger = createRecordingLogger();
    const error = new RetriesExhaustedError('Gave up', new Error('x'), 3);

    const code = reportFatal('Import', error, logger);

    expect(code).toBe(2);
    expect(process.exitCode).toBe(2);
    expect(logger.error).toHaveBeenCalledWith('Import failed', error, { exitCode: 2 });
  });
});
