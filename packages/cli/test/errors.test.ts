import { ConfigurationError, ProviderAcquisitionError } from '@appsource/core';
import { describe, expect, it } from 'vitest';
import { CliError, errorEnvelope, toCliError } from '../src/errors.js';

describe('toCliError', () => {
  it('keeps CLI errors as they are', () => {
    const error = new CliError('CATALOG_EXISTS', 'exists');

    expect(toCliError(error)).toBe(error);
  });

  it('exits with 2 for configuration errors', () => {
    const error = toCliError(new ConfigurationError('No path to save the catalog to'));

    expect(error.code).toBe('CONFIGURATION_ERROR');
    expect(error.exitCode).toBe(2);
  });

  it('keeps the code and details of library errors', () => {
    const error = toCliError(new ProviderAcquisitionError('RATE_LIMITED', 'Slow down', { reset: 60 }));

    expect(error.code).toBe('RATE_LIMITED');
    expect(error.exitCode).toBe(1);
    expect(error.details).toEqual({ reset: 60 });
  });

  it('wraps anything else as unexpected', () => {
    expect(toCliError(new Error('boom'))).toMatchObject({ code: 'UNEXPECTED_ERROR', message: 'boom', exitCode: 1 });
    expect(toCliError('boom').message).toBe('Unknown CLI error');
  });
});

describe('errorEnvelope', () => {
  it('builds the failure envelope', () => {
    expect(errorEnvelope('CATALOG_INVALID', 'bad', { errors: 1 })).toEqual({
      ok: false,
      error: { code: 'CATALOG_INVALID', message: 'bad', details: { errors: 1 } },
    });
  });
});
