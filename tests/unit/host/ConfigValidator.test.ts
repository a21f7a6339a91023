import { describe, it, expect } from '@jest/globals';
import { ConfigValidator } from '../../../src/host/ConfigValidator.js';
import { ValidationError } from '../../../src/deploy/errors.js';
import type { ConfigCheckResult } from '../../../src/host/types.js';

function hostReturning(result: ConfigCheckResult) {
  return { checkConfig: async () => result };
}

describe('ConfigValidator', () => {
  it('resolves for a valid configuration', async () => {
    const validator = new ConfigValidator(hostReturning({ result: 'valid', errors: null }));
    await expect(validator.validate()).resolves.toBeUndefined();
  });

  it('rejects an invalid configuration with the host diagnostics', async () => {
    const validator = new ConfigValidator(hostReturning({ result: 'invalid', errors: 'duplicated mapping key' }));

    const err = await validator.validate().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ValidationError);
    expect(err).toMatchObject({ message: 'Configuration is invalid', diagnostics: 'duplicated mapping key' });
  });

  it('uses empty diagnostics when the host gave none', async () => {
    const validator = new ConfigValidator(hostReturning({ result: 'invalid', errors: null }));
    await expect(validator.validate()).rejects.toMatchObject({ diagnostics: '' });
  });

  it('treats a check that could not run as a validation failure', async () => {
    const validator = new ConfigValidator({
      checkConfig: async () => {
        throw new Error('socket hang up');
      },
    });

    await expect(validator.validate()).rejects.toMatchObject({
      kind: 'validation',
      message: 'Configuration check unavailable: socket hang up',
    });
  });
});
