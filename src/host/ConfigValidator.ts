import { ValidationError } from '../deploy/errors.js';
import type { ConfigCheck } from '../deploy/types.js';
import { getLogger, registerComponent } from '../logging/index.js';
import { describeHttpError } from './HomeAssistantClient.js';
import type { ConfigCheckResult, HostOperations } from './types.js';

registerComponent('validator', 'Configuration validation');
const logger = getLogger('validator');

/**
 * Runs the host's configuration check. Anything but an explicit "valid"
 * fails, including a check that could not run.
 */
export class ConfigValidator implements ConfigCheck {
  constructor(private readonly host: Pick<HostOperations, 'checkConfig'>) {}

  async validate(): Promise<void> {
    let outcome: ConfigCheckResult;
    try {
      outcome = await this.host.checkConfig();
    } catch (err) {
      throw new ValidationError(`Configuration check unavailable: ${describeHttpError(err)}`, '');
    }

    if (outcome.result !== 'valid') {
      const diagnostics = outcome.errors ?? '';
      logger.warn('Host rejected the configuration', { diagnostics });
      throw new ValidationError('Configuration is invalid', diagnostics);
    }
    logger.debug('Configuration valid');
  }
}
