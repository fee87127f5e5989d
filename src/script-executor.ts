import { spawnSync } from 'child_process';
import config from './config.js';
import { ErrorFactory } from './errors.js';
import { createLogger } from './logger.js';
import { ScriptExecutor } from './types.js';

/**
 * Hands a generated script to the shell and blocks until the session ends.
 * The session talks to the terminal directly; its exit status is logged but
 * never acted on.
 */
export class ShellScriptExecutor implements ScriptExecutor {
  private logger = createLogger('ShellScriptExecutor');

  constructor(private readonly shell: string = config.shell) {}

  execute(script: string): void {
    this.logger.debug(`Handing ${script.split('\n').length} script lines to ${this.shell}`);

    const result = spawnSync(this.shell, ['-c', script], { stdio: 'inherit' });
    if (result.error) {
      throw ErrorFactory.executionFailed(this.shell, result.error);
    }

    this.logger.debug(`Session finished (status: ${result.status}, signal: ${result.signal})`);
  }
}
