import { ConfigurationError, describeCause, ExecutorError } from '../core/errors.js';
import type { Transaction } from '../core/execution/statement-runner.js';
import type { Configuration } from './configuration.js';
import { QueryExecutor } from './query-executor.js';

export interface OpenSessionOptions {
  /** Commit every statement on its own; defaults to false */
  autoCommit?: boolean;
}

/**
 * Opens sessions against the configured environment.
 */
export class SessionFactory {
  constructor(readonly configuration: Configuration) {}

  /**
   * @throws ConfigurationError without an environment
   * @throws ExecutorError when the transaction or runner cannot be created
   */
  async openSession(options: OpenSessionOptions = {}): Promise<QueryExecutor> {
    const environment = this.configuration.environment;
    if (!environment) {
      throw new ConfigurationError('Cannot open a session: no environment is configured');
    }

    let transaction: Transaction | undefined;
    try {
      transaction = environment.transactionFactory.newTransaction({ autoCommit: options.autoCommit ?? false });
      const runner = environment.runnerFactory(transaction);
      return new QueryExecutor(this.configuration, transaction, runner);
    } catch (error) {
      await this.closeTransaction(transaction);
      throw new ExecutorError(`Error opening session. Cause: ${describeCause(error)}`, {
        cause: error,
        details: { environment: environment.id },
      });
    }
  }

  private async closeTransaction(transaction: Transaction | undefined): Promise<void> {
    if (!transaction) {
      return;
    }
    try {
      await transaction.close();
    } catch (closeError) {
      this.configuration.warningLogger({
        message: `Failed to close transaction of a session that could not be opened. Cause: ${describeCause(closeError)}`,
        cause: closeError,
      });
    }
  }
}
